// Transcode worker - checks for an audio stream and normalizes it for speech recognition

import { withDeadline } from '../../adapters/deadline.js';
import type { Transcoder } from '../../adapters/types.js';
import { attempt, ScribeError } from '../../errors.js';
import { normalizedFilePath } from '../../pipeline/files.js';
import { StageWorker, type StageDeps, type StageOutcome } from '../../pipeline/stage-worker.js';
import type { JobContext } from '../../queue/types.js';

export class TranscodeWorker extends StageWorker {
  readonly stage = 'transcode' as const;

  constructor(deps: StageDeps, private readonly transcoder: Transcoder) {
    super(deps);
  }

  protected async run(context: JobContext, signal: AbortSignal): Promise<StageOutcome> {
    const rawPath = context.rawPath;
    if (!rawPath) {
      throw new ScribeError('unexpected', `Job ${context.jobId} reached transcode without a raw file`);
    }

    const { config } = this.deps;
    context.normalizedPath = normalizedFilePath(config.storage.downloadsDir, context.jobId);
    const outputPath = context.normalizedPath;

    const result = await attempt('transcode_failure', () =>
      withDeadline(signal, config.timeouts.transcodeMs, s => this.transcoder.transcode(rawPath, outputPath, s))
    );

    if (!result.ok) {
      throw new ScribeError(
        result.reason === 'no_audio_stream' ? 'no_audio_stream' : 'transcode_failure',
        result.error
      );
    }

    context.normalizedPath = result.path;
    return { next: 'transcribe' };
  }
}
