// Transcribe worker - speech to text

import { withDeadline } from '../../adapters/deadline.js';
import type { Transcriber } from '../../adapters/types.js';
import { attempt, ScribeError } from '../../errors.js';
import { StageWorker, type StageDeps, type StageOutcome } from '../../pipeline/stage-worker.js';
import type { JobContext } from '../../queue/types.js';

export class TranscribeWorker extends StageWorker {
  readonly stage = 'transcribe' as const;

  constructor(deps: StageDeps, private readonly transcriber: Transcriber) {
    super(deps);
  }

  protected async run(context: JobContext, signal: AbortSignal): Promise<StageOutcome> {
    const audioPath = context.normalizedPath;
    if (!audioPath) {
      throw new ScribeError('unexpected', `Job ${context.jobId} reached transcribe without a normalized file`);
    }

    const { config } = this.deps;
    const text = await attempt('transcription_failure', () =>
      withDeadline(signal, config.timeouts.transcribeMs, s =>
        this.transcriber.transcribe(audioPath, config.openai.transcriptionLanguage, s)
      )
    );

    if (text.trim().length === 0) {
      throw new ScribeError('transcription_failure', 'Transcription came back empty');
    }

    context.transcript = text;
    console.log(`[TranscribeWorker] Job ${context.jobId}: ${text.length} chars transcribed`);
    return { next: 'generate', data: { transcriptLength: text.length } };
  }
}
