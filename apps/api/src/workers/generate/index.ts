// Generate worker - structured note from the transcript

import { withDeadline } from '../../adapters/deadline.js';
import type { NoteGenerator } from '../../adapters/types.js';
import { attempt, ScribeError } from '../../errors.js';
import { missingSections } from '../../llm/prompts.js';
import { StageWorker, type StageDeps, type StageOutcome } from '../../pipeline/stage-worker.js';
import type { JobContext } from '../../queue/types.js';

export class GenerateWorker extends StageWorker {
  readonly stage = 'generate' as const;

  constructor(deps: StageDeps, private readonly generator: NoteGenerator) {
    super(deps);
  }

  protected async run(context: JobContext, signal: AbortSignal): Promise<StageOutcome> {
    const transcript = context.transcript;
    if (!transcript) {
      throw new ScribeError('unexpected', `Job ${context.jobId} reached generate without a transcript`);
    }

    const note = await attempt('generation_failure', () =>
      withDeadline(signal, this.deps.config.timeouts.generateMs, s => this.generator.generate(transcript, s))
    );

    if (note.trim().length === 0) {
      throw new ScribeError('generation_failure', 'Generated note came back empty');
    }

    const missing = missingSections(note);
    if (missing.length > 0) {
      console.warn(`[GenerateWorker] Job ${context.jobId}: note lacks sections ${missing.join(', ')}`);
    }

    context.note = note;
    return { next: 'deliver', data: { noteLength: note.length, missingSections: missing } };
  }
}
