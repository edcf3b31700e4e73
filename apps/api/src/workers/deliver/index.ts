// Deliver worker - sends the note, stages it for review and offers the review controls

import { v4 as uuidv4 } from 'uuid';
import { sendChunked } from '../../chat/types.js';
import { attempt, ScribeError } from '../../errors.js';
import { StageWorker, type StageDeps, type StageOutcome } from '../../pipeline/stage-worker.js';
import type { JobContext } from '../../queue/types.js';
import { reviewControls } from '../../review/callbacks.js';
import type { ReportStore } from '../../staging/reports.js';

export function readyMessage(subject: string): string {
  return `Report ready for review.\nSubject: ${subject}`;
}

export class DeliverWorker extends StageWorker {
  readonly stage = 'deliver' as const;

  constructor(deps: StageDeps, private readonly reports: ReportStore) {
    super(deps);
  }

  protected async run(context: JobContext, _signal: AbortSignal): Promise<StageOutcome> {
    const note = context.note;
    if (!note) {
      throw new ScribeError('unexpected', `Job ${context.jobId} reached deliver without a note`);
    }

    const { gateway } = this.deps;
    const sent = await attempt('transport_failure', () => sendChunked(gateway, context.chatId, note));

    const reportId = uuidv4();
    const report = this.reports.stage(reportId, note);

    try {
      await attempt('transport_failure', () =>
        gateway.sendMessage(context.chatId, readyMessage(report.subject), reviewControls(reportId))
      );
    } catch (err) {
      // Nobody can act on a report whose controls never arrived
      this.reports.delete(reportId);
      throw err;
    }

    console.log(`[DeliverWorker] Job ${context.jobId}: report ${reportId} staged after ${sent} message(s)`);
    return { done: true, data: { reportId, messages: sent } };
  }
}
