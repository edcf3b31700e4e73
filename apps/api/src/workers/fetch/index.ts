// Fetch worker - downloads the uploaded audio into job-private storage

import fs from 'fs';
import { withDeadline } from '../../adapters/deadline.js';
import { attempt } from '../../errors.js';
import { rawFilePath } from '../../pipeline/files.js';
import { StageWorker, type StageOutcome } from '../../pipeline/stage-worker.js';
import type { JobContext } from '../../queue/types.js';

export class FetchWorker extends StageWorker {
  readonly stage = 'fetch' as const;

  protected async run(context: JobContext, signal: AbortSignal): Promise<StageOutcome> {
    const { gateway, config } = this.deps;

    const file = await attempt('transport_failure', () =>
      withDeadline(signal, config.timeouts.fetchMs, s => gateway.fetchFile(context.remoteRef, s))
    );

    await fs.promises.mkdir(config.storage.downloadsDir, { recursive: true });
    context.rawPath = rawFilePath(config.storage.downloadsDir, context.jobId, file.extension);
    await fs.promises.writeFile(context.rawPath, file.data);

    console.log(`[FetchWorker] Job ${context.jobId}: saved ${file.data.length} bytes to ${context.rawPath}`);
    return { next: 'transcode', data: { bytes: file.data.length } };
  }
}
