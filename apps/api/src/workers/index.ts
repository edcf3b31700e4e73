// Workers module exports

import type { NoteGenerator, Transcoder, Transcriber } from '../adapters/types.js';
import type { StageDeps } from '../pipeline/stage-worker.js';
import type { Worker } from '../queue/types.js';
import type { ReportStore } from '../staging/reports.js';
import { DeliverWorker } from './deliver/index.js';
import { FetchWorker } from './fetch/index.js';
import { GenerateWorker } from './generate/index.js';
import { TranscodeWorker } from './transcode/index.js';
import { TranscribeWorker } from './transcribe/index.js';

export { FetchWorker, TranscodeWorker, TranscribeWorker, GenerateWorker, DeliverWorker };
export { readyMessage } from './deliver/index.js';

export interface PipelineAdapters {
  transcoder: Transcoder;
  transcriber: Transcriber;
  generator: NoteGenerator;
  reports: ReportStore;
}

/**
 * One worker per stage, in pipeline order.
 */
export function createPipelineWorkers(deps: StageDeps, adapters: PipelineAdapters): Worker[] {
  return [
    new FetchWorker(deps),
    new TranscodeWorker(deps, adapters.transcoder),
    new TranscribeWorker(deps, adapters.transcriber),
    new GenerateWorker(deps, adapters.generator),
    new DeliverWorker(deps, adapters.reports),
  ];
}
