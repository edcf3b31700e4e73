// Base class for pipeline stage workers - failure reporting and guaranteed cleanup

import type { AppConfig } from '../config.js';
import type { ChatGateway } from '../chat/types.js';
import { toScribeError, userMessageFor, type ScribeError } from '../errors.js';
import type { TaskQueue } from '../queue/manager.js';
import type { JobContext, Task, TaskResult, TaskStage, Worker } from '../queue/types.js';
import { cleanupJobFiles } from './files.js';

export interface StageDeps {
  config: AppConfig;
  queue: TaskQueue;
  gateway: ChatGateway;
}

export type StageOutcome =
  | { next: TaskStage; data?: Record<string, unknown> }
  | { done: true; data?: Record<string, unknown> };

/**
 * A stage either hands the job to the next stage or ends it. When the job
 * ends, for any reason, its temporary files are removed; when it ends in
 * failure, the chat gets exactly one message naming the failed stage.
 */
export abstract class StageWorker implements Worker {
  abstract readonly stage: TaskStage;

  constructor(protected readonly deps: StageDeps) {}

  /**
   * Do the stage's work. `context` is a private copy: record file paths on
   * it before creating the files so cleanup can find them.
   */
  protected abstract run(context: JobContext, signal: AbortSignal): Promise<StageOutcome>;

  async process(task: Task, signal: AbortSignal): Promise<TaskResult> {
    const context: JobContext = { ...task.payload };
    let jobEnded = true;

    try {
      const outcome = await this.run(context, signal);

      if ('next' in outcome) {
        const nextTask = this.deps.queue.enqueue(outcome.next, context);
        jobEnded = false;
        console.log(`[${this.constructor.name}] Job ${context.jobId} handed to ${outcome.next} (task ${nextTask.id})`);
        return { success: true, data: { ...outcome.data, nextTaskId: nextTask.id } };
      }

      console.log(`[${this.constructor.name}] Job ${context.jobId} finished`);
      return { success: true, data: outcome.data };
    } catch (err) {
      const error = toScribeError(err);
      this.logFailure(task, context, error);
      await this.notifyFailure(context, error);
      return { success: false, error: `${error.kind}: ${error.message}` };
    } finally {
      if (jobEnded) {
        await cleanupJobFiles(context);
      }
    }
  }

  private logFailure(task: Task, context: JobContext, error: ScribeError): void {
    const fields = {
      taskId: task.id,
      jobId: context.jobId,
      chatId: context.chatId,
      stage: this.stage,
      kind: error.kind,
      details: error.details,
    };
    if (error.kind === 'unexpected') {
      console.error(`[${this.constructor.name}] Unexpected error: ${error.message}`, fields, error.stack);
    } else {
      console.error(`[${this.constructor.name}] Stage failed: ${error.message}`, fields);
    }
  }

  private async notifyFailure(context: JobContext, error: ScribeError): Promise<void> {
    try {
      await this.deps.gateway.sendMessage(context.chatId, userMessageFor(error.kind, this.stage));
    } catch (notifyError) {
      console.error(
        `[${this.constructor.name}] Could not report failure of job ${context.jobId} to chat ${context.chatId}:`,
        notifyError
      );
    }
  }
}
