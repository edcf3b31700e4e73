// Worker runner - polls for tasks and dispatches them to stage workers

import type { TaskQueue } from './manager.js';
import type { Task, TaskStage, Worker } from './types.js';

export interface WorkerRunnerOptions {
  pollIntervalMs?: number;
  maxConcurrent?: number;
  shutdownTimeoutMs?: number;
}

interface RunningTask {
  controller: AbortController;
  done: Promise<void>;
}

export class WorkerRunner {
  private workers = new Map<TaskStage, Worker>();
  private runningTasks = new Map<string, RunningTask>();
  private isRunning = false;
  private pollTimer: NodeJS.Timeout | null = null;
  private readonly pollIntervalMs: number;
  private readonly maxConcurrent: number;
  private readonly shutdownTimeoutMs: number;

  constructor(private readonly queue: TaskQueue, options: WorkerRunnerOptions = {}) {
    this.pollIntervalMs = options.pollIntervalMs || 3000;
    this.maxConcurrent = options.maxConcurrent || 2;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs || 30000;
  }

  /**
   * Register a worker for a pipeline stage
   */
  register(worker: Worker): void {
    this.workers.set(worker.stage, worker);
    console.log(`[WorkerRunner] Registered worker for stage: ${worker.stage}`);
  }

  start(): void {
    if (this.isRunning) {
      console.log('[WorkerRunner] Already running');
      return;
    }

    this.isRunning = true;
    console.log('[WorkerRunner] Starting with poll interval:', this.pollIntervalMs, 'ms');

    this.poll();
    this.pollTimer = setInterval(() => this.poll(), this.pollIntervalMs);
  }

  /**
   * Stop polling, wait for running tasks, and abort whatever is still
   * running once the shutdown timeout is reached.
   */
  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    console.log('[WorkerRunner] Stopping gracefully...');
    this.isRunning = false;

    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }

    if (this.runningTasks.size === 0) {
      console.log('[WorkerRunner] Stopped');
      return;
    }

    console.log(`[WorkerRunner] Waiting for ${this.runningTasks.size} tasks to complete...`);
    const running = Array.from(this.runningTasks.values());

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.shutdownTimeoutMs);
    });

    const outcome = await Promise.race([
      Promise.all(running.map(r => r.done)).then(() => 'done' as const),
      timedOut,
    ]);
    clearTimeout(timer);

    if (outcome === 'timeout') {
      console.log('[WorkerRunner] Shutdown timeout reached, aborting tasks...');
      running.forEach(r => r.controller.abort(new Error('Worker runner shutting down')));
      await Promise.all(running.map(r => r.done));
    }

    console.log('[WorkerRunner] Stopped');
  }

  /**
   * Claim and run tasks one after another until the queue is empty,
   * including tasks enqueued by the tasks it runs.
   */
  async runUntilIdle(): Promise<number> {
    let processed = 0;

    for (;;) {
      const task = this.queue.claim();
      if (!task) {
        break;
      }
      await this.dispatch(task);
      processed++;
    }

    await Promise.all(Array.from(this.runningTasks.values()).map(r => r.done));
    return processed;
  }

  getStatus(): {
    isRunning: boolean;
    registeredWorkers: TaskStage[];
    runningTasks: string[];
    maxConcurrent: number;
  } {
    return {
      isRunning: this.isRunning,
      registeredWorkers: Array.from(this.workers.keys()),
      runningTasks: Array.from(this.runningTasks.keys()),
      maxConcurrent: this.maxConcurrent,
    };
  }

  private poll(): void {
    if (!this.isRunning) {
      return;
    }

    const availableSlots = this.maxConcurrent - this.runningTasks.size;

    for (let i = 0; i < availableSlots; i++) {
      const task = this.queue.claim();

      if (!task) {
        break;
      }

      // Tracked in runningTasks and awaited on stop
      void this.dispatch(task);
    }
  }

  private dispatch(task: Task): Promise<void> {
    const worker = this.workers.get(task.stage);

    if (!worker) {
      console.error(`[WorkerRunner] No worker registered for stage: ${task.stage}`);
      this.queue.fail(task.id, `No worker registered for stage: ${task.stage}`);
      return Promise.resolve();
    }

    const controller = new AbortController();
    const done = this.processTask(task, worker, controller.signal).finally(() => {
      this.runningTasks.delete(task.id);
    });
    this.runningTasks.set(task.id, { controller, done });
    return done;
  }

  private async processTask(task: Task, worker: Worker, signal: AbortSignal): Promise<void> {
    console.log(`[WorkerRunner] Processing task ${task.id} (${task.stage}) for job ${task.jobId}`);
    const startTime = Date.now();

    try {
      const result = await worker.process(task, signal);
      const duration = Date.now() - startTime;

      if (result.success) {
        this.queue.complete(task.id);
        console.log(`[WorkerRunner] Task ${task.id} completed in ${duration}ms`);
      } else {
        this.queue.fail(task.id, result.error);
        console.error(`[WorkerRunner] Task ${task.id} failed: ${result.error}`);
      }
    } catch (error) {
      const duration = Date.now() - startTime;
      const errorMessage = error instanceof Error ? error.message : String(error);

      try {
        this.queue.fail(task.id, errorMessage);
      } catch (failError) {
        console.error(`[WorkerRunner] Could not record failure of task ${task.id}:`, failError);
      }
      console.error(`[WorkerRunner] Task ${task.id} crashed after ${duration}ms: ${errorMessage}`);
    }
  }
}
