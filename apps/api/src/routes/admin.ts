// Admin routes - queue status, dead letter list, resubmission, cleanup

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { TaskQueue } from '../queue/manager.js';
import type { WorkerRunner } from '../queue/runner.js';
import type { StagingStore } from '../staging/types.js';
import { runCleanup } from '../ttl/manager.js';

export interface AdminRouteOptions {
  queue: TaskQueue;
  runner: WorkerRunner;
  staging: StagingStore;
}

const PageQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

export async function adminRoutes(server: FastifyInstance, options: AdminRouteOptions): Promise<void> {
  const { queue, runner, staging } = options;

  // GET /api/admin/queue - Queue statistics
  server.get('/queue', async () => {
    const status = runner.getStatus();

    return {
      queue: queue.getStats(),
      runner: {
        isRunning: status.isRunning,
        registeredWorkers: status.registeredWorkers,
        runningTasks: status.runningTasks,
        maxConcurrent: status.maxConcurrent,
      },
    };
  });

  // GET /api/admin/dead-letter - Failed tasks, newest first
  server.get('/dead-letter', async (request, reply) => {
    const query = PageQuerySchema.safeParse(request.query);
    if (!query.success) {
      reply.status(400);
      return { error: 'Invalid pagination', details: query.error.issues };
    }

    const tasks = queue.getDeadLetter(query.data.limit, query.data.offset);

    return {
      tasks: tasks.map(t => ({
        id: t.id,
        jobId: t.jobId,
        stage: t.stage,
        chatId: t.payload.chatId,
        attempts: t.attempts,
        errorMessage: t.errorMessage,
        deadLetterAt: t.deadLetterAt,
        deadLetterReason: t.deadLetterReason,
        createdAt: t.createdAt,
      })),
      count: tasks.length,
    };
  });

  // POST /api/admin/tasks/:id/resubmit - Start a new job for the same upload
  server.post<{ Params: { id: string } }>('/tasks/:id/resubmit', async (request, reply) => {
    const result = queue.resubmit(request.params.id);

    if (!result.success) {
      reply.status(result.error === 'Task not found' ? 404 : 400);
      return { success: false, error: result.error };
    }

    return { success: true, jobId: result.task.jobId, taskId: result.task.id };
  });

  // POST /api/admin/cleanup - Run housekeeping now
  server.post('/cleanup', async () => {
    return { success: true, ...runCleanup({ staging, queue }) };
  });
}
