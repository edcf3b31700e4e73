import type { FastifyInstance } from 'fastify';
import type { TaskQueue } from '../queue/manager.js';
import type { WorkerRunner } from '../queue/runner.js';

export interface HealthRouteOptions {
  queue: TaskQueue;
  runner: WorkerRunner;
  version: string;
}

export async function healthRoutes(fastify: FastifyInstance, options: HealthRouteOptions): Promise<void> {
  const { queue, runner, version } = options;

  // Basic health check
  fastify.get('/health', async () => {
    const status = runner.getStatus();

    return {
      status: status.isRunning ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      version,
      workers: {
        running: status.isRunning,
        stages: status.registeredWorkers,
      },
      queue: queue.getStats(),
    };
  });

  // Liveness probe - just checks if server is up
  fastify.get('/health/live', async () => {
    return { status: 'alive' };
  });
}
