import Fastify, { type FastifyInstance } from 'fastify';
import type { Bot } from 'grammy';
import type { AppConfig } from './config.js';
import type { TaskQueue } from './queue/manager.js';
import type { WorkerRunner } from './queue/runner.js';
import { adminRoutes, healthRoutes, telegramRoutes } from './routes/index.js';
import type { StagingStore } from './staging/types.js';

export const VERSION = '0.1.0';

export interface ServerDeps {
  config: AppConfig;
  bot: Bot;
  queue: TaskQueue;
  runner: WorkerRunner;
  staging: StagingStore;
}

export function buildServer(deps: ServerDeps): FastifyInstance {
  const { config, bot, queue, runner, staging } = deps;

  const server = Fastify({
    logger: {
      level: config.server.logLevel,
    },
  });

  server.register(telegramRoutes, {
    bot,
    path: config.telegram.webhookPath,
    secretToken: config.telegram.webhookSecret,
  });
  server.register(healthRoutes, { prefix: '/api', queue, runner, version: VERSION });
  server.register(adminRoutes, { prefix: '/api/admin', queue, runner, staging });

  return server;
}
