// Telegram webhook - hands updates to the bot and returns without waiting on jobs

import type { FastifyInstance } from 'fastify';
import { webhookCallback, type Bot } from 'grammy';
import type { Update } from 'grammy/types';

export interface TelegramRouteOptions {
  bot: Bot;
  path: string;
  secretToken: string | null;
}

export async function telegramRoutes(server: FastifyInstance, options: TelegramRouteOptions): Promise<void> {
  const handleUpdate = webhookCallback(options.bot, 'fastify', {
    ...(options.secretToken ? { secretToken: options.secretToken } : {}),
  });

  server.post<{ Body: Update }>(options.path, (request, reply) => handleUpdate(request, reply));
}
