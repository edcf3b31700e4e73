// Routes normalized inbound chat events to jobs and the review workflow

import type { InboundEvent } from '@session-scribe/shared';
import { startJob } from '../pipeline/jobs.js';
import type { TaskQueue } from '../queue/manager.js';
import type { ReviewService } from '../review/service.js';
import type { ChatGateway } from './types.js';

export const CHAT_MESSAGES = {
  greeting: 'Hi! Send me an audio file and I will transcribe it and generate a report.',
  received: 'Audio received. Processing…',
  notAudio: 'Please send an audio file.',
  invalidAudio: 'Please send a valid audio file or voice message.',
  usage: 'Send me an audio file or a voice message and I will turn it into a report.',
} as const;

// "/start", "/restart", optionally addressed to the bot ("/start@some_bot")
const GREETING_COMMAND = /^\/(start|restart)(@\w+)?(\s|$)/;

export interface ChatRouterDeps {
  queue: TaskQueue;
  review: ReviewService;
  gateway: ChatGateway;
}

export class ChatRouter {
  constructor(private readonly deps: ChatRouterDeps) {}

  async handle(event: InboundEvent): Promise<void> {
    switch (event.type) {
      case 'document':
        if (!event.mimeType?.startsWith('audio/')) {
          await this.reply(event, CHAT_MESSAGES.notAudio);
          return;
        }
        await this.acceptAudio(event);
        return;

      case 'audio':
      case 'voice':
        await this.acceptAudio(event);
        return;

      case 'text':
        await this.handleText(event);
        return;

      case 'callback':
        await this.deps.review.handleCallback(event.chatId, event.callbackData ?? '');
        return;
    }
  }

  private async acceptAudio(event: InboundEvent): Promise<void> {
    if (!event.fileRef) {
      await this.reply(event, CHAT_MESSAGES.invalidAudio);
      return;
    }

    startJob(this.deps.queue, { chatId: event.chatId, remoteRef: event.fileRef });
    await this.reply(event, CHAT_MESSAGES.received);
  }

  private async handleText(event: InboundEvent): Promise<void> {
    const text = event.text ?? '';

    if (GREETING_COMMAND.test(text)) {
      await this.reply(event, CHAT_MESSAGES.greeting);
      return;
    }

    const consumed = await this.deps.review.handleText(event.chatId, text);
    if (!consumed) {
      await this.reply(event, CHAT_MESSAGES.usage);
    }
  }

  private reply(event: InboundEvent, text: string): Promise<void> {
    return this.deps.gateway.sendMessage(event.chatId, text);
  }
}
