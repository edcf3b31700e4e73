// Telegram transport - update normalization, outbound messages, file download

import path from 'path';
import { Bot, InlineKeyboard } from 'grammy';
import type { InlineKeyboardMarkup } from 'grammy/types';
import type { ChatControl, InboundEvent } from '@session-scribe/shared';
import { errorMessage, GENERIC_FAILURE_MESSAGE } from '../errors.js';
import type { ChatRouter } from './router.js';
import type { ChatGateway, RemoteFile } from './types.js';

const TELEGRAM_BASE_URL = 'https://api.telegram.org';

/**
 * The part of grammy's `Api` the gateway calls.
 */
export interface TelegramApi {
  sendMessage(
    chatId: string,
    text: string,
    other?: { reply_markup?: InlineKeyboardMarkup },
    signal?: AbortSignal
  ): Promise<unknown>;
  getFile(fileId: string, signal?: AbortSignal): Promise<{ file_path?: string }>;
}

/**
 * One button per row, in the given order.
 */
export function toInlineKeyboard(controls: ChatControl[]): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  controls.forEach((control, i) => {
    if (i > 0) {
      keyboard.row();
    }
    keyboard.text(control.label, control.token);
  });
  return keyboard;
}

export class TelegramGateway implements ChatGateway {
  constructor(
    private readonly api: TelegramApi,
    private readonly botToken: string,
    private readonly fetchImpl: typeof fetch = fetch,
    private readonly baseUrl: string = TELEGRAM_BASE_URL
  ) {}

  async sendMessage(chatId: string, text: string, controls?: ChatControl[]): Promise<void> {
    if (controls && controls.length > 0) {
      await this.api.sendMessage(chatId, text, { reply_markup: toInlineKeyboard(controls) });
    } else {
      await this.api.sendMessage(chatId, text);
    }
  }

  async fetchFile(remoteRef: string, signal: AbortSignal): Promise<RemoteFile> {
    const file = await this.api.getFile(remoteRef, signal);
    if (!file.file_path) {
      throw new Error(`Telegram returned no download path for file ${remoteRef}`);
    }

    const url = `${this.baseUrl}/file/bot${this.botToken}/${file.file_path}`;
    const response = await this.fetchImpl(url, { signal });
    if (!response.ok) {
      throw new Error(`File download failed with HTTP ${response.status}`);
    }

    const extension = path.extname(file.file_path).slice(1).toLowerCase();
    return {
      data: Buffer.from(await response.arrayBuffer()),
      extension: extension || null,
    };
  }
}

interface TelegramFileRef {
  file_id: string;
  mime_type?: string;
}

/**
 * The fields of a Telegram `Update` the router looks at.
 */
export interface InboundUpdate {
  callback_query?: {
    id: string;
    data?: string;
    from: { id: number };
    message?: { chat: { id: number } };
  };
  message?: {
    chat: { id: number };
    text?: string;
    document?: TelegramFileRef;
    audio?: TelegramFileRef;
    voice?: TelegramFileRef;
  };
}

/**
 * Reduce a Telegram update to the events the router understands.
 * Updates of other kinds (edits, joins, stickers...) give null.
 */
export function inboundFromUpdate(update: InboundUpdate): InboundEvent | null {
  const query = update.callback_query;
  if (query) {
    return {
      type: 'callback',
      chatId: String(query.message?.chat.id ?? query.from.id),
      callbackId: query.id,
      callbackData: query.data ?? '',
    };
  }

  const message = update.message;
  if (!message) {
    return null;
  }
  const chatId = String(message.chat.id);

  if (message.document) {
    return {
      type: 'document',
      chatId,
      fileRef: message.document.file_id,
      mimeType: message.document.mime_type,
    };
  }
  if (message.audio) {
    return { type: 'audio', chatId, fileRef: message.audio.file_id, mimeType: message.audio.mime_type };
  }
  if (message.voice) {
    return { type: 'voice', chatId, fileRef: message.voice.file_id, mimeType: message.voice.mime_type };
  }
  if (message.text !== undefined) {
    return { type: 'text', chatId, text: message.text };
  }
  return null;
}

/**
 * The parts of a grammy context the dispatcher reads.
 */
export interface UpdateContext {
  update: InboundUpdate;
  callbackQuery?: unknown;
  answerCallbackQuery(): Promise<unknown>;
}

/**
 * Feeds bot updates through the router. Callback queries are answered up
 * front and handled in the background, so a webhook response never waits
 * on mail delivery. Handling errors get the generic apology in the chat.
 */
export class UpdateDispatcher {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly router: ChatRouter,
    private readonly gateway: ChatGateway
  ) {}

  async handle(ctx: UpdateContext): Promise<void> {
    const event = inboundFromUpdate(ctx.update);

    if (ctx.callbackQuery) {
      await ctx.answerCallbackQuery().catch(err => {
        console.warn(`[Telegram] Could not answer callback query: ${errorMessage(err)}`);
      });
    }

    if (!event) {
      return;
    }

    if (event.type === 'callback') {
      const work: Promise<void> = this.route(event).finally(() => {
        this.inFlight.delete(work);
      });
      this.inFlight.add(work);
      return;
    }

    await this.route(event);
  }

  /**
   * Wait for callback handling still running in the background.
   */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.inFlight));
  }

  private async route(event: InboundEvent): Promise<void> {
    try {
      await this.router.handle(event);
    } catch (err) {
      console.error(`[Telegram] Handling ${event.type} from chat ${event.chatId} failed: ${errorMessage(err)}`);
      await this.gateway.sendMessage(event.chatId, GENERIC_FAILURE_MESSAGE).catch(notifyErr => {
        console.error(`[Telegram] Could not apologize to chat ${event.chatId}: ${errorMessage(notifyErr)}`);
      });
    }
  }
}

export function attachDispatcher(bot: Bot, dispatcher: UpdateDispatcher): void {
  bot.use(ctx => dispatcher.handle(ctx));

  bot.catch(err => {
    console.error(`[Telegram] Update ${err.ctx.update.update_id} failed: ${errorMessage(err.error)}`);
  });
}

export function createBot(botToken: string): Bot {
  return new Bot(botToken);
}
