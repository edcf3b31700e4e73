// Pending input requests - binds a chat's next free-text message to one report field

import { z } from 'zod';
import type { PendingInputRequest } from '@session-scribe/shared';
import type { StagingStore } from './types.js';

const PendingInputSchema = z.object({
  reportId: z.string().min(1),
  field: z.enum(['subject', 'message']),
});

export function pendingInputKey(chatId: string): string {
  return `pending-input:${chatId}`;
}

export class PendingInputStore {
  constructor(
    private readonly store: StagingStore,
    private readonly ttlMs: number
  ) {}

  /**
   * Register the request, replacing any earlier one for the same chat.
   */
  set(chatId: string, request: PendingInputRequest): void {
    this.store.put(pendingInputKey(chatId), JSON.stringify(request), this.ttlMs);
  }

  peek(chatId: string): PendingInputRequest | null {
    const raw = this.store.get(pendingInputKey(chatId));
    if (raw === null) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      console.warn(`[PendingInput] Discarding unreadable request for chat ${chatId}`);
      this.store.delete(pendingInputKey(chatId));
      return null;
    }

    const result = PendingInputSchema.safeParse(parsed);
    if (!result.success) {
      console.warn(`[PendingInput] Discarding malformed request for chat ${chatId}`);
      this.store.delete(pendingInputKey(chatId));
      return null;
    }
    return result.data;
  }

  /**
   * Single-shot read: returns the request and removes it.
   */
  take(chatId: string): PendingInputRequest | null {
    const request = this.peek(chatId);
    if (request) {
      this.store.delete(pendingInputKey(chatId));
    }
    return request;
  }
}
