// Chat transport contract used by the pipeline and the review workflow

import type { ChatControl } from '@session-scribe/shared';

export interface RemoteFile {
  data: Buffer;
  /** Extension of the remote file name, lower-case, without the dot */
  extension: string | null;
}

export interface ChatGateway {
  sendMessage(chatId: string, text: string, controls?: ChatControl[]): Promise<void>;
  fetchFile(remoteRef: string, signal: AbortSignal): Promise<RemoteFile>;
}

// Telegram rejects longer messages
export const MAX_MESSAGE_LENGTH = 4095;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * Split text into consecutive slices of at most `size` UTF-16 code units.
 * A slice never ends between the two halves of a surrogate pair.
 * Joining the slices gives back the input; an empty text yields no slices.
 */
export function chunkText(text: string, size: number = MAX_MESSAGE_LENGTH): string[] {
  if (size <= 1) {
    throw new RangeError(`Chunk size must be at least 2, got ${size}`);
  }

  const chunks: string[] = [];
  let offset = 0;
  while (offset < text.length) {
    let end = Math.min(offset + size, text.length);
    if (end < text.length && isHighSurrogate(text.charCodeAt(end - 1))) {
      end -= 1;
    }
    chunks.push(text.slice(offset, end));
    offset = end;
  }
  return chunks;
}

/**
 * Send text as as many messages as it takes; controls go on the last one.
 */
export async function sendChunked(
  gateway: ChatGateway,
  chatId: string,
  text: string,
  controls?: ChatControl[]
): Promise<number> {
  const chunks = chunkText(text);
  for (let i = 0; i < chunks.length; i++) {
    const isLast = i === chunks.length - 1;
    await gateway.sendMessage(chatId, chunks[i], isLast ? controls : undefined);
  }
  return chunks.length;
}
