// Mail transport over the Resend HTTP API

import { z } from 'zod';
import type { MailMessage, MailTransport } from './types.js';

const ResendResponseSchema = z.object({ id: z.string() });

export interface ResendOptions {
  apiKey: string;
  apiUrl: string;
  from: string;
}

export class ResendMailTransport implements MailTransport {
  constructor(private readonly options: ResendOptions) {}

  async send(message: MailMessage, signal: AbortSignal): Promise<void> {
    const res = await fetch(this.options.apiUrl, {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${this.options.apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        from: this.options.from,
        to: [message.to],
        subject: message.subject,
        text: message.body,
      }),
      signal,
    });

    if (!res.ok) {
      const body = await res.text();
      throw new Error(`Resend error ${res.status}: ${body}`);
    }

    const parsed = ResendResponseSchema.safeParse(await res.json().catch(() => null));
    console.log(`[Mail] Sent "${message.subject}" to ${message.to}${parsed.success ? ` (id ${parsed.data.id})` : ''}`);
  }
}
