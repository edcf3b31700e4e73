// Review/dispatch workflow - edit subject, edit body, send by email
//
// Controls carry the report id, so between interactions the only state is
// the staged report itself and at most one pending input request per chat.

import type { ReportField } from '@session-scribe/shared';
import { withDeadline } from '../adapters/deadline.js';
import type { MailTransport } from '../adapters/types.js';
import { sendChunked, type ChatGateway } from '../chat/types.js';
import { errorMessage, NOT_FOUND_MESSAGE } from '../errors.js';
import type { PendingInputStore } from '../staging/pending-input.js';
import type { ReportStore } from '../staging/reports.js';
import { parseCallback, reviewControls } from './callbacks.js';

export const REVIEW_MESSAGES = {
  promptSubject: 'Send the new subject.',
  promptMessage: 'Send the new message.',
  sent: 'Email sent.',
  sendFailed: 'Failed to send email.',
  unknownAction: 'Unknown action.',
  notFound: NOT_FOUND_MESSAGE,
} as const;

/**
 * `closed` covers both terminal states: sent (keys deleted) and expired
 * (keys gone by TTL). The store cannot tell them apart and neither does
 * the user: both answer "Report not found.".
 */
export type ReviewState = 'ready' | 'awaiting_subject' | 'awaiting_message' | 'closed';

export interface ReviewDeps {
  gateway: ChatGateway;
  reports: ReportStore;
  pending: PendingInputStore;
  mail: MailTransport;
  recipients: readonly string[];
  mailTimeoutMs: number;
}

export function renderReport(subject: string, body: string): string {
  return `Subject: ${subject}\n\n${body}`;
}

export class ReviewService {
  private readonly sending = new Set<string>();

  constructor(private readonly deps: ReviewDeps) {}

  stateOf(chatId: string, reportId: string): ReviewState {
    if (this.deps.reports.getBody(reportId) === null) {
      return 'closed';
    }
    const pending = this.deps.pending.peek(chatId);
    if (pending?.reportId === reportId) {
      return pending.field === 'subject' ? 'awaiting_subject' : 'awaiting_message';
    }
    return 'ready';
  }

  /**
   * Handle a pressed control.
   */
  async handleCallback(chatId: string, data: string): Promise<void> {
    const parsed = parseCallback(data);

    if (!parsed) {
      console.warn(`[Review] Chat ${chatId} sent unknown callback "${data}"`);
      await this.deps.gateway.sendMessage(chatId, REVIEW_MESSAGES.unknownAction);
      return;
    }

    switch (parsed.action) {
      case 'edit_subject':
        await this.requestInput(chatId, parsed.reportId, 'subject');
        return;
      case 'edit_message':
        await this.requestInput(chatId, parsed.reportId, 'message');
        return;
      case 'send_email':
        await this.send(chatId, parsed.reportId);
        return;
    }
  }

  /**
   * Offer free text to the chat's pending input request.
   * Returns false when there was none, leaving the text to the caller.
   */
  async handleText(chatId: string, text: string): Promise<boolean> {
    const request = this.deps.pending.take(chatId);
    if (!request) {
      return false;
    }

    const { reports, gateway } = this.deps;

    if (reports.getBody(request.reportId) === null) {
      await gateway.sendMessage(chatId, REVIEW_MESSAGES.notFound);
      return true;
    }

    reports.update(request.reportId, request.field, text);
    console.log(`[Review] Chat ${chatId} updated ${request.field} of report ${request.reportId}`);

    // Read back rather than reuse `text`: a concurrent edit may have landed
    const report = reports.load(request.reportId);
    if (!report) {
      await gateway.sendMessage(chatId, REVIEW_MESSAGES.notFound);
      return true;
    }

    await sendChunked(gateway, chatId, renderReport(report.subject, report.body), reviewControls(report.reportId));
    return true;
  }

  private async requestInput(chatId: string, reportId: string, field: ReportField): Promise<void> {
    if (this.deps.reports.getBody(reportId) === null) {
      await this.deps.gateway.sendMessage(chatId, REVIEW_MESSAGES.notFound);
      return;
    }

    this.deps.pending.set(chatId, { reportId, field });
    await this.deps.gateway.sendMessage(
      chatId,
      field === 'subject' ? REVIEW_MESSAGES.promptSubject : REVIEW_MESSAGES.promptMessage
    );
  }

  private async send(chatId: string, reportId: string): Promise<void> {
    // A redelivered or double-pressed send must not mail the report twice
    if (this.sending.has(reportId)) {
      console.warn(`[Review] Report ${reportId} is already being sent, ignoring chat ${chatId}`);
      return;
    }

    this.sending.add(reportId);
    try {
      await this.dispatch(chatId, reportId);
    } finally {
      this.sending.delete(reportId);
    }
  }

  private async dispatch(chatId: string, reportId: string): Promise<void> {
    const { reports, gateway, mail, recipients, mailTimeoutMs } = this.deps;

    const report = reports.load(reportId);
    if (!report) {
      await gateway.sendMessage(chatId, REVIEW_MESSAGES.notFound);
      return;
    }

    for (const to of recipients) {
      try {
        await withDeadline(null, mailTimeoutMs, signal =>
          mail.send({ to, subject: report.subject, body: report.body }, signal)
        );
      } catch (err) {
        // The report stays staged so the user can press send again
        console.error(`[Review] Sending report ${reportId} to ${to} failed: ${errorMessage(err)}`, {
          chatId,
          reportId,
        });
        await gateway.sendMessage(chatId, REVIEW_MESSAGES.sendFailed);
        return;
      }
    }

    reports.delete(reportId);
    console.log(`[Review] Report ${reportId} sent to ${recipients.length} recipient(s)`);
    await gateway.sendMessage(chatId, REVIEW_MESSAGES.sent);
  }
}
