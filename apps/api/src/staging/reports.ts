// Staged reports - subject and body kept as two independently expiring keys

import type { ReportField, StagedReport } from '@session-scribe/shared';
import { systemClock, type Clock, type StagingStore } from './types.js';

const KEY_PREFIX: Record<ReportField, string> = {
  subject: 'subject:',
  message: 'message:',
};

export function reportKey(field: ReportField, reportId: string): string {
  return `${KEY_PREFIX[field]}${reportId}`;
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/**
 * Date-stamped subject used when none was chosen, e.g. "Session Report 2026-10-19".
 */
export function defaultSubject(date: Date): string {
  return `Session Report ${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export class ReportStore {
  constructor(
    private readonly store: StagingStore,
    private readonly ttlMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Stage a freshly generated report under the default subject.
   */
  stage(reportId: string, body: string): StagedReport {
    const subject = defaultSubject(new Date(this.clock()));
    this.store.put(reportKey('subject', reportId), subject, this.ttlMs);
    this.store.put(reportKey('message', reportId), body, this.ttlMs);
    return { reportId, subject, body };
  }

  getSubject(reportId: string): string | null {
    return this.store.get(reportKey('subject', reportId));
  }

  getBody(reportId: string): string | null {
    return this.store.get(reportKey('message', reportId));
  }

  /**
   * The report as it would be sent now: the body must still exist, the
   * subject falls back to today's default.
   */
  load(reportId: string): StagedReport | null {
    const body = this.getBody(reportId);
    if (body === null) {
      return null;
    }
    const subject = this.getSubject(reportId) ?? defaultSubject(new Date(this.clock()));
    return { reportId, subject, body };
  }

  /**
   * Overwrite one field and renew that field's TTL.
   */
  update(reportId: string, field: ReportField, value: string): void {
    this.store.put(reportKey(field, reportId), value, this.ttlMs);
  }

  delete(reportId: string): void {
    this.store.delete(reportKey('subject', reportId));
    this.store.delete(reportKey('message', reportId));
  }
}
