// Callback tokens carried by the review controls: "<action>:<reportId>"

import type { ChatControl, ReviewAction } from '@session-scribe/shared';

const ACTIONS: readonly ReviewAction[] = ['edit_subject', 'edit_message', 'send_email'];

const LABELS: Record<ReviewAction, string> = {
  edit_subject: 'Edit subject',
  edit_message: 'Edit message',
  send_email: 'Send email',
};

export interface ParsedCallback {
  action: ReviewAction;
  reportId: string;
}

function isReviewAction(value: string): value is ReviewAction {
  return (ACTIONS as readonly string[]).includes(value);
}

export function encodeCallback(action: ReviewAction, reportId: string): string {
  return `${action}:${reportId}`;
}

/**
 * Parse a callback token, splitting on the first ':' only.
 * Returns null for unknown actions or an empty report id.
 */
export function parseCallback(data: string): ParsedCallback | null {
  const separator = data.indexOf(':');
  if (separator === -1) {
    return null;
  }

  const action = data.slice(0, separator);
  const reportId = data.slice(separator + 1);

  if (!isReviewAction(action) || reportId.length === 0) {
    return null;
  }
  return { action, reportId };
}

/**
 * The three review controls, in display order, bound to one report.
 */
export function reviewControls(reportId: string): ChatControl[] {
  return ACTIONS.map(action => ({ label: LABELS[action], token: encodeCallback(action, reportId) }));
}
