import type { CorrelationRecord } from './types.js';

/** Zulip refuses content edits of messages older than this. */
export const EDIT_WINDOW_MS = 60 * 60 * 1000;

export type EditDecision =
  | { verdict: 'unknown' }
  | { verdict: 'approved'; record: CorrelationRecord; elapsedMs: number }
  | { verdict: 'window_exceeded'; record: CorrelationRecord; elapsedMs: number };

/**
 * Decide whether an edit may be propagated.
 * No record means the original was never forwarded. The window is inclusive.
 */
export function evaluateEdit(record: CorrelationRecord | undefined, editedAt: Date): EditDecision {
  if (!record) return { verdict: 'unknown' };

  const elapsedMs = editedAt.getTime() - record.sourceSentAt.getTime();
  if (elapsedMs > EDIT_WINDOW_MS) {
    return { verdict: 'window_exceeded', record, elapsedMs };
  }
  return { verdict: 'approved', record, elapsedMs };
}
