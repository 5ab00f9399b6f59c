import { describe, it, expect } from 'vitest';
import { evaluateEdit, EDIT_WINDOW_MS } from '../../src/bridge/edit-policy.js';
import type { CorrelationRecord } from '../../src/bridge/types.js';
import { BOB, CHAT } from '../helpers/test-fixtures.js';

const record: CorrelationRecord = {
  source: { chatId: CHAT, messageId: 10 },
  destination: 1000,
  sourceSentAt: new Date('2024-03-05T10:00:00Z'),
  sender: BOB,
};

describe('evaluateEdit', () => {
  it('should report an edit of a message that was never forwarded', () => {
    expect(evaluateEdit(undefined, new Date('2024-03-05T10:01:00Z'))).toEqual({ verdict: 'unknown' });
  });

  it('should approve an edit inside the window', () => {
    const decision = evaluateEdit(record, new Date('2024-03-05T10:30:00Z'));
    expect(decision).toEqual({ verdict: 'approved', record, elapsedMs: 30 * 60_000 });
  });

  it('should approve an edit at exactly 60 minutes', () => {
    const decision = evaluateEdit(record, new Date('2024-03-05T11:00:00Z'));
    expect(decision.verdict).toBe('approved');
    expect(EDIT_WINDOW_MS).toBe(3_600_000);
  });

  it('should refuse an edit one second past the window', () => {
    const decision = evaluateEdit(record, new Date('2024-03-05T11:00:01Z'));
    expect(decision).toEqual({ verdict: 'window_exceeded', record, elapsedMs: 3_601_000 });
  });

  it('should approve an edit stamped before the original', () => {
    expect(evaluateEdit(record, new Date('2024-03-05T09:59:00Z')).verdict).toBe('approved');
  });
});
