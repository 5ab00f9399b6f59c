/**
 * Database migrations: numbered SQL statements applied in order.
 * Each migration runs once; applied version tracked in the `user_version` pragma.
 */

export const migrations: string[] = [
  // Migration 1: Telegram message → Zulip message correlations
  `
  CREATE TABLE IF NOT EXISTS correlations (
    chat_id TEXT NOT NULL,
    message_id INTEGER NOT NULL,
    zulip_id INTEGER NOT NULL,
    sent_at TEXT NOT NULL,
    sender_id INTEGER NOT NULL,
    sender_handle TEXT,
    sender_first_name TEXT NOT NULL,
    sender_last_name TEXT,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    PRIMARY KEY (chat_id, message_id)
  ) WITHOUT ROWID;
  `,
];
