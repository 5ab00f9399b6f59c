import type BetterSqlite3 from 'better-sqlite3';
import type { Database } from '../db/database.js';
import { DuplicateKeyError } from '../bridge/errors.js';
import type { CorrelationRecord, SourceMessageKey } from '../bridge/types.js';

/**
 * Durable Telegram → Zulip message correlations.
 * Append-only: records are never updated and never evicted.
 */
export interface CorrelationStore {
  /** Rejects with DuplicateKeyError when the source key is already recorded. */
  put(record: CorrelationRecord): Promise<void>;
  get(key: SourceMessageKey): Promise<CorrelationRecord | undefined>;
  close(): void;
}

export class SQLiteCorrelationStore implements CorrelationStore {
  private database: Database;
  private insert: BetterSqlite3.Statement;
  private select: BetterSqlite3.Statement;

  constructor(database: Database) {
    this.database = database;
    this.insert = database.prepare(`
      INSERT INTO correlations
        (chat_id, message_id, zulip_id, sent_at, sender_id, sender_handle, sender_first_name, sender_last_name)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT (chat_id, message_id) DO NOTHING
    `);
    this.select = database.prepare('SELECT * FROM correlations WHERE chat_id = ? AND message_id = ?');
  }

  async put(record: CorrelationRecord): Promise<void> {
    const { source, sender } = record;
    const result = this.insert.run(
      source.chatId,
      source.messageId,
      record.destination,
      record.sourceSentAt.toISOString(),
      sender.id,
      sender.handle ?? null,
      sender.firstName,
      sender.lastName ?? null,
    );
    if (result.changes === 0) throw new DuplicateKeyError(source);
  }

  async get(key: SourceMessageKey): Promise<CorrelationRecord | undefined> {
    const row = this.select.get(key.chatId, key.messageId);
    return isRawRow(row) ? mapRow(row) : undefined;
  }

  close(): void {
    this.database.close();
  }
}

export class InMemoryCorrelationStore implements CorrelationStore {
  private records = new Map<string, CorrelationRecord>();

  async put(record: CorrelationRecord): Promise<void> {
    const id = mapKey(record.source);
    if (this.records.has(id)) throw new DuplicateKeyError(record.source);
    this.records.set(id, structuredClone(record));
  }

  async get(key: SourceMessageKey): Promise<CorrelationRecord | undefined> {
    const record = this.records.get(mapKey(key));
    return record ? structuredClone(record) : undefined;
  }

  get size(): number {
    return this.records.size;
  }

  close(): void {
    this.records.clear();
  }
}

function mapKey(key: SourceMessageKey): string {
  return `${key.chatId}\u0000${key.messageId}`;
}

interface RawRow {
  chat_id: string;
  message_id: number;
  zulip_id: number;
  sent_at: string;
  sender_id: number;
  sender_handle: string | null;
  sender_first_name: string;
  sender_last_name: string | null;
}

function isRawRow(row: unknown): row is RawRow {
  return typeof row === 'object' && row !== null && 'zulip_id' in row && 'sent_at' in row;
}

function mapRow(r: RawRow): CorrelationRecord {
  return {
    source: { chatId: r.chat_id, messageId: r.message_id },
    destination: r.zulip_id,
    sourceSentAt: new Date(r.sent_at),
    sender: {
      id: r.sender_id,
      firstName: r.sender_first_name,
      ...(r.sender_handle !== null ? { handle: r.sender_handle } : {}),
      ...(r.sender_last_name !== null ? { lastName: r.sender_last_name } : {}),
    },
  };
}
