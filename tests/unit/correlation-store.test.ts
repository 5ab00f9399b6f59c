import { describe, it, expect, afterEach } from 'vitest';
import { join } from 'node:path';
import BetterSqlite3 from 'better-sqlite3';
import { Database } from '../../src/db/database.js';
import {
  InMemoryCorrelationStore,
  SQLiteCorrelationStore,
  type CorrelationStore,
} from '../../src/store/correlation-store.js';
import { DuplicateKeyError } from '../../src/bridge/errors.js';
import type { CorrelationRecord } from '../../src/bridge/types.js';
import { BOB, CAROL, CHAT, createTempDir } from '../helpers/test-fixtures.js';

const record: CorrelationRecord = {
  source: { chatId: CHAT, messageId: 10 },
  destination: 1000,
  sourceSentAt: new Date('2024-03-05T10:00:00.000Z'),
  sender: CAROL,
};

const stores: CorrelationStore[] = [];

afterEach(() => {
  for (const store of stores.splice(0)) store.close();
});

const factories: Array<[string, () => CorrelationStore]> = [
  ['SQLiteCorrelationStore', () => new SQLiteCorrelationStore(new Database(':memory:'))],
  ['InMemoryCorrelationStore', () => new InMemoryCorrelationStore()],
];

describe.each(factories)('%s', (_name, create) => {
  function open(): CorrelationStore {
    const store = create();
    stores.push(store);
    return store;
  }

  it('should return what was put', async () => {
    const store = open();
    await store.put(record);
    expect(await store.get({ chatId: CHAT, messageId: 10 })).toEqual(record);
  });

  it('should return undefined for an unknown key', async () => {
    const store = open();
    await store.put(record);
    expect(await store.get({ chatId: CHAT, messageId: 11 })).toBeUndefined();
    expect(await store.get({ chatId: '-1002', messageId: 10 })).toBeUndefined();
  });

  it('should keep the first record when a key is put twice', async () => {
    const store = open();
    await store.put(record);

    await expect(store.put({ ...record, destination: 2000, sender: BOB })).rejects.toBeInstanceOf(DuplicateKeyError);
    expect(await store.get(record.source)).toEqual(record);
  });

  it('should reject an identical record put twice', async () => {
    const store = open();
    await store.put(record);

    await expect(store.put(record)).rejects.toBeInstanceOf(DuplicateKeyError);
    expect(await store.get(record.source)).toEqual(record);
  });

  it('should round-trip a sender without optional fields', async () => {
    const store = open();
    const bare: CorrelationRecord = { ...record, source: { chatId: CHAT, messageId: 12 }, sender: BOB };
    await store.put(bare);
    expect(await store.get(bare.source)).toEqual(bare);
  });
});

describe('SQLiteCorrelationStore on disk', () => {
  it('should keep records across reopen', async () => {
    const path = join(createTempDir(), 'nested', 'bridge.db');

    const first = new SQLiteCorrelationStore(new Database(path));
    await first.put(record);
    first.close();

    const second = new SQLiteCorrelationStore(new Database(path));
    stores.push(second);
    expect(await second.get(record.source)).toEqual(record);
  });

  it('should migrate a fresh database to the latest schema', () => {
    const db = new Database(':memory:');
    expect(db.schemaVersion).toBe(1);
    expect(db.inMemory).toBe(true);
    db.close();
  });
});

describe('Database', () => {
  it('should use WAL on disk and leave a memory database alone', () => {
    const disk = new Database(join(createTempDir(), 'bridge.db'));
    const memory = new Database(':memory:');

    expect(disk.inMemory).toBe(false);
    expect(disk.journalMode).toBe('wal');
    expect(memory.journalMode).toBe('memory');

    disk.close();
    memory.close();
  });

  it('should refuse a database written by a newer schema', () => {
    const path = join(createTempDir(), 'bridge.db');
    const raw = new BetterSqlite3(path);
    raw.pragma('user_version = 5');
    raw.close();

    expect(() => new Database(path)).toThrow(`Database ${path} has schema version 5, newer than this bridge (1)`);
  });

  it('should close once and report it', () => {
    const db = new Database(':memory:');
    expect(db.isOpen).toBe(true);
    db.close();
    db.close();
    expect(db.isOpen).toBe(false);
  });

  it('should hand out statements on the migrated schema', () => {
    const db = new Database(':memory:');
    const row: unknown = db.prepare('SELECT count(*) AS n FROM correlations').get();
    expect(row).toEqual({ n: 0 });
    db.close();
  });
});
