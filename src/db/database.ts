/**
 * Database: the bridge's SQLite file. Applies numbered migrations on open and
 * hands out prepared statements; nothing outside this class touches the handle.
 * Use ':memory:' as the path for a throwaway database.
 */

import BetterSqlite3 from 'better-sqlite3';
import type BetterSqlite3Type from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { migrations } from './migrations.js';
import * as log from '../utils/logger.js';

const MEMORY = ':memory:';

export class Database {
  readonly path: string;
  private readonly db: BetterSqlite3Type.Database;

  constructor(dbPath: string) {
    this.path = dbPath;
    if (!this.inMemory) mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new BetterSqlite3(dbPath);
    // WAL keeps `lookup` readable while `run` writes; it has no meaning in memory
    try {
      if (!this.inMemory) this.db.pragma('journal_mode = WAL');
      this.applyMigrations();
    } catch (err) {
      this.db.close();
      throw err;
    }
    log.debug(`Database: opened ${dbPath} at schema version ${this.schemaVersion}`);
  }

  get inMemory(): boolean {
    return this.path === MEMORY;
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  get schemaVersion(): number {
    const version: unknown = this.db.pragma('user_version', { simple: true });
    return typeof version === 'number' ? version : 0;
  }

  get journalMode(): string {
    const mode: unknown = this.db.pragma('journal_mode', { simple: true });
    return String(mode);
  }

  prepare(sql: string): BetterSqlite3Type.Statement {
    return this.db.prepare(sql);
  }

  private applyMigrations(): void {
    const from = this.schemaVersion;
    if (from > migrations.length) {
      throw new Error(`Database ${this.path} has schema version ${from}, newer than this bridge (${migrations.length})`);
    }
    if (from === migrations.length) return;

    // All pending steps land together or not at all
    this.db.transaction(() => {
      for (let i = from; i < migrations.length; i++) {
        this.db.exec(migrations[i]);
      }
      this.db.pragma(`user_version = ${migrations.length}`);
    })();
    log.info(`Database: migrated ${this.path} from version ${from} to ${migrations.length}`);
  }

  close(): void {
    if (this.db.open) this.db.close();
  }
}
