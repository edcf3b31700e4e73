// SQLite-backed staging store sharing the service database

import type { Database as DatabaseType, Statement } from 'better-sqlite3';
import { systemClock, type Clock, type StagingStore } from './types.js';

export class SqliteStagingStore implements StagingStore {
  private readonly putStmt: Statement<[string, string, number]>;
  private readonly getStmt: Statement<[string, number], { value: string }>;
  private readonly deleteStmt: Statement<[string]>;
  private readonly purgeStmt: Statement<[number]>;

  constructor(db: DatabaseType, private readonly clock: Clock = systemClock) {
    this.putStmt = db.prepare<[string, string, number]>(`
      INSERT INTO staging_entries (key, value, expires_at)
      VALUES (?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET value = excluded.value, expires_at = excluded.expires_at
    `);
    this.getStmt = db.prepare<[string, number], { value: string }>('SELECT value FROM staging_entries WHERE key = ? AND expires_at > ?');
    this.deleteStmt = db.prepare<[string]>('DELETE FROM staging_entries WHERE key = ?');
    this.purgeStmt = db.prepare<[number]>('DELETE FROM staging_entries WHERE expires_at <= ?');
  }

  put(key: string, value: string, ttlMs: number): void {
    if (ttlMs <= 0) {
      throw new RangeError(`TTL must be positive, got ${ttlMs}`);
    }
    this.putStmt.run(key, value, this.clock() + ttlMs);
  }

  get(key: string): string | null {
    const row = this.getStmt.get(key, this.clock());
    return row ? row.value : null;
  }

  delete(key: string): void {
    this.deleteStmt.run(key);
  }

  purgeExpired(): number {
    return this.purgeStmt.run(this.clock()).changes;
  }
}
