import Database from 'better-sqlite3';
import type { Database as DatabaseType } from 'better-sqlite3';
import path from 'path';
import fs from 'fs';

/**
 * Open the service database. Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string): DatabaseType {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  // WAL mode lets the webhook handler read while workers write
  const db: DatabaseType = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  console.log(`[Database] Connected: ${dbPath}`);
  return db;
}
