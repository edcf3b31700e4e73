// Migration system for SQLite
import type { Database as DatabaseType } from 'better-sqlite3';

interface Migration {
  id: string;
  name: string;
  sql: string;
}

const migrations: Migration[] = [
  {
    id: '001_tasks',
    name: 'Pipeline task queue',
    sql: `
      CREATE TABLE IF NOT EXISTS tasks (
        id TEXT PRIMARY KEY,
        job_id TEXT NOT NULL,
        stage TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending',
        payload TEXT NOT NULL,
        attempts INTEGER NOT NULL DEFAULT 0,
        run_at TEXT NOT NULL,
        started_at TEXT,
        completed_at TEXT,
        error_message TEXT,
        dead_letter_at TEXT,
        dead_letter_reason TEXT,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX IF NOT EXISTS idx_tasks_claim ON tasks(status, run_at);
      CREATE INDEX IF NOT EXISTS idx_tasks_job_id ON tasks(job_id);
      CREATE INDEX IF NOT EXISTS idx_tasks_dead_letter ON tasks(dead_letter_at) WHERE dead_letter_at IS NOT NULL;
    `,
  },
  {
    id: '002_staging_entries',
    name: 'Key-value staging store with per-key expiry',
    sql: `
      CREATE TABLE IF NOT EXISTS staging_entries (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        expires_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_staging_entries_expires_at ON staging_entries(expires_at);
    `,
  },
];

export function migrate(db: DatabaseType): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const appliedMigrations = db.prepare('SELECT id FROM _migrations').all() as { id: string }[];
  const appliedIds = new Set(appliedMigrations.map(m => m.id));

  for (const migration of migrations) {
    if (appliedIds.has(migration.id)) {
      continue;
    }

    console.log(`[Migrate] Applying ${migration.id} - ${migration.name}`);

    const transaction = db.transaction(() => {
      db.exec(migration.sql);
      db.prepare('INSERT INTO _migrations (id, name) VALUES (?, ?)').run(migration.id, migration.name);
    });

    transaction();
  }
}
