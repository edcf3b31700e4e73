// Task queue backed by SQLite, with atomic claiming and a dead letter list

import type { Database as DatabaseType } from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type { QueueStats } from '@session-scribe/shared';
import { JobContextSchema, type JobContext, type Task, type TaskStage, type TaskStatus } from './types.js';

interface TaskRow {
  id: string;
  job_id: string;
  stage: TaskStage;
  status: TaskStatus;
  payload: string;
  attempts: number;
  run_at: string;
  started_at: string | null;
  completed_at: string | null;
  error_message: string | null;
  dead_letter_at: string | null;
  dead_letter_reason: string | null;
  created_at: string;
  updated_at: string;
}

export type DeadLetterTask = Task & { deadLetterAt: Date; deadLetterReason: string };

function rowToTask(row: TaskRow): Task {
  return {
    id: row.id,
    jobId: row.job_id,
    stage: row.stage,
    status: row.status,
    payload: JobContextSchema.parse(JSON.parse(row.payload)),
    attempts: row.attempts,
    runAt: new Date(`${row.run_at}Z`),
    startedAt: row.started_at ? new Date(`${row.started_at}Z`) : null,
    completedAt: row.completed_at ? new Date(`${row.completed_at}Z`) : null,
    errorMessage: row.error_message,
    createdAt: new Date(`${row.created_at}Z`),
    updatedAt: new Date(`${row.updated_at}Z`),
  };
}

/**
 * Format a date to SQLite datetime string (YYYY-MM-DD HH:MM:SS)
 */
function toSQLiteDateTime(date: Date): string {
  return date.toISOString().replace('T', ' ').replace(/\.\d{3}Z$/, '');
}

export class TaskQueue {
  constructor(private readonly db: DatabaseType) {}

  /**
   * Enqueue a task for one stage of a job.
   */
  enqueue(stage: TaskStage, context: JobContext, options: { runAt?: Date } = {}): Task {
    const id = uuidv4();
    const nowStr = toSQLiteDateTime(new Date());
    const runAt = options.runAt ? toSQLiteDateTime(options.runAt) : nowStr;

    this.db.prepare(`
      INSERT INTO tasks (id, job_id, stage, status, payload, attempts, run_at, created_at, updated_at)
      VALUES (?, ?, ?, 'pending', ?, 0, ?, ?, ?)
    `).run(id, context.jobId, stage, JSON.stringify(context), runAt, nowStr, nowStr);

    const task = this.getTask(id);
    if (!task) {
      throw new Error(`Task ${id} vanished after insert`);
    }
    return task;
  }

  /**
   * Atomically claim the next runnable task.
   * A task whose payload no longer parses is discarded and skipped.
   */
  claim(): Task | null {
    const transaction = this.db.transaction((): TaskRow | null => {
      const row = this.db.prepare(`
        SELECT * FROM tasks
        WHERE status = 'pending'
          AND run_at <= datetime('now')
        ORDER BY run_at ASC, created_at ASC, rowid ASC
        LIMIT 1
      `).get() as TaskRow | undefined;

      if (!row) {
        return null;
      }

      const nowStr = toSQLiteDateTime(new Date());
      const result = this.db.prepare(`
        UPDATE tasks
        SET status = 'running',
            started_at = ?,
            attempts = attempts + 1,
            updated_at = ?
        WHERE id = ?
          AND status = 'pending'
      `).run(nowStr, nowStr, row.id);

      // Another runner got there first
      if (result.changes === 0) {
        return null;
      }

      return this.db.prepare('SELECT * FROM tasks WHERE id = ?').get(row.id) as TaskRow;
    });

    const row = transaction();
    if (!row) {
      return null;
    }

    const parsed = JobContextSchema.safeParse(safeJson(row.payload));
    if (!parsed.success) {
      // Without a readable context there is no chat to notify and nothing to resubmit
      console.error(`[TaskQueue] Discarding task ${row.id} with invalid payload: ${parsed.error.message}`);
      this.db.prepare('DELETE FROM tasks WHERE id = ?').run(row.id);
      return this.claim();
    }

    return rowToTask(row);
  }

  complete(taskId: string): void {
    const now = toSQLiteDateTime(new Date());

    this.db.prepare(`
      UPDATE tasks
      SET status = 'completed',
          completed_at = ?,
          error_message = NULL,
          updated_at = ?
      WHERE id = ?
    `).run(now, now, taskId);
  }

  /**
   * Mark a task as failed and move it to the dead letter list.
   * Stages are never retried automatically.
   */
  fail(taskId: string, error: string): void {
    const now = toSQLiteDateTime(new Date());

    const result = this.db.prepare(`
      UPDATE tasks
      SET status = 'failed',
          error_message = ?,
          completed_at = ?,
          dead_letter_at = ?,
          dead_letter_reason = 'Stage failed',
          updated_at = ?
      WHERE id = ?
    `).run(error, now, now, now, taskId);

    if (result.changes === 0) {
      throw new Error(`Task ${taskId} not found`);
    }
  }

  getTask(taskId: string): Task | null {
    const row = this.db.prepare('SELECT * FROM tasks WHERE id = ?').get(taskId) as TaskRow | undefined;
    return row ? rowToTask(row) : null;
  }

  getTasksByJob(jobId: string): Task[] {
    const rows = this.db.prepare(
      'SELECT * FROM tasks WHERE job_id = ? ORDER BY created_at ASC, rowid ASC'
    ).all(jobId) as TaskRow[];
    return rows.map(rowToTask);
  }

  getStats(): QueueStats {
    const result = this.db.prepare(`
      SELECT
        SUM(CASE WHEN status = 'pending' THEN 1 ELSE 0 END) as pending,
        SUM(CASE WHEN status = 'running' THEN 1 ELSE 0 END) as running,
        SUM(CASE WHEN status = 'completed' THEN 1 ELSE 0 END) as completed,
        SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) as failed,
        SUM(CASE WHEN dead_letter_at IS NOT NULL THEN 1 ELSE 0 END) as dead_letter
      FROM tasks
    `).get() as {
      pending: number | null;
      running: number | null;
      completed: number | null;
      failed: number | null;
      dead_letter: number | null;
    };

    return {
      pending: result.pending || 0,
      running: result.running || 0,
      completed: result.completed || 0,
      failed: result.failed || 0,
      deadLetter: result.dead_letter || 0,
    };
  }

  getDeadLetter(limit: number = 50, offset: number = 0): DeadLetterTask[] {
    const rows = this.db.prepare(`
      SELECT * FROM tasks
      WHERE dead_letter_at IS NOT NULL
      ORDER BY dead_letter_at DESC, rowid DESC
      LIMIT ? OFFSET ?
    `).all(limit, offset) as TaskRow[];

    return rows.map(row => ({
      ...rowToTask(row),
      deadLetterAt: new Date(`${row.dead_letter_at ?? row.updated_at}Z`),
      deadLetterReason: row.dead_letter_reason ?? '',
    }));
  }

  /**
   * Re-submit a dead-lettered task as a brand new job starting from the
   * fetch stage. The old task leaves the dead letter list.
   */
  resubmit(taskId: string, newJobId: string = uuidv4()): { success: true; task: Task } | { success: false; error: string } {
    const original = this.getTask(taskId);

    if (!original) {
      return { success: false, error: 'Task not found' };
    }

    const row = this.db.prepare('SELECT dead_letter_at FROM tasks WHERE id = ?').get(taskId) as
      | { dead_letter_at: string | null }
      | undefined;

    if (!row?.dead_letter_at) {
      return { success: false, error: 'Task is not in dead letter list' };
    }

    const transaction = this.db.transaction(() => {
      const now = toSQLiteDateTime(new Date());
      this.db.prepare(`
        UPDATE tasks
        SET dead_letter_at = NULL,
            dead_letter_reason = ?,
            updated_at = ?
        WHERE id = ?
      `).run(`Resubmitted as job ${newJobId}`, now, taskId);

      return this.enqueue('fetch', {
        jobId: newJobId,
        chatId: original.payload.chatId,
        remoteRef: original.payload.remoteRef,
      });
    });

    return { success: true, task: transaction() };
  }

  /**
   * Remove every task row and hand back the ones that never finished.
   * Run at startup: tasks do not outlive the process that created them.
   */
  drainForRecovery(): Task[] {
    const transaction = this.db.transaction(() => {
      const rows = this.db.prepare(`
        SELECT * FROM tasks WHERE status IN ('pending', 'running')
        ORDER BY created_at ASC, rowid ASC
      `).all() as TaskRow[];
      this.db.prepare('DELETE FROM tasks').run();
      return rows;
    });

    const unfinished: Task[] = [];
    for (const row of transaction()) {
      if (JobContextSchema.safeParse(safeJson(row.payload)).success) {
        unfinished.push(rowToTask(row));
      } else {
        console.warn(`[TaskQueue] Dropping task ${row.id} with unreadable payload`);
      }
    }
    return unfinished;
  }

  /**
   * Delete finished tasks (completed, or failed and no longer dead-lettered)
   * older than the given age.
   */
  pruneFinished(olderThanMs: number): number {
    const cutoff = toSQLiteDateTime(new Date(Date.now() - olderThanMs));
    const result = this.db.prepare(`
      DELETE FROM tasks
      WHERE updated_at < ?
        AND (status = 'completed' OR (status = 'failed' AND dead_letter_at IS NULL))
    `).run(cutoff);
    return result.changes;
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
