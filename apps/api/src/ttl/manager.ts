// Housekeeping - expired staging entries and old task rows

import type { TaskQueue } from '../queue/manager.js';
import type { StagingStore } from '../staging/types.js';

// Finished task rows are kept this long for the admin API
export const FINISHED_TASK_RETENTION_MS = 24 * 60 * 60 * 1000;

export interface CleanupResult {
  stagingEntriesPurged: number;
  tasksPruned: number;
}

export interface CleanupTargets {
  staging: StagingStore;
  queue: TaskQueue;
}

/**
 * Expired entries are already invisible to readers; this reclaims their rows.
 */
export function runCleanup({ staging, queue }: CleanupTargets): CleanupResult {
  const stagingEntriesPurged = staging.purgeExpired();
  const tasksPruned = queue.pruneFinished(FINISHED_TASK_RETENTION_MS);

  if (stagingEntriesPurged > 0 || tasksPruned > 0) {
    console.log(`[TTLManager] Purged ${stagingEntriesPurged} staging entries, pruned ${tasksPruned} tasks`);
  }

  return { stagingEntriesPurged, tasksPruned };
}

/**
 * Run cleanup now and then every `intervalMs`.
 */
export function scheduleCleanup(targets: CleanupTargets, intervalMs: number): NodeJS.Timeout {
  console.log(`[TTLManager] Scheduled cleanup every ${Math.round(intervalMs / 60000)} minutes`);

  const safeRun = () => {
    try {
      runCleanup(targets);
    } catch (err) {
      console.error('[TTLManager] Cleanup failed:', err);
    }
  };

  safeRun();
  return setInterval(safeRun, intervalMs);
}
