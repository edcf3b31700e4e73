// Job-private temporary files

import fs from 'fs';
import path from 'path';
import type { JobContext } from '../queue/types.js';

const SAFE_EXTENSION = /^[a-z0-9]{1,8}$/;

export function rawFilePath(downloadsDir: string, jobId: string, extension: string | null): string {
  const ext = extension && SAFE_EXTENSION.test(extension) ? extension : 'bin';
  return path.join(downloadsDir, `${jobId}.${ext}`);
}

export function normalizedFilePath(downloadsDir: string, jobId: string): string {
  return path.join(downloadsDir, `${jobId}.normalized.mp3`);
}

/**
 * Delete a file; a file that does not exist is not an error.
 */
export async function removeIfExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.unlink(filePath);
    return true;
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return false;
    }
    throw err;
  }
}

/**
 * Remove every temporary file a job created. Never throws: failures are
 * logged and reported back.
 */
export async function cleanupJobFiles(context: JobContext): Promise<{ deleted: string[]; errors: string[] }> {
  const deleted: string[] = [];
  const errors: string[] = [];

  for (const filePath of [context.rawPath, context.normalizedPath]) {
    if (!filePath) {
      continue;
    }
    try {
      if (await removeIfExists(filePath)) {
        deleted.push(filePath);
      }
    } catch (err) {
      errors.push(`Failed to delete ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  if (errors.length > 0) {
    console.error(`[Cleanup] Job ${context.jobId}:`, errors);
  }
  return { deleted, errors };
}

/**
 * Delete every file left in the downloads directory. Only safe while no
 * job is running, i.e. at startup.
 */
export async function sweepDownloads(downloadsDir: string): Promise<number> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(downloadsDir, { withFileTypes: true });
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return 0;
    }
    throw err;
  }

  let removed = 0;
  for (const entry of entries) {
    if (entry.isFile() && await removeIfExists(path.join(downloadsDir, entry.name))) {
      removed++;
    }
  }
  return removed;
}
