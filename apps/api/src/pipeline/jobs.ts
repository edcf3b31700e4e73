// Job lifecycle outside the stage workers - creation and restart recovery

import { v4 as uuidv4 } from 'uuid';
import type { ChatGateway } from '../chat/types.js';
import { GENERIC_FAILURE_MESSAGE } from '../errors.js';
import type { TaskQueue } from '../queue/manager.js';
import type { Task } from '../queue/types.js';
import { sweepDownloads } from './files.js';

/**
 * Accept an uploaded file: create the job and queue its first stage.
 */
export function startJob(queue: TaskQueue, input: { chatId: string; remoteRef: string }): Task {
  const jobId = uuidv4();
  const task = queue.enqueue('fetch', { jobId, chatId: input.chatId, remoteRef: input.remoteRef });
  console.log(`[Jobs] Created job ${jobId} for chat ${input.chatId} (task ${task.id})`);
  return task;
}

/**
 * Tasks never survive a restart. Whatever was queued or running when the
 * previous process stopped is removed, every leftover download deleted and
 * each affected chat told its job failed.
 */
export async function recoverInterruptedJobs(
  queue: TaskQueue,
  gateway: ChatGateway,
  downloadsDir: string
): Promise<number> {
  const unfinished = queue.drainForRecovery();
  const removedFiles = await sweepDownloads(downloadsDir);
  if (removedFiles > 0) {
    console.log(`[Jobs] Removed ${removedFiles} leftover file(s) from ${downloadsDir}`);
  }

  const seen = new Set<string>();

  for (const task of unfinished) {
    if (seen.has(task.jobId)) {
      continue;
    }
    seen.add(task.jobId);

    try {
      await gateway.sendMessage(task.payload.chatId, GENERIC_FAILURE_MESSAGE);
    } catch (err) {
      console.error(`[Jobs] Could not notify chat ${task.payload.chatId} about interrupted job ${task.jobId}:`, err);
    }
  }

  if (seen.size > 0) {
    console.log(`[Jobs] Recovered ${seen.size} interrupted job(s)`);
  }
  return seen.size;
}
