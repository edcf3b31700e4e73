// Shared types for the task queue and pipeline workers

import { z } from 'zod';
import type { TaskStage, TaskStatus } from '@session-scribe/shared';

export type { TaskStage, TaskStatus };

/**
 * Everything a job carries from one stage to the next.
 * Fields are filled in as stages complete.
 */
export const JobContextSchema = z.object({
  jobId: z.string().min(1),
  chatId: z.string().min(1),
  remoteRef: z.string().min(1),
  rawPath: z.string().optional(),
  normalizedPath: z.string().optional(),
  transcript: z.string().optional(),
  note: z.string().optional(),
});

export type JobContext = z.infer<typeof JobContextSchema>;

export interface Task {
  id: string;
  jobId: string;
  stage: TaskStage;
  status: TaskStatus;
  payload: JobContext;
  attempts: number;
  runAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  errorMessage: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type TaskResult = {
  success: true;
  data?: Record<string, unknown>;
} | {
  success: false;
  error: string;
};

export interface Worker {
  stage: TaskStage;
  process(task: Task, signal: AbortSignal): Promise<TaskResult>;
}
