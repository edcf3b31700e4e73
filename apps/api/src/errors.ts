// Error taxonomy for pipeline stages and the review workflow

import type { ErrorKind, TaskStage } from '@session-scribe/shared';

export class ScribeError extends Error {
  readonly kind: ErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: ErrorKind, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ScribeError';
    this.kind = kind;
    this.details = details;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalize anything thrown into a ScribeError, keeping the kind of an
 * already classified error.
 */
export function toScribeError(error: unknown, fallback: ErrorKind = 'unexpected'): ScribeError {
  if (error instanceof ScribeError) {
    return error;
  }
  return new ScribeError(fallback, errorMessage(error), {
    cause: error instanceof Error ? error.name : typeof error,
  });
}

/**
 * Run an adapter call and classify whatever it throws as `kind`.
 */
export async function attempt<T>(kind: ErrorKind, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw toScribeError(err, kind);
  }
}

export const NOT_FOUND_MESSAGE = 'Report not found.';
export const GENERIC_FAILURE_MESSAGE = 'An error occurred while processing your audio file.';

/**
 * The single chat message reported when a job ends in failure.
 */
export function userMessageFor(kind: ErrorKind, stage: TaskStage): string {
  switch (kind) {
    case 'transport_failure':
      return stage === 'fetch' ? 'Failed to download audio.' : 'Failed to deliver report.';
    case 'no_audio_stream':
    case 'transcode_failure':
      return 'Failed to compress audio.';
    case 'transcription_failure':
      return 'Failed to transcribe audio.';
    case 'generation_failure':
      return 'Failed to generate report.';
    case 'not_found':
      return NOT_FOUND_MESSAGE;
    case 'unexpected':
      return GENERIC_FAILURE_MESSAGE;
  }
}
