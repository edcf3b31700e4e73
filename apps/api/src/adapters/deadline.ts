// Bounds an adapter call by a timeout and an outer abort signal

export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

function abortError(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Aborted');
}

/**
 * Run `fn` with a signal that aborts when `parent` aborts or `timeoutMs`
 * elapses. Rejects at that moment even if `fn` ignores its signal.
 */
export async function withDeadline<T>(
  parent: AbortSignal | null,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  if (parent?.aborted) {
    throw abortError(parent);
  }

  const controller = new AbortController();
  const onParentAbort = () => {
    if (parent) {
      controller.abort(abortError(parent));
    }
  };
  parent?.addEventListener('abort', onParentAbort, { once: true });

  const timer = setTimeout(() => controller.abort(new TimeoutError(timeoutMs)), timeoutMs);

  let rejectAborted: (reason: Error) => void = () => undefined;
  const aborted = new Promise<never>((_, reject) => {
    rejectAborted = reject;
  });
  const onAbort = () => rejectAborted(abortError(controller.signal));
  controller.signal.addEventListener('abort', onAbort, { once: true });

  try {
    return await Promise.race([fn(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
    controller.signal.removeEventListener('abort', onAbort);
  }
}
