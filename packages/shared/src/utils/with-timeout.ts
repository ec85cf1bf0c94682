/**
 * TimeoutError
 *
 * Raised by withTimeout when the deadline passes before the task settles.
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Run a cancellable task under a deadline.
 *
 * The task receives its own AbortSignal, which is aborted when the deadline
 * passes or the parent signal aborts. The returned promise settles as soon as
 * either happens, without waiting for the task to notice.
 *
 * @param task - Work to run; should forward the signal to its I/O
 * @param timeoutMs - Deadline in milliseconds; 0 or less disables it
 * @param parentSignal - Caller's cancellation signal
 * @throws {TimeoutError} When the deadline passes first
 * @throws The parent signal's reason when the caller aborts first
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parentSignal?: AbortSignal,
): Promise<T> {
  parentSignal?.throwIfAborted();

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        const error = new TimeoutError(timeoutMs);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    }

    if (parentSignal) {
      onParentAbort = () => {
        controller.abort(parentSignal.reason);
        reject(parentSignal.reason);
      };
      parentSignal.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([task(controller.signal), guard]);
  } finally {
    clearTimeout(timer);
    if (parentSignal && onParentAbort) {
      parentSignal.removeEventListener('abort', onParentAbort);
    }
  }
}
