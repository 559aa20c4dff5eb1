export class TimeoutError extends Error {
  constructor(public timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Runs `task` with an AbortSignal that fires after `timeoutMs` or when
 * `parent` aborts, whichever comes first.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  let timer: ReturnType<typeof setTimeout> | null = null;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new TimeoutError(timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    if (timer) clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}

export interface RetryOptions {
  timeoutMs: number;
  /** Extra attempts after the first. */
  maxRetries: number;
  signal?: AbortSignal;
  onRetry?: (error: unknown, attempt: number) => void;
}

/**
 * Runs `task` under `withTimeout`, retrying up to `maxRetries` times on
 * failure. Throws the last error once attempts run out. An abort is
 * rethrown at once.
 */
export async function callWithRetry<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const attempts = Math.max(0, Math.floor(options.maxRetries)) + 1;
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    options.signal?.throwIfAborted();
    try {
      return await withTimeout(task, options.timeoutMs, options.signal);
    } catch (err) {
      if (options.signal?.aborted) {
        throw err;
      }
      lastError = err;
      if (attempt < attempts) {
        options.onRetry?.(err, attempt);
      }
    }
  }

  throw lastError;
}

/**
 * Settles with `promise`, or rejects with the abort reason as soon as
 * `signal` fires. The underlying work is left running.
 */
export async function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  signal.throwIfAborted();

  let rejectAbort: ((reason: unknown) => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    rejectAbort = reject;
  });
  const onAbort = (): void => rejectAbort?.(signal.reason);
  signal.addEventListener("abort", onAbort, { once: true });

  try {
    return await Promise.race([promise, aborted]);
  } finally {
    signal.removeEventListener("abort", onAbort);
  }
}
