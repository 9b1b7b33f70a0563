/**
 * Async utilities
 */

/**
 * Rejection reason used by {@link withTimeout}, so callers can tell an
 * expired deadline apart from a failure of the raced promise.
 */
export class TimeoutError extends Error {
  readonly timeout: number;

  constructor(timeout: number, message?: string) {
    super(message ?? `Timeout after ${timeout}ms`);
    this.name = 'TimeoutError';
    this.timeout = timeout;
  }
}

/**
 * Race a promise against a timeout. The timer is cleared as soon as either
 * side settles so it never keeps the process alive.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  message?: string,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(ms, message)), ms);
  });

  try {
    return await Promise.race([promise, expired]);
  } finally {
    clearTimeout(timer);
  }
}
