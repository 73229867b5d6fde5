/**
 * Async utilities for sleeping and retrying
 */

export interface RetryOptions {
  maxAttempts?: number;
  delayMs?: number;
  backoff?: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Sleep for `ms`, resolving early (never rejecting) when the signal aborts
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted || ms <= 0) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export async function retry<T>(
  fn: () => Promise<T>,
  { maxAttempts = 3, delayMs = 1000, backoff = 2, maxDelayMs = 30_000, shouldRetry = () => true }: RetryOptions = {},
  wait: Sleep = sleep,
): Promise<T> {
  let last: unknown;
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      last = err;
      if (attempt === maxAttempts || !shouldRetry(err)) break;
      await wait(Math.min(delayMs * Math.pow(backoff, attempt - 1), maxDelayMs));
    }
  }
  throw last instanceof Error ? last : new Error(String(last));
}
