/**
 * Retry controller
 * Bounded sequential attempts with a fixed delay between them
 */

import { FetchFailure } from './crawling.errors';

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY = 5000;

export type AttemptResult<T> = { ok: true; value: T } | { ok: false; failure: FetchFailure };

export interface RetryOptions {
  maxAttempts?: number;
  retryDelay?: number;
  /**
   * Stops further attempts; the pending delay resolves early
   */
  signal?: AbortSignal;
  onFailure?: (failure: FetchFailure, attempt: number, maxAttempts: number) => void;
}

/**
 * Wait for `ms`, resolving early if the signal aborts
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) {
    return Promise.resolve();
  }

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `attempt` until it succeeds or attempts run out.
 * Every failure reason is retried the same way; exhaustion yields null.
 */
export async function attemptWithRetry<T>(
  attempt: (attemptNumber: number) => Promise<AttemptResult<T>>,
  options: RetryOptions = {}
): Promise<T | null> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const retryDelay = options.retryDelay ?? DEFAULT_RETRY_DELAY;

  for (let attemptNumber = 1; attemptNumber <= maxAttempts; attemptNumber++) {
    if (options.signal?.aborted) {
      return null;
    }

    const result = await attempt(attemptNumber);
    if (result.ok) {
      return result.value;
    }

    options.onFailure?.(result.failure, attemptNumber, maxAttempts);

    if (attemptNumber < maxAttempts) {
      await delay(retryDelay, options.signal);
    }
  }

  return null;
}
