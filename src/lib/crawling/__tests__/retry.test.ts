/**
 * Retry Controller Tests
 */

import { FetchFailure, FetchFailureReason } from '../crawling.errors';
import { AttemptResult, attemptWithRetry, delay } from '../retry';

const badStatus: FetchFailure = { reason: FetchFailureReason.BAD_STATUS, status: 500 };
const timeout: FetchFailure = { reason: FetchFailureReason.TIMEOUT, detail: 'slow' };

describe('attemptWithRetry', () => {
  it('should return immediately on the first success', async () => {
    const attempt = jest.fn(async (): Promise<AttemptResult<string>> => ({ ok: true, value: 'page' }));

    await expect(attemptWithRetry(attempt, { retryDelay: 0 })).resolves.toBe('page');
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it('should retry failures until an attempt succeeds', async () => {
    const results: AttemptResult<string>[] = [
      { ok: false, failure: timeout },
      { ok: false, failure: badStatus },
      { ok: true, value: 'third time' },
    ];
    const attempt = jest.fn(async (n: number) => results[n - 1]);

    await expect(attemptWithRetry(attempt, { maxAttempts: 3, retryDelay: 0 })).resolves.toBe('third time');
    expect(attempt.mock.calls.map(([n]) => n)).toEqual([1, 2, 3]);
  });

  it('should return null after exhausting every attempt', async () => {
    const attempt = jest.fn(async (): Promise<AttemptResult<string>> => ({ ok: false, failure: badStatus }));
    const onFailure = jest.fn();

    await expect(attemptWithRetry(attempt, { maxAttempts: 3, retryDelay: 0, onFailure })).resolves.toBeNull();
    expect(attempt).toHaveBeenCalledTimes(3);
    expect(onFailure.mock.calls).toEqual([
      [badStatus, 1, 3],
      [badStatus, 2, 3],
      [badStatus, 3, 3],
    ]);
  });

  it('should wait between attempts but not after the last one', async () => {
    jest.useFakeTimers();
    try {
      const attempt = jest.fn(async (): Promise<AttemptResult<string>> => ({ ok: false, failure: timeout }));
      const pending = attemptWithRetry(attempt, { maxAttempts: 2, retryDelay: 5000 });

      await jest.advanceTimersByTimeAsync(0);
      expect(attempt).toHaveBeenCalledTimes(1);

      await jest.advanceTimersByTimeAsync(4999);
      expect(attempt).toHaveBeenCalledTimes(1);

      await jest.advanceTimersByTimeAsync(1);
      await expect(pending).resolves.toBeNull();

      expect(attempt).toHaveBeenCalledTimes(2);
      expect(jest.getTimerCount()).toBe(0);
    } finally {
      jest.useRealTimers();
    }
  });

  it('should stop attempting once aborted', async () => {
    const controller = new AbortController();
    const attempt = jest.fn(async (): Promise<AttemptResult<string>> => {
      controller.abort();
      return { ok: false, failure: timeout };
    });

    await expect(
      attemptWithRetry(attempt, { maxAttempts: 3, retryDelay: 60000, signal: controller.signal })
    ).resolves.toBeNull();
    expect(attempt).toHaveBeenCalledTimes(1);
  });
});

describe('delay', () => {
  it('should resolve early when the signal aborts', async () => {
    const controller = new AbortController();
    const pending = delay(60000, controller.signal);
    controller.abort();

    await expect(pending).resolves.toBeUndefined();
  });

  it('should resolve immediately for non-positive durations', async () => {
    await expect(delay(0)).resolves.toBeUndefined();
  });
});
