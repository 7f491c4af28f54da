import { describe, it, expect, vi } from 'vitest';
import { RetryingRequestExecutor } from '../../../src/application/services/RetryingRequestExecutor.js';
import type { RetryAttempt } from '../../../src/application/services/RetryingRequestExecutor.js';
import { ErrorKind } from '../../../src/domain/errors/GeocodingError.js';
import { httpError } from '../../fixtures/FakeGeocoder.js';

function noSleep(): Promise<void> {
  return Promise.resolve();
}

describe('RetryingRequestExecutor', () => {
  it('should return the first successful value', async () => {
    const executor = new RetryingRequestExecutor({}, { sleep: noSleep });
    const outcome = await executor.execute(() => Promise.resolve('done'));
    expect(outcome).toEqual({ success: true, value: 'done', attempts: 1 });
  });

  it('should back off exponentially between retries of a rate-limited request', async () => {
    const retries: RetryAttempt[] = [];
    const sleep = vi.fn(noSleep);
    const executor = new RetryingRequestExecutor(
      { retries: 5 },
      { random: () => 0, sleep, onRetry: (attempt) => retries.push(attempt) },
    );

    let calls = 0;
    const outcome = await executor.execute(() => {
      calls++;
      return calls <= 2 ? Promise.reject(httpError(429)) : Promise.resolve('ok');
    });

    expect(outcome).toEqual({ success: true, value: 'ok', attempts: 3 });
    expect(retries.map((r) => r.delayMs)).toEqual([1000, 2000]);
    expect(retries.map((r) => r.attempt)).toEqual([1, 2]);
    expect(retries[0]).toMatchObject({ maxAttempts: 6, errorKind: ErrorKind.TOO_MANY_REQUESTS });
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });

  it('should give up after the last attempt', async () => {
    const onRetry = vi.fn();
    const executor = new RetryingRequestExecutor({ retries: 2 }, { sleep: noSleep, onRetry });

    const outcome = await executor.execute(() => Promise.reject(httpError(503)));

    expect(outcome.success).toBe(false);
    expect(outcome.attempts).toBe(3);
    if (!outcome.success) expect(outcome.error.kind).toBe(ErrorKind.SERVER_ERROR);
    expect(onRetry).toHaveBeenCalledTimes(2);
  });

  it('should not retry non-retryable failures', async () => {
    const request = vi.fn(() => Promise.reject(httpError(401)));
    const executor = new RetryingRequestExecutor({}, { sleep: noSleep });

    const outcome = await executor.execute(request);

    expect(request).toHaveBeenCalledOnce();
    expect(outcome).toMatchObject({ success: false, attempts: 1 });
    if (!outcome.success) expect(outcome.error.kind).toBe(ErrorKind.NOT_AUTHORIZED);
  });

  it('should pass the attempt number to the request', async () => {
    const seen: number[] = [];
    const executor = new RetryingRequestExecutor({ retries: 1 }, { sleep: noSleep });

    await executor.execute((attempt) => {
      seen.push(attempt);
      return Promise.reject(httpError(500));
    });

    expect(seen).toEqual([1, 2]);
  });

  it('should apply jitter and cap the delay', () => {
    const executor = new RetryingRequestExecutor({ jitter: 0.1 }, { random: () => 0.5 });
    expect(executor.delayFor(1)).toBe(1050);
    expect(executor.delayFor(10)).toBe(60_000);
  });

  it('should stop retrying once the signal is aborted', async () => {
    const controller = new AbortController();
    const request = vi.fn(() => Promise.reject(httpError(429)));
    const executor = new RetryingRequestExecutor(
      { retries: 5 },
      {
        signal: controller.signal,
        sleep: () => {
          controller.abort();
          return Promise.resolve();
        },
      },
    );

    const outcome = await executor.execute(request);

    expect(request).toHaveBeenCalledOnce();
    expect(outcome).toMatchObject({ success: false, attempts: 1 });
  });

  it('should cut the default backoff short when the signal aborts', async () => {
    const controller = new AbortController();
    const request = vi.fn(() => Promise.reject(httpError(503)));
    const executor = new RetryingRequestExecutor(
      { retries: 5, baseDelayMs: 60_000, jitter: 0 },
      { signal: controller.signal, onRetry: () => setTimeout(() => controller.abort(), 10) },
    );

    const started = Date.now();
    const outcome = await executor.execute(request);

    expect(Date.now() - started).toBeLessThan(1000);
    expect(request).toHaveBeenCalledOnce();
    expect(outcome).toMatchObject({ success: false, attempts: 1 });
  });
});

