import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { getRetryExhaustedError } from '../error/retryExhaustedError.js';
import { getRetrySuppressedError } from '../error/retrySuppressedError.js';
import { retry } from './retry.js';
import type { SafeWrapAsync } from './wrap.js';

describe('retry', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test('returns data from the first successful attempt', async () => {
    const fn = vi.fn<() => SafeWrapAsync<Error, string>>().mockResolvedValueOnce([null, 'ok']);

    const [err, data] = await retry({ fn, attempts: 3, timeout: 100 });

    expect(err).toBeNull();
    expect(data).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('waits between attempts until one succeeds', async () => {
    const error = new Error('temporary error');
    const fn = vi
      .fn<() => SafeWrapAsync<Error, string>>()
      .mockResolvedValueOnce([error, null])
      .mockResolvedValueOnce([error, null])
      .mockResolvedValueOnce([null, 'ok']);

    const promise = retry({ fn, attempts: 3, timeout: 100 });

    await vi.advanceTimersByTimeAsync(0);
    expect(fn).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(100);
    expect(fn).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(100);
    expect(fn).toHaveBeenCalledTimes(3);

    const [err, data] = await promise;
    expect(err).toBeNull();
    expect(data).toBe('ok');
  });

  test('stops when errFn gives up and keeps the failure as cause', async () => {
    const fatal = new Error('fatal');
    const fn = vi.fn<() => SafeWrapAsync<Error, string>>().mockResolvedValue([fatal, null]);
    const errFn = vi.fn<(e: Error) => boolean>().mockReturnValue(true);

    const [err, data] = await retry({ fn, attempts: 5, timeout: 100, errFn });

    expect(data).toBeNull();
    expect(err?.message).toBe('error further retries suppressed');
    expect(err?.cause).toBe(fatal);
    expect(getRetrySuppressedError(err)?.attempts).toBe(1);
    expect(errFn).toHaveBeenCalledWith(fatal);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('gives up after the initial attempt plus the retries', async () => {
    const error = new Error('still failing');
    const fn = vi.fn<() => SafeWrapAsync<Error, string>>().mockResolvedValue([error, null]);
    const onRetry = vi.fn<(e: Error, attempt: number) => void>();

    const promise = retry({ fn, attempts: 2, timeout: 50, onRetry });
    await vi.advanceTimersByTimeAsync(100);

    const [err, data] = await promise;
    expect(data).toBeNull();
    expect(err?.message).toBe('error retries exhausted');
    expect(getRetryExhaustedError(err)?.attempts).toBe(3);
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry.mock.calls).toStrictEqual([
      [error, 1],
      [error, 2],
    ]);
  });

  test('tries once with zero attempts', async () => {
    const fn = vi.fn<() => SafeWrapAsync<Error, string>>().mockResolvedValue([new Error('nope'), null]);

    const [err] = await retry({ fn, attempts: 0 });

    expect(getRetryExhaustedError(err)?.attempts).toBe(1);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
