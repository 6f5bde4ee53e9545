import { describe, expect, test } from 'vitest';
import { RetryExhaustedError } from './retryExhaustedError.js';
import { isTimeoutError, TimeoutError } from './timeoutError.js';
import { extractStatusCode } from './translateError.js';

describe('isTimeoutError', () => {
  test('finds a timeout below the retry wrapper', () => {
    const err = new RetryExhaustedError('error retries exhausted', 3, {
      cause: new TimeoutError('error request timed out after 5000ms'),
    });

    expect(isTimeoutError(err)).toBe(true);
  });

  test('returns false for other errors', () => {
    expect(isTimeoutError(new Error('error request timed out'))).toBe(false);
  });

  test('a timeout carries no status code', () => {
    expect(extractStatusCode(new TimeoutError('error request timed out after 5000ms'))).toBeNull();
  });
});
