import { RetryExhaustedError } from '../error/retryExhaustedError.js';
import { RetrySuppressedError } from '../error/retrySuppressedError.js';
import type { SafeWrapAsync } from './wrap.js';

/** Options for {@link retry} */
export interface RetryLoopOptions<R> {
  /** Function to execute; must return a tuple-style result. */
  fn: () => SafeWrapAsync<Error, R>;
  /**
   * Maximum number of retries after the initial attempt (total tries = attempts + 1).
   * Passing 0 means "try once, then stop."
   */
  attempts?: number;
  /** Milliseconds to wait between attempts. */
  timeout?: number;
  /**
   * Predicate that decides whether to stop retrying.
   * Return true to stop retrying and surface the error, false to continue.
   */
  errFn?: (e: Error) => boolean;
  /** Called before each wait, with the failure and the attempt that produced it. */
  onRetry?: (e: Error, attempt: number) => void;
}

/**
 * Waits for the given number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Keeps calling a tuple-returning function until it succeeds, `errFn` gives up on the
 * failure, or the attempts run out.
 *
 * The last failure is kept as `cause` of the returned {@link RetrySuppressedError} or
 * {@link RetryExhaustedError}.
 */
export async function retry<R>({ fn, attempts = 10, timeout = 1000, errFn, onRetry }: RetryLoopOptions<R>): SafeWrapAsync<Error, R> {
  for (let attempt = 1; ; attempt += 1) {
    const [err, data] = await fn();
    if (!err) {
      return [null, data];
    }

    if (errFn?.(err)) {
      return [new RetrySuppressedError('error further retries suppressed', attempt, { cause: err }), null];
    }

    if (attempt > attempts) {
      return [new RetryExhaustedError('error retries exhausted', attempt, { cause: err }), null];
    }

    onRetry?.(err, attempt);
    await sleep(timeout);
  }
}
