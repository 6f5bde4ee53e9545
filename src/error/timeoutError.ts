import { isErrorType } from './isErrorType.js';

/**
 * Reason a single transport attempt is aborted with once `fetchOpts.timeout` elapses.
 *
 * The timeout runs per attempt, so a timed-out attempt is retried while retries remain. A
 * failure that ends in a timeout carries no status code and reaches callers as an
 * {@link UnknownTransportError}.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  static override name = 'TimeoutError';
}

/**
 * Type guard for {@link TimeoutError}, searching the cause chain: a timeout sits below the
 * retry and request wrappers.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}
