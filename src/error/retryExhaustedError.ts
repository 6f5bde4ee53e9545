import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a request that kept failing until every retry was spent.
 */
export class RetryExhaustedError extends Error {
  /** RetryExhaustedError error-name */
  static override name = 'RetryExhaustedError';
  #attempts: number;

  /** Creates a new instance of a RetryExhaustedError with the number of attempts made */
  constructor(message: string, attempts: number, opts?: ErrorOptions) {
    super(message, opts);
    this.#attempts = attempts;
  }

  /** Attempts made, the first one included */
  get attempts(): number {
    return this.#attempts;
  }
}

/**
 * Type guard for {@link RetryExhaustedError}.
 */
export function isRetryExhaustedError(error: unknown): error is RetryExhaustedError {
  return isErrorType(RetryExhaustedError, error);
}

/**
 * Extract a {@link RetryExhaustedError} from an unknown error value, following nested causes.
 */
export function getRetryExhaustedError(error: unknown): RetryExhaustedError | null {
  return unwrapErrorType(RetryExhaustedError, error);
}
