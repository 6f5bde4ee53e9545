import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised by every client operation whose transport call failed with a known status code.
 *
 * Callers branch on {@link ApiError.code} to decide whether the failure is recoverable.
 */
export class ApiError extends Error {
  /** ApiError error-name */
  static override name = 'ApiError';
  #code: number;
  #operation: string;

  /** Creates a new instance of an ApiError for the given status code and client operation */
  constructor(message: string, code: number, operation: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#code = code;
    this.#operation = operation;
  }

  /** HTTP-like status code of the failure */
  get code(): number {
    return this.#code;
  }

  /** Client operation that failed, e.g. `getProfile` */
  get operation(): string {
    return this.#operation;
  }
}

/**
 * Type guard for {@link ApiError}.
 */
export function isApiError(error: unknown): error is ApiError {
  return isErrorType(ApiError, error);
}

/**
 * Extract an {@link ApiError} from an unknown error value, following nested causes.
 */
export function getApiError(error: unknown): ApiError | null {
  return unwrapErrorType(ApiError, error);
}
