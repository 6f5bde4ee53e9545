import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when an endpoint path cannot be filled in from its parameters.
 */
export class ConstructURLError extends Error {
  /** ConstructURLError error-name */
  static override name = 'ConstructURLError';
  /** What the URL looked like when construction gave up */
  #url: string;

  /** Creates a new instance of a ConstructURLError with the partial URL */
  constructor(message: string, url: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#url = url;
  }

  /** Partially constructed URL */
  get url(): string {
    return this.#url;
  }
}

/**
 * Extract a {@link ConstructURLError} from an unknown error value, following nested causes.
 */
export function getConstructURLError(error: unknown): ConstructURLError | null {
  return unwrapErrorType(ConstructURLError, error);
}

/**
 * Type guard for {@link ConstructURLError}.
 */
export function isConstructURLError(error: unknown): error is ConstructURLError {
  return isErrorType(ConstructURLError, error);
}
