import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a failure that was not worth retrying (a 404, an abort, ...).
 */
export class RetrySuppressedError extends Error {
  /** RetrySuppressedError error-name */
  static override name = 'RetrySuppressedError';
  #attempts: number;

  /** Creates a new instance of a RetrySuppressedError with the number of attempts made */
  constructor(message: string, attempts: number, opts?: ErrorOptions) {
    super(message, opts);
    this.#attempts = attempts;
  }

  /** Attempts made before retrying stopped */
  get attempts(): number {
    return this.#attempts;
  }
}

/**
 * Type guard for {@link RetrySuppressedError}.
 */
export function isRetrySuppressedError(error: unknown): error is RetrySuppressedError {
  return isErrorType(RetrySuppressedError, error);
}

/**
 * Extract a {@link RetrySuppressedError} from an unknown error value, following nested causes.
 */
export function getRetrySuppressedError(error: unknown): RetrySuppressedError | null {
  return unwrapErrorType(RetrySuppressedError, error);
}
