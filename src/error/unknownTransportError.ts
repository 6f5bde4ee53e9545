import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a transport failure carries no status code: network failures,
 * timeouts, aborted requests or bodies that failed validation.
 */
export class UnknownTransportError extends Error {
  /** UnknownTransportError error-name */
  static override name = 'UnknownTransportError';
  #operation: string;

  /** Creates a new instance of an UnknownTransportError for the given client operation */
  constructor(message: string, operation: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#operation = operation;
  }

  /** Client operation that failed, e.g. `getProfile` */
  get operation(): string {
    return this.#operation;
  }
}

/**
 * Type guard for {@link UnknownTransportError}.
 */
export function isUnknownTransportError(error: unknown): error is UnknownTransportError {
  return isErrorType(UnknownTransportError, error);
}

/**
 * Extract an {@link UnknownTransportError} from an unknown error value, following nested causes.
 */
export function getUnknownTransportError(error: unknown): UnknownTransportError | null {
  return unwrapErrorType(UnknownTransportError, error);
}
