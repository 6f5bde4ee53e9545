import { isErrorType } from './isErrorType.js';

/**
 * Error raised when an argument is present but unusable, such as an empty tag or an empty tag list.
 *
 * A missing argument (`null`/`undefined`) is a programmer error and raises a `TypeError` instead.
 */
export class InvalidArgumentError extends Error {
  /** InvalidArgumentError error-name */
  static override name = 'InvalidArgumentError';
  #argument: string;

  /** Creates a new instance of an InvalidArgumentError naming the offending argument */
  constructor(message: string, argument: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#argument = argument;
  }

  /** Name of the rejected argument */
  get argument(): string {
    return this.#argument;
  }
}

/**
 * Type guard for {@link InvalidArgumentError}.
 */
export function isInvalidArgumentError(error: unknown): error is InvalidArgumentError {
  return isErrorType(InvalidArgumentError, error, true);
}
