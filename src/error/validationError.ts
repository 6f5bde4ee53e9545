import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a response body does not match the schema of its endpoint.
 */
export class ValidationError extends Error {
  /** ValidationError error-name */
  static override name = 'ValidationError';
  /** Schema validation issues */
  readonly issues: readonly StandardSchemaV1.Issue[];

  /** Creates a new instance of the ValidationError, with accompanying issues */
  constructor(message: string, issues: readonly StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    super(`${message}; issues: ${JSON.stringify(issues)}`, opts);

    this.issues = issues;
  }
}

/**
 * Type guard for {@link ValidationError}.
 */
export function isValidationError(error: unknown): error is ValidationError {
  return isErrorType(ValidationError, error);
}

/**
 * Extract a {@link ValidationError} from an unknown error value, following nested causes.
 */
export function getValidationError(error: unknown): ValidationError | null {
  return unwrapErrorType(ValidationError, error);
}
