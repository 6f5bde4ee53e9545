import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates a decoded body against a Standard Schema (the model schemas are zod) and wraps
 * the result in a tuple-style `[error, value]` response.
 *
 * - The schema may validate synchronously or asynchronously; a throw on either path becomes a
 *   {@link ValidationError} with the thrown value as `cause`.
 * - Reported issues become a {@link ValidationError} carrying them.
 * - Otherwise the schema output is returned, which for zod means unknown keys are stripped.
 */
export async function validator<Output>(
  input: unknown,
  schema: StandardSchemaV1<unknown, Output>,
): SafeWrapAsync<Error, Output> {
  type ValidationResult = StandardSchemaV1.Result<Output>;

  const [err, pending] = safeWrap<ValidationResult | Promise<ValidationResult>>(() =>
    schema['~standard'].validate(input),
  );
  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  let result = pending;
  if (result instanceof Promise) {
    const [errAsync, resultAsync] = await safeWrapAsync(() => Promise.resolve(pending));
    if (errAsync) {
      return [new ValidationError('error validating async data', [], { cause: errAsync }), null];
    }

    result = resultAsync;
  }

  if (!result || typeof result !== 'object') {
    return [new ValidationError('error validation result of wrong type', []), null];
  }

  if (result.issues !== undefined) {
    return [new ValidationError('error validating data', [...result.issues]), null];
  }

  return [null, result.value];
}
