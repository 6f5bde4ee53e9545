/**
 * Error-first tuple used throughout the library, `[error, data]`.
 */
export type SafeWrap<ErrorType = Error, DataType = unknown> =
  | [error: ErrorType, data: null]
  | [error: null, data: DataType];

/**
 * Async variant of {@link SafeWrap}.
 */
export type SafeWrapAsync<ErrorType = Error, DataType = unknown> = Promise<SafeWrap<ErrorType, DataType>>;

/**
 * Coerces a thrown value into an `Error`, keeping non-errors reachable as `cause`.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }

  return new Error(`non-error value thrown: ${String(value)}`, { cause: value });
}

/**
 * Runs a Promise factory and captures a rejection as the error slot.
 * @example
 * const [error, data] = await safeWrapAsync(() => asyncAction());
 */
export async function safeWrapAsync<DataType>(promise: () => Promise<DataType>): SafeWrapAsync<Error, DataType> {
  try {
    const data = await promise();
    return [null, data];
  } catch (error) {
    return [toError(error), null];
  }
}

/**
 * Synchronous counterpart of {@link safeWrapAsync}.
 */
export function safeWrap<DataType>(fn: () => DataType): SafeWrap<Error, DataType> {
  try {
    const data = fn();
    return [null, data];
  } catch (error) {
    return [toError(error), null];
  }
}

/**
 * Calls a function that reports failure through a tuple but may still throw or reject,
 * and folds both failure paths into the tuple.
 *
 * Pluggable providers (transports, fetch providers) go through this so a misbehaving
 * implementation cannot escape the tuple contract.
 */
export async function settleAsync<DataType>(fn: () => SafeWrapAsync<Error, DataType>): SafeWrapAsync<Error, DataType> {
  const [errThrown, wrapped] = await safeWrapAsync(fn);
  if (errThrown) {
    return [errThrown, null];
  }

  return wrapped;
}
