/**
 * Error entrypoint: exports the client errors and helpers for identifying and unwrapping them.
 * Use this when you only need error utilities without the client.
 * @module
 */

export { AbortError, isAbortError } from './abortError.js';
export { ApiError, getApiError, isApiError } from './apiError.js';
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
export { InvalidArgumentError, isInvalidArgumentError } from './invalidArgumentError.js';
export { isErrorType } from './isErrorType.js';
export { getRetryExhaustedError, isRetryExhaustedError, RetryExhaustedError } from './retryExhaustedError.js';
export { getRetrySuppressedError, isRetrySuppressedError, RetrySuppressedError } from './retrySuppressedError.js';
export { isTimeoutError, TimeoutError } from './timeoutError.js';
export { extractStatusCode, translateTransportError } from './translateError.js';
export { getUnknownTransportError, isUnknownTransportError, UnknownTransportError } from './unknownTransportError.js';
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
