import { ApiError } from './apiError.js';
import { getHttpError } from './httpError.js';
import { UnknownTransportError } from './unknownTransportError.js';

/** A status code trails the message after a colon, e.g. `upstream: 404`. */
const STATUS_CODE_PATTERN = /:\s*(\d+)\s*$/;

/**
 * Finds the status code of a transport failure.
 *
 * An {@link HTTPError} anywhere in the cause chain wins; otherwise the first message in the
 * chain (outermost first) ending in `: <digits>` supplies it. The walk stops at a `TypeError`:
 * that is how `fetch` reports a network failure, and the messages below it come from the socket
 * layer (`connect ECONNREFUSED 127.0.0.1:8080` ends in a port, not a status).
 *
 * @returns The status code, or `null` when the failure does not carry one.
 */
export function extractStatusCode(error: unknown): number | null {
  const httpError = getHttpError(error);
  if (httpError) {
    return httpError.status;
  }

  const seen = new Set<Error>();
  let current: unknown = error;
  while (current instanceof Error && !(current instanceof TypeError) && !seen.has(current)) {
    const match = STATUS_CODE_PATTERN.exec(current.message);
    if (match?.[1] !== undefined) {
      return Number.parseInt(match[1], 10);
    }

    seen.add(current);
    current = current.cause;
  }

  return null;
}

/**
 * Translates a transport failure into the error a client operation raises.
 */
export function translateTransportError(error: Error, operation: string): ApiError | UnknownTransportError {
  const code = extractStatusCode(error);
  if (code === null) {
    return new UnknownTransportError(`error in ${operation}, transport failed without a status code`, operation, {
      cause: error,
    });
  }

  return new ApiError(`error in ${operation}: ${code}`, code, operation, { cause: error });
}
