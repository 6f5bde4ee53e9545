import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing an HTTP response with a non-2xx status code.
 */
export class HTTPError extends Error {
  /** HTTPError error-name */
  static override name = 'HTTPError';

  /** Response causing the HTTPError */
  #response: Response;

  /** Creates a new instance of a HTTPError, the message defaults to one carrying the status */
  constructor(response: Response, message: string = `HTTP Error: ${response.status}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#response = response;
  }

  /** Response causing the HTTPError */
  get response(): Response {
    return this.#response;
  }

  /** Status code of the failed response */
  get status(): number {
    return this.#response.status;
  }
}

/**
 * Type guard for {@link HTTPError}.
 */
export function isHttpError(error: unknown): error is HTTPError {
  return isErrorType(HTTPError, error);
}

/**
 * Extract an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): HTTPError | null {
  return unwrapErrorType(HTTPError, error);
}
