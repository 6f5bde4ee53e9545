import { HTTPError } from '../error/httpError.js';
import type {
  FetchClientOptions,
  FetchClientProviderDefinition,
  FetchOptions,
} from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/**
 * Thin wrapper around the global `fetch` that:
 * - prefixes all requests with a configured base URL,
 * - merges default and per-request headers,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Base URL prepended to all request paths, always ending in `/`. */
  #baseUrl: string;
  /** Default options (headers). */
  readonly #opts: FetchClientOptions;

  /** Creates a new instance of the fetch-client, with a base-url + options */
  constructor(baseUrl: string, opts?: FetchClientOptions) {
    this.#baseUrl = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
    this.#opts = opts ?? {};
  }

  /**
   * Executes a GET request against the given endpoint.
   *
   * Errors:
   * - Network / fetch errors are wrapped in `Error`.
   * - Non-2xx responses are wrapped in {@link HTTPError}.
   *
   * @param endpoint - Relative endpoint path (e.g. `player/ABC`).
   * @param opts - Request options merged with the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  public async get(endpoint: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    const [err, res] = await safeWrapAsync(() =>
      fetch(this.#constructPath(endpoint), {
        method: 'GET',
        headers: mergeHeaderOptions(this.#opts.headers, opts.headers),
        ...(opts.signal && { signal: opts.signal }),
      }),
    );

    if (err) {
      return [new Error('error wrapping GET request in fetchClient', { cause: err }), null];
    }

    if (!res.ok) {
      return [new HTTPError(res), null];
    }

    return [null, res];
  }

  /**
   * Joins the base URL and endpoint, stripping a leading slash from the endpoint to avoid `//`.
   */
  #constructPath(endpoint: string): string {
    return `${this.#baseUrl}${endpoint.replace(/^\//, '')}`;
  }
}
