import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the fetch wrapper; a `null`/`undefined` value removes the header. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null | undefined>;

/** Error status codes the API answers with, used to configure retries. */
export type ErrorStatusCode =
  | 400
  | 401
  | 403
  | 404
  | 405
  | 408
  | 409
  | 410
  | 422
  | 425
  | 429
  | 500
  | 501
  | 502
  | 503
  | 504
  | 520
  | 521
  | 522
  | 524;

/** Options passed to each GET made by a fetch provider. */
export interface FetchOptions {
  /** Headers merged over the provider defaults. */
  headers?: HeaderOptions;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/** Options for the retry loop of the transport. */
export type RetryOptions = {
  /**
   * The number of times to retry failed requests.
   * @default 2
   */
  limit?: number;
  /**
   * Time to wait before retrying, in milliseconds.
   * @default 1000
   */
  timeout?: number;
} & (
  | {
      /**
       * The HTTP status codes allowed to retry.
       * @default [408, 429, 500, 501, 502, 503, 504]
       */
      statusCodes?: ErrorStatusCode[];
      ignoreStatusCodes?: never;
    }
  | {
      /**
       * The HTTP status codes skipping retries, every other status is retried.
       */
      ignoreStatusCodes?: ErrorStatusCode[];
      statusCodes?: never;
    }
);

/** Request-level defaults applied by the transport. */
export interface RequestOptions {
  /** Headers sent with every request. */
  headers?: HeaderOptions;
  /**
   * Request timeout in milliseconds, `false` disables it.
   * @default 60000
   */
  timeout?: number | false;
  /** Retry behavior (object for fine-grained control or number for attempt count). */
  retry?: RetryOptions | number;
}

/** Contract for the HTTP providers used by the transport. */
export interface FetchClientProviderDefinition {
  /** Executes a GET request against a path relative to the provider's base URL. */
  get: (url: string, options: FetchOptions) => SafeWrapAsync<Error, Response>;
  /** Optional lifecycle hook to dispose resources (e.g., keep-alive agents). */
  dispose?: () => void;
}

/** Default options of a fetch provider. */
export interface FetchClientOptions {
  /** Headers sent with every request. */
  headers?: HeaderOptions;
}

/** Factory signature for constructing HTTP providers. */
export interface FetchClientProvider {
  /** Creates a new instance of the fetch-client, with a base-url + options */
  new (baseUrl: string, opts: FetchClientOptions): FetchClientProviderDefinition;
}
