/**
 * Root entrypoint: re-exports the client, request objects, models, transport and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Client for the game statistics API and the transport contract it calls.
 */
export {
  RoyaleClient,
  type RoyaleClientProps,
  type Transport,
  type TransportOperation,
  type TransportOptions,
  type TransportProvider,
  type TransportResult,
} from './core/index.js';

/**
 * Errors raised by the client, with guards that also search cause chains.
 */
export * from './error/index.js';

/**
 * Default fetch provider.
 */
export { FetchClient } from './fetch/client.js';

/**
 * zod schemas and record types of every API document.
 */
export * from './models/index.js';

/**
 * Request objects and their builders.
 */
export * from './request/index.js';

/**
 * Default transport.
 */
export { HttpTransport } from './transport/client.js';

export type {
  ErrorStatusCode,
  FetchClientOptions,
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  HeaderOptions,
  RequestOptions,
  RetryOptions,
} from './types/request.js';

/** Logging sink and the built-in loggers. */
export { consoleLogger, type LogContext, type Logger, silentLogger } from './utils/logger.js';

export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
