/**
 * Core entrypoint: exports the client and the transport contract.
 * Import from here if you only need the client/types without error helpers.
 * @module
 */

export { RoyaleClient } from './client.js';
export type {
  RoyaleClientProps,
  Transport,
  TransportOperation,
  TransportOptions,
  TransportProvider,
  TransportResult,
} from './types.js';
