/**
 * Transport entrypoint: the default HTTP transport and its endpoint table.
 * @module
 */

export { HttpTransport } from './client.js';
export { type EndpointDefinition, endpoints } from './endpoints.js';
