/**
 * Transport entrypoint: the undici-backed transport and the contract custom transports implement.
 * @module
 */
export { FetchTransport } from './client.js';
export type {
  HeaderOptions,
  TransportDefinition,
  TransportOptions,
  TransportProvider,
  TransportRequest,
  TransportResponse,
  WireMethod,
} from './types.js';
export { mergeHeaderOptions } from './utils.js';
