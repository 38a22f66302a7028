/**
 * Fetch entrypoint: exports the fetch client and supporting types.
 * @module
 */
export type {
  FetchClientOptions,
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchFunction,
  FetchOptions,
  HeaderOptions,
} from '../types/request.js';
export { FetchClient } from './client.js';
