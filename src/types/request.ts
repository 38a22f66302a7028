import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the fetch wrapper; `null`/`undefined` values remove a header. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null | undefined>;

/** HTTP verbs the API is called with. */
export type HttpMethod = 'get' | 'post' | 'put' | 'delete';

/** `fetch`-compatible function, injectable for tests or custom agents. */
export type FetchFunction = (input: string, init: RequestInit) => Promise<Response>;

/** Options to pass in for each fetch request */
export interface FetchOptions extends Omit<RequestInit, 'headers'> {
  /** Headers merged with provider defaults. */
  headers?: HeaderOptions;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/** Options to configure a fetch provider. */
export interface FetchClientOptions {
  /** Default headers sent with every request. */
  headers?: HeaderOptions;
  /** Implementation used to send requests, defaults to the global `fetch`. */
  fetch?: FetchFunction;
}

/** Contract for HTTP client implementations used by RequestClient. */
export interface FetchClientProviderDefinition {
  /** Executes a GET request. */
  get: (url: string, options: Omit<FetchOptions, 'method' | 'body'>) => SafeWrapAsync<Error, Response>;
  /** Executes a PUT request. */
  put: (url: string, options: Omit<FetchOptions, 'method'>) => SafeWrapAsync<Error, Response>;
  /** Executes a POST request. */
  post: (url: string, options: Omit<FetchOptions, 'method'>) => SafeWrapAsync<Error, Response>;
  /** Executes a DELETE request. */
  delete: (url: string, options: Omit<FetchOptions, 'method' | 'body'>) => SafeWrapAsync<Error, Response>;
  /** Optional lifecycle hook to dispose resources (e.g., keep-alive agents). */
  dispose?: () => void;
}

/** Factory signature for constructing HTTP providers. */
export interface FetchClientProvider {
  /** Creates a new instance of the fetch-client, with a base-url + options */
  new (baseUrl: string, opts: FetchClientOptions): FetchClientProviderDefinition;
}
