import { AbortError } from '../error/abortError.js';
import { ClientError } from '../error/clientError.js';
import { HTTPError } from '../error/httpError.js';
import { TransportError } from '../error/transportError.js';
import type {
  FetchClientOptions,
  FetchClientProviderDefinition,
  FetchFunction,
  FetchOptions,
} from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/**
 * Thin wrapper around the native `fetch` API that:
 * - prefixes all requests with a configured base URL,
 * - merges default and per-request headers,
 * - classifies failures into {@link TransportError} and {@link HTTPError},
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * The status check happens here, before anyone reads the body.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Base URL prepended to all request paths. */
  readonly #baseUrl: string;
  /** Default headers. */
  readonly #headers: Headers;
  /** Injected fetch implementation, if any. */
  readonly #fetch: FetchFunction | undefined;

  /** Creates a new instance of the fetch-client, with a base-url + options */
  constructor(baseUrl: string, opts: FetchClientOptions = {}) {
    if (!baseUrl.endsWith('/')) {
      baseUrl += '/';
    }

    this.#baseUrl = baseUrl;
    this.#headers = mergeHeaderOptions(opts.headers);
    this.#fetch = opts.fetch;
  }

  /**
   * Executes a GET request against the given endpoint.
   *
   * @param endpoint - Relative endpoint path (e.g. `users/123`).
   * @param opts - Request options merged with the client's defaults.
   */
  public get(endpoint: string, opts: Omit<FetchOptions, 'method' | 'body'>): SafeWrapAsync<Error, Response> {
    return this.#request(endpoint, { ...opts, method: 'GET', body: undefined });
  }

  /**
   * Executes a PUT request against the given endpoint.
   *
   * @param opts - Request options, `body` being the serialized JSON payload.
   */
  public put(endpoint: string, opts: Omit<FetchOptions, 'method'>): SafeWrapAsync<Error, Response> {
    return this.#request(endpoint, { ...opts, method: 'PUT' });
  }

  /**
   * Executes a POST request against the given endpoint.
   *
   * @param opts - Request options, `body` being the serialized JSON payload.
   */
  public post(endpoint: string, opts: Omit<FetchOptions, 'method'>): SafeWrapAsync<Error, Response> {
    return this.#request(endpoint, { ...opts, method: 'POST' });
  }

  /**
   * Executes a DELETE request against the given endpoint.
   */
  public delete(endpoint: string, opts: Omit<FetchOptions, 'method' | 'body'>): SafeWrapAsync<Error, Response> {
    return this.#request(endpoint, { ...opts, method: 'DELETE', body: undefined });
  }

  /**
   * Core request implementation used by all HTTP verb helpers.
   *
   * Errors:
   * - A request aborted through its signal yields the signal's reason when it is a
   *   classified error (e.g. a {@link TimeoutError}), an {@link AbortError} otherwise.
   * - Any other fetch failure yields a {@link TransportError}.
   * - Non-2xx responses yield an {@link HTTPError}.
   */
  async #request(endpoint: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    const fetchFn = this.#fetch ?? globalThis.fetch;
    const headers = mergeHeaderOptions(this.#headers, opts.headers);
    const method = opts.method ?? 'GET';

    const [err, res] = await safeWrapAsync(() =>
      fetchFn(this.#constructPath(endpoint), {
        body: opts.body,
        method,
        headers,
        ...(opts.signal && { signal: opts.signal }),
      }),
    );

    if (err) {
      return [this.#classifyFailure(method, err, opts.signal), null];
    }

    if (!res.ok) {
      return [new HTTPError(res), null];
    }

    return [null, res];
  }

  #classifyFailure(method: string, err: Error, signal?: AbortSignal): Error {
    if (signal?.aborted) {
      const reason: unknown = signal.reason;
      if (reason instanceof ClientError) {
        return reason;
      }

      return new AbortError(`error ${method} request aborted`, { cause: reason ?? err });
    }

    if (err instanceof ClientError) {
      return err;
    }

    return new TransportError(`error sending ${method} request`, { cause: err });
  }

  /**
   * Joins the base URL and endpoint into a single URL string.
   *
   * - Strips a leading slash from the endpoint to avoid `//` in the URL.
   */
  #constructPath(endpoint: string): string {
    return `${this.#baseUrl}${endpoint.replace(/^\//, '')}`;
  }
}
