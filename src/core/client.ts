import type { StandardSchemaV1 } from '@standard-schema/spec';
import { z } from 'zod';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT, isHeaderSafeToken, isValidTimeout, MAX_TIMEOUT } from '../config/config.js';
import { AbortError } from '../error/abortError.js';
import { ConfigurationError } from '../error/configurationError.js';
import { DecodeError } from '../error/decodeError.js';
import { TransportError } from '../error/transportError.js';
import { FetchClient } from '../fetch/client.js';
import { mergeHeaderOptions, redactHeaders } from '../fetch/utils.js';
import type {
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchFunction,
  FetchOptions,
  HeaderOptions,
  HttpMethod,
} from '../types/request.js';
import { constructUrl } from '../utils/constructUrl.js';
import { getResponseData } from '../utils/getResponseData.js';
import { type Logger, resolveLogger } from '../utils/logger.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { validator } from '../utils/validator.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { VERSION } from '../version.js';
import { decodeEnvelope, envelopeSchema } from './envelope.js';
import { type PageRequest, Paginator } from './paginator.js';
import type { CallOptions, Infer, PaginateOptions, QueryParams, RequestOptions } from './types.js';

/** The classified error behind an aborted signal, for failures surfacing while the body streams in. */
function abortReason(signal: AbortSignal, err: Error): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof TransportError) {
    return reason;
  }

  return new AbortError('error reading response body aborted', { cause: err });
}

function invalidTimeout(timeout: number | false): ConfigurationError {
  return new ConfigurationError(
    `error timeout must be false or an integer between 1 and ${MAX_TIMEOUT} milliseconds, got ${timeout}`,
    'BONUSLY_TIMEOUT_MS',
  );
}

/** A page is any JSON array; items are validated one by one. */
const pageSchema = z.array(z.unknown());

/** Configuration for constructing a {@link RequestClient}. */
export interface RequestClientProps {
  /** Access token sent as `Authorization: Bearer <token>`. Never logged. */
  token: string;
  /**
   * Base URL all paths are resolved against.
   * @default 'https://bonus.ly/api/v1'
   */
  baseUrl?: string;
  /**
   * Request timeout in milliseconds, `false` to disable.
   * @default 5000
   */
  timeout?: number | false;
  /**
   * Whether to ask for compressed responses.
   * @default true
   */
  compression?: boolean;
  /** Extra headers sent with every request. */
  headers?: HeaderOptions;
  /** HTTP client implementation used for requests. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
  /** `fetch` implementation handed to the provider, defaults to the global one. */
  fetch?: FetchFunction;
  /** Logger for request tracing; takes precedence over `debug`. */
  logger?: Logger;
  /** Log requests to the console. */
  debug?: boolean;
}

/**
 * Request pipeline shared by every resource:
 * - builds URLs against the base URL and attaches the credential and standard headers,
 * - enforces the timeout and merges abort signals,
 * - rejects non-2xx statuses before touching the body,
 * - unwraps the `{ success, message, result }` envelope,
 * - validates the result against a Standard Schema.
 *
 * Configuration is fixed at construction and shared read-only by every request, so one
 * instance may serve any number of concurrent calls. There is no caching, deduplication
 * or retrying.
 *
 * All methods return error-first tuples via {@link SafeWrapAsync}.
 */
export class RequestClient {
  /** Underlying fetch-capable HTTP provider instance. */
  readonly #fetchClient: FetchClientProviderDefinition;
  /** Headers applied to every request, credential included. */
  readonly #defaultHeaders: Headers;
  /** Base URL prefix applied to all paths. */
  readonly #baseUrl: string;
  /** Default request timeout in milliseconds. */
  readonly #timeout: number | false;
  /** Whether compressed responses are requested. */
  readonly #compression: boolean;
  /** `Authorization` value, re-applied over per-call headers. */
  readonly #credential: string;
  /** Request logger. */
  readonly #logger: Logger;
  /** Global abort-controller for disposing */
  readonly #abortController = new AbortController();

  /**
   * Creates the client and its HTTP provider.
   *
   * Throws a {@link ConfigurationError} when the token cannot be sent as a header value, the
   * base URL does not parse or the timeout cannot be armed; use `BonuslyClient.fromEnv` for a tuple-returning construction.
   */
  constructor({
    token,
    baseUrl = DEFAULT_BASE_URL,
    timeout = DEFAULT_TIMEOUT,
    compression = true,
    headers,
    fetchProvider = FetchClient,
    fetch,
    logger,
    debug = false,
  }: RequestClientProps) {
    if (!isHeaderSafeToken(token)) {
      throw new ConfigurationError('error token must be non-empty printable ASCII', 'BONUSLY_TOKEN');
    }

    const [errUrl] = safeWrap(() => new URL(baseUrl));
    if (errUrl) {
      throw new ConfigurationError(`error invalid base URL ${baseUrl}`, 'BONUSLY_BASE_URL', { cause: errUrl });
    }

    if (!isValidTimeout(timeout)) {
      throw invalidTimeout(timeout);
    }

    this.#baseUrl = baseUrl;
    this.#timeout = timeout;
    this.#compression = compression;
    this.#logger = resolveLogger(logger, debug);
    this.#defaultHeaders = mergeHeaderOptions(
      {
        Accept: 'application/json',
        'Accept-Encoding': compression ? 'gzip, deflate, br' : 'identity',
        'User-Agent': `bonusly-client/${VERSION}`,
      },
      headers,
    );
    this.#credential = `Bearer ${token}`;
    this.#defaultHeaders.set('Authorization', this.#credential);

    this.#fetchClient = new fetchProvider(baseUrl, {
      headers: this.#defaultHeaders,
      ...(fetch && { fetch }),
    });
  }

  /** Base URL all paths are resolved against. */
  get baseUrl(): string {
    return this.#baseUrl;
  }

  /** Default request timeout in milliseconds, `false` when disabled. */
  get timeout(): number | false {
    return this.#timeout;
  }

  /** Whether compressed responses are requested. */
  get compression(): boolean {
    return this.#compression;
  }

  /**
   * Aborts every in-flight request and releases provider resources.
   * Requests issued afterwards fail immediately with an abort error.
   */
  dispose() {
    this.#abortController.abort('client was disposed');
    this.#fetchClient.dispose?.();
  }

  /**
   * Performs a GET request and decodes the envelope's result with `schema`.
   *
   * @param path - Path relative to the base URL, e.g. `/users/abc`.
   * @param query - Query parameters appended to the path.
   */
  get<Schema extends StandardSchemaV1>(
    path: string,
    schema: Schema,
    query?: QueryParams,
    opts: CallOptions = {},
  ): SafeWrapAsync<Error, Infer<Schema>> {
    return this.request('get', path, schema, { ...opts, query });
  }

  /**
   * Performs a POST request with a JSON body and decodes the envelope's result with `schema`.
   */
  post<Schema extends StandardSchemaV1>(
    path: string,
    body: unknown,
    schema: Schema,
    opts: CallOptions = {},
  ): SafeWrapAsync<Error, Infer<Schema>> {
    return this.request('post', path, schema, { ...opts, body });
  }

  /**
   * Performs a PUT request with a JSON body and decodes the envelope's result with `schema`.
   */
  put<Schema extends StandardSchemaV1>(
    path: string,
    body: unknown,
    schema: Schema,
    opts: CallOptions = {},
  ): SafeWrapAsync<Error, Infer<Schema>> {
    return this.request('put', path, schema, { ...opts, body });
  }

  /**
   * Performs a DELETE request and decodes the envelope's result with `schema`.
   */
  delete<Schema extends StandardSchemaV1>(
    path: string,
    schema: Schema,
    opts: CallOptions = {},
  ): SafeWrapAsync<Error, Infer<Schema>> {
    return this.request('delete', path, schema, opts);
  }

  /**
   * Exposes a collection endpoint as one lazy sequence of items validated with `itemSchema`.
   *
   * `skip` and `limit` are managed by the returned {@link Paginator}; they override anything
   * of the same name in `query`.
   *
   * @example
   * const [err, users] = await client.paginate('/users', userSchema, { pageSize: 20 }).take(5);
   */
  paginate<Schema extends StandardSchemaV1>(
    path: string,
    itemSchema: Schema,
    { pageSize, query, ...opts }: PaginateOptions,
  ): Paginator<Infer<Schema>> {
    const fetchPage = async ({ skip, limit }: PageRequest): SafeWrapAsync<Error, Infer<Schema>[]> => {
      const [errPage, page] = await this.get(path, pageSchema, { ...query, skip, limit }, opts);
      if (errPage) {
        return [errPage, null];
      }

      const items: Infer<Schema>[] = [];
      for (const [index, raw] of page.entries()) {
        const [errItem, item] = await validator(raw, itemSchema);
        if (errItem) {
          return [new DecodeError(`error validating item ${skip + index} of ${path}`, [], { cause: errItem }), null];
        }

        items.push(item);
      }

      return [null, items];
    };

    return new Paginator(fetchPage, pageSize);
  }

  /**
   * Core execution pipeline for every method.
   *
   * - Serializes the body, builds the URL and scopes the timeout and abort signals to the call.
   * - Invokes the provider, whose errors are already classified.
   * - Parses the body, checks the envelope and validates its result.
   *
   * @returns A tuple `[error, result]`; errors wrap the classified one as `cause`.
   */
  async request<Schema extends StandardSchemaV1>(
    method: HttpMethod,
    path: string,
    schema: Schema,
    opts: RequestOptions = {},
  ): SafeWrapAsync<Error, Infer<Schema>> {
    const operation = method.toUpperCase();
    const url = constructUrl(path, opts.query);
    const timeout = opts.timeout ?? this.#timeout;
    if (!isValidTimeout(timeout)) {
      return [new Error(`error doing ${operation} ${path}`, { cause: invalidTimeout(timeout) }), null];
    }

    const timeoutSignal = createTimeoutSignal(timeout);
    const merged = mergeSignals([opts.signal, timeoutSignal?.signal, this.#abortController.signal]);
    const headers = mergeHeaderOptions(opts.headers);
    headers.set('Authorization', this.#credential);

    this.#logger.debug(`${operation} ${url}`, {
      headers: redactHeaders(mergeHeaderOptions(this.#defaultHeaders, headers)),
    });
    const [err, result] = await this.#execute(method, url, schema, { ...opts, headers, signal: merged?.signal });
    timeoutSignal?.release();
    merged?.release();

    if (err) {
      this.#logger.debug(`${operation} ${url} failed`, { error: err.message });
      return [new Error(`error doing ${operation} ${path}`, { cause: err }), null];
    }

    return [null, result];
  }

  async #execute<Schema extends StandardSchemaV1>(
    method: HttpMethod,
    url: string,
    schema: Schema,
    { body, headers, signal }: RequestOptions,
  ): SafeWrapAsync<Error, Infer<Schema>> {
    const [errBody, requestOptions] = this.#requestOptions(body, headers);
    if (errBody) {
      return [errBody, null];
    }

    const [errWrapped, wrapped] = await safeWrapAsync(() =>
      this.#fetchClient[method](url, { ...requestOptions, ...(signal && { signal }) }),
    );
    if (errWrapped) {
      return [new Error(`error calling provider ${method.toUpperCase()}`, { cause: errWrapped }), null];
    }

    const [errResponse, response] = wrapped;
    if (errResponse) {
      return [errResponse, null];
    }

    this.#logger.debug(`${method.toUpperCase()} ${url} responded`, { status: response.status });

    const [errData, data] = await getResponseData(response);
    if (errData) {
      return [signal?.aborted ? abortReason(signal, errData) : errData, null];
    }

    const [errEnvelope, envelope] = await validator(data, envelopeSchema);
    if (errEnvelope) {
      return [new DecodeError('error response is not an envelope', [], { cause: errEnvelope }), null];
    }

    const [errDecode, payload] = decodeEnvelope(envelope);
    if (errDecode) {
      return [errDecode, null];
    }

    const [errParse, parsed] = await validator(payload, schema);
    if (errParse) {
      return [new DecodeError('error validating result', [], { cause: errParse }), null];
    }

    return [null, parsed];
  }

  #requestOptions(body: unknown, headers?: HeaderOptions): SafeWrap<Error, Omit<FetchOptions, 'method'>> {
    if (body === undefined) {
      return [null, { headers }];
    }

    const [errJson, json] = safeWrap(() => JSON.stringify(body));
    if (errJson) {
      return [new DecodeError('error serializing request body', [], { cause: errJson }), null];
    }

    return [null, { body: json, headers: mergeHeaderOptions({ 'Content-Type': 'application/json' }, headers) }];
  }
}
