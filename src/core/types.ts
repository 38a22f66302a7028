import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { HeaderOptions, HttpMethod } from '../types/request.js';

export type { HttpMethod };

/** Scalar accepted as a query parameter value; `null`/`undefined` are left out of the URL. */
export type QueryValue = string | number | boolean | null | undefined;

/** Open, caller-supplied query parameters. */
export type QueryParams = Record<string, QueryValue>;

/** Query parameters reserved by the paginator. */
export type PaginationKey = 'skip' | 'limit';

/**
 * Query parameters for collection endpoints. `skip` and `limit` are owned by the
 * paginator and rejected at compile time.
 */
export type ListQuery = QueryParams & { [Key in PaginationKey]?: never };

/** Output type of a Standard Schema. */
export type Infer<Schema extends StandardSchemaV1> = StandardSchemaV1.InferOutput<Schema>;

/** Per-call options shared by every operation. */
export interface CallOptions {
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
  /**
   * Request timeout in milliseconds, overriding the client default.
   * `false` disables it for this call.
   */
  timeout?: number | false;
  /** Extra headers merged over the client defaults. */
  headers?: HeaderOptions;
}

/** Options for a single request through the pipeline. */
export interface RequestOptions extends CallOptions {
  /** Query parameters appended to the path. */
  query?: QueryParams;
  /** JSON body, for POST and PUT. */
  body?: unknown;
}

/** Options for a paginated collection. */
export interface PaginateOptions extends CallOptions {
  /** Number of items requested per page, a positive integer. */
  pageSize: number;
  /** Static query parameters sent with every page. */
  query?: ListQuery;
}
