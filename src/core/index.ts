/**
 * Core entrypoint: the request pipeline, envelope decoding and pagination, without resources.
 * @module
 */
export { type RequestClientProps, RequestClient } from './client.js';
export { decodeEnvelope, type Envelope, envelopeSchema, NO_MESSAGE } from './envelope.js';
export { type PageFetcher, type PageRequest, Paginator, type PullResult } from './paginator.js';
export type {
  CallOptions,
  HttpMethod,
  Infer,
  ListQuery,
  PaginateOptions,
  PaginationKey,
  QueryParams,
  QueryValue,
  RequestOptions,
} from './types.js';
