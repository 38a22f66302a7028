/**
 * Error entrypoint: exports the classified client errors and helpers for identifying and unwrapping them.
 * Use this when you only need error utilities without the client.
 * @module
 */

/** Error thrown when a request is aborted via AbortSignal or client disposal. */
export { AbortError, isAbortError } from './abortError.js';
/** Error reported by the API through a `success: false` envelope. */
export { ApiError, getApiError, isApiError } from './apiError.js';
/** Base class, kinds and chain helpers for every classified failure. */
export { ClientError, type ClientErrorKind, describeError, getClientError, getErrorKind } from './clientError.js';
/** Error raised for invalid client setup. */
export { ConfigurationError, getConfigurationError, isConfigurationError } from './configurationError.js';
/** Error raised for bodies that are not the expected envelope or payload. */
export { DecodeError, getDecodeError, isDecodeError } from './decodeError.js';
/** Error representing a non-2xx HTTP response. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error thrown when a request exceeds the configured timeout. */
export { isTimeoutError, TimeoutError } from './timeoutError.js';
/** Error raised when a request produced no response at all. */
export { getTransportError, isTransportError, TransportError } from './transportError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
