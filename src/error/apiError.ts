import { ClientError } from './clientError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error reported by the API itself: a well-formed envelope with `success: false`.
 * The message is the server's message verbatim.
 */
export class ApiError extends ClientError {
  /** ApiError error-name */
  name = 'ApiError';
  /** API failure kind */
  readonly kind = 'api';
}

/**
 * Type guard for {@link ApiError}.
 */
export function isApiError(error: unknown): error is ApiError {
  return isErrorType(ApiError, error);
}

/**
 * Extract an {@link ApiError} from an unknown error value, following nested causes.
 */
export function getApiError(error: unknown): ApiError | null {
  return unwrapErrorType(ApiError, error);
}
