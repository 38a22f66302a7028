import { isErrorType } from './isErrorType.js';
import { TransportError } from './transportError.js';

/**
 * Error raised when a request is intentionally aborted, through a caller's
 * AbortSignal or by disposing the client.
 */
export class AbortError extends TransportError {
  /** AbortError error-name */
  name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}
