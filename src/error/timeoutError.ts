import { isErrorType } from './isErrorType.js';
import { TransportError } from './transportError.js';

/**
 * Error raised when a request exceeds the configured timeout threshold.
 */
export class TimeoutError extends TransportError {
  /** TimeoutError error-name */
  name = 'TimeoutError';
}

/**
 * Type guard for {@link TimeoutError}.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}
