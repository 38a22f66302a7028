import { ClientError } from './clientError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a request never produced a response: DNS, connection or TLS failures,
 * and (through its subclasses) timeouts and aborts.
 */
export class TransportError extends ClientError {
  /** TransportError error-name */
  name = 'TransportError';
  /** Transport failure kind */
  readonly kind = 'transport';
}

/**
 * Type guard for {@link TransportError}, subclasses included.
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): TransportError | null {
  return unwrapErrorType(TransportError, error);
}
