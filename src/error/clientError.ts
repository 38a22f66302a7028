import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Closed set of failure kinds reported by the client.
 *
 * - `transport`: the request never produced a response (network, timeout, abort).
 * - `http_status`: the server answered with a non-2xx status.
 * - `decode`: the body was not a well-formed envelope, or its payload did not match the schema.
 * - `api`: a well-formed envelope reported `success: false`.
 * - `configuration`: the client or call was set up with invalid values.
 */
export type ClientErrorKind = 'transport' | 'http_status' | 'decode' | 'api' | 'configuration';

/**
 * Base class of every classified failure. Pipeline stages wrap these in plain
 * `Error`s carrying context, so use {@link getClientError} to get back to the
 * classified one.
 */
export abstract class ClientError extends Error {
  /** Discriminant of the failure */
  abstract readonly kind: ClientErrorKind;
}

/**
 * Walks the `cause` chain and returns the first {@link ClientError}, if any.
 */
export function getClientError(error: unknown): ClientError | null {
  return unwrapErrorType(ClientError, error);
}

/**
 * Kind of the classified failure wrapped in `error`, or `null` for foreign errors.
 */
export function getErrorKind(error: unknown): ClientErrorKind | null {
  return getClientError(error)?.kind ?? null;
}

/**
 * Renders an error and its causes as a single line, outermost first.
 * @example
 * describeError(err); // "error doing GET users/abc: HTTP 404 Not Found"
 */
export function describeError(error: unknown): string {
  const messages: string[] = [];
  const seen = new Set<Error>();
  let current: unknown = error;
  while (current instanceof Error) {
    if (seen.has(current)) {
      return messages.join(': ');
    }

    seen.add(current);
    if (current.message) {
      messages.push(current.message);
    }

    current = current.cause;
  }

  if (current !== undefined && current !== null) {
    messages.push(String(current));
  }

  return messages.join(': ');
}
