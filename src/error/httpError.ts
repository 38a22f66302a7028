import { ClientError } from './clientError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing an HTTP response with a non-2xx status code.
 * The body of the response is never read by the client.
 */
export class HTTPError extends ClientError {
  /** HTTPError error-name */
  name = 'HTTPError';
  /** HTTP status failure kind */
  readonly kind = 'http_status';

  /** Response causing the HTTPError */
  #response: Response;

  /** Creates a new instance of a HTTPError with defaulting message + response to wrap */
  constructor(
    response: Response,
    message: string = `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`,
    opts?: ErrorOptions,
  ) {
    super(message, opts);
    this.#response = response;
  }

  /** Status code of the response */
  get status(): number {
    return this.#response.status;
  }

  /**
   * Response causing the HTTPError, cloned so the body stays readable for every caller.
   */
  get response(): Response {
    return this.#response.bodyUsed ? this.#response : this.#response.clone();
  }
}

/**
 * Type guard for {@link HTTPError}.
 */
export function isHttpError(error: unknown): error is HTTPError {
  return isErrorType(HTTPError, error);
}

/**
 * Extract an {@link HTTPError} from an unknown error value, following nested causes.
 */
export function getHttpError(error: unknown): HTTPError | null {
  return unwrapErrorType(HTTPError, error);
}
