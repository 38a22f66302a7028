import { ClientError } from './clientError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised for invalid client setup: a missing or malformed credential,
 * an unusable base URL or timeout, or an invalid page size.
 */
export class ConfigurationError extends ClientError {
  /** ConfigurationError error-name */
  name = 'ConfigurationError';
  /** Configuration failure kind */
  readonly kind = 'configuration';
  /** Setting (usually the environment variable) at fault, when known */
  readonly setting: string | null;

  /** Creates a new instance of the ConfigurationError, optionally naming the setting at fault */
  constructor(message: string, setting: string | null = null, opts?: ErrorOptions) {
    super(message, opts);
    this.setting = setting;
  }
}

/**
 * Type guard for {@link ConfigurationError}.
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return isErrorType(ConfigurationError, error);
}

/**
 * Extract a {@link ConfigurationError} from an unknown error value, following nested causes.
 */
export function getConfigurationError(error: unknown): ConfigurationError | null {
  return unwrapErrorType(ConfigurationError, error);
}
