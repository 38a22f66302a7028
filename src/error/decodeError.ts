import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ClientError } from './clientError.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a response body is not valid JSON, does not have the envelope shape,
 * reports success without a result, or carries a result the target schema rejects.
 */
export class DecodeError extends ClientError {
  /** DecodeError error-name */
  name = 'DecodeError';
  /** Decode failure kind */
  readonly kind = 'decode';
  /** Schema validation issues, empty when the failure happened before validation */
  readonly issues: ReadonlyArray<StandardSchemaV1.Issue>;

  /** Creates a new instance of the DecodeError, with accompanying Issues */
  constructor(message: string, issues: ReadonlyArray<StandardSchemaV1.Issue> = [], opts?: ErrorOptions) {
    super(issues.length > 0 ? `${message}; issues: ${formatIssues(issues)}` : message, opts);
    this.issues = issues;
  }
}

function formatIssues(issues: ReadonlyArray<StandardSchemaV1.Issue>): string {
  return issues
    .map((issue) => {
      const path = (issue.path ?? []).map((segment) =>
        String(typeof segment === 'object' ? segment.key : segment),
      );
      return path.length > 0 ? `${path.join('.')}: ${issue.message}` : issue.message;
    })
    .join(', ');
}

/**
 * Type guard for {@link DecodeError}.
 */
export function isDecodeError(error: unknown): error is DecodeError {
  return isErrorType(DecodeError, error);
}

/**
 * Extract a {@link DecodeError} from an unknown error value, following nested causes.
 */
export function getDecodeError(error: unknown): DecodeError | null {
  return unwrapErrorType(DecodeError, error);
}
