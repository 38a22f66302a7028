import type { StandardSchemaV1 } from '@standard-schema/spec';
import { DecodeError } from '../error/decodeError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates an input value against a StandardSchemaV1 schema and wraps the result
 * in a tuple-style `[error, value]` response.
 *
 * Behavior:
 * - Calls `schema['~standard'].validate(input)` which may be sync or async.
 * - A validator that throws (sync or async) yields a `DecodeError` with the thrown value as `cause`.
 * - A result carrying `issues` yields a `DecodeError` with those issues.
 * - On success, returns `[null, result.value]`.
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
): SafeWrapAsync<DecodeError, StandardSchemaV1.InferOutput<T>> {
  const [err, pending] = safeWrap(() => schema['~standard'].validate(input));
  if (err) {
    return [new DecodeError('error validating on validation start', [], { cause: err }), null];
  }

  const [errAsync, result] = await safeWrapAsync(() => Promise.resolve(pending));
  if (errAsync) {
    return [new DecodeError('error validating async data', [], { cause: errAsync }), null];
  }

  if (!result || typeof result !== 'object') {
    return [new DecodeError('error validation result of wrong type'), null];
  }

  if (result.issues) {
    return [new DecodeError('error validating data', [...result.issues]), null];
  }

  return [null, result.value];
}
