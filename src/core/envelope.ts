import { z } from 'zod';
import { ApiError } from '../error/apiError.js';
import { DecodeError } from '../error/decodeError.js';
import type { SafeWrap } from '../utils/wrap.js';

/** Message used for a failed envelope that carries none. */
export const NO_MESSAGE = 'no message';

/**
 * Wire shape of every API response.
 */
export interface Envelope<T = unknown> {
  success: boolean;
  message?: string | null;
  result?: T | null;
}

/** Structural check for the envelope; the payload is validated separately. */
export const envelopeSchema = z.object({
  success: z.boolean(),
  message: z.string().nullish(),
  result: z.unknown().optional(),
});

/**
 * Maps an envelope onto a result:
 *
 * | success | payload         | outcome                          |
 * |---------|-----------------|----------------------------------|
 * | true    | result present  | `[null, result]`                 |
 * | true    | result missing  | {@link DecodeError}              |
 * | false   | message present | {@link ApiError} with message    |
 * | false   | message missing | {@link ApiError} `"no message"`  |
 *
 * A `null` result counts as missing.
 */
export function decodeEnvelope<T>(envelope: Envelope<T>): SafeWrap<ApiError | DecodeError, T> {
  if (!envelope.success) {
    return [new ApiError(envelope.message ?? NO_MESSAGE), null];
  }

  if (envelope.result === undefined || envelope.result === null) {
    return [new DecodeError('error envelope reported success without a result'), null];
  }

  return [null, envelope.result];
}
