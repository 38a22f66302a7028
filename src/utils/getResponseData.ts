import { DecodeError } from '../error/decodeError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Reads a response body and parses it as JSON into a tuple-style result.
 *
 * Every response of the API is a JSON envelope, so the `Content-Type` header is not
 * consulted: an unreadable, empty or non-JSON body is a {@link DecodeError}.
 */
export async function getResponseData(response: Response): SafeWrapAsync<DecodeError, unknown> {
  // Use .text as reader, since a failed .json would leave nothing to report on
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new DecodeError('error reading response body', [], { cause: errText }), null];
  }

  if (!text.trim()) {
    return [new DecodeError(`error empty response body with status ${response.status}`), null];
  }

  const [errJson, json] = safeWrap((): unknown => JSON.parse(text));
  if (errJson) {
    return [new DecodeError('error parsing json response body', [], { cause: errJson }), null];
  }

  return [null, json];
}
