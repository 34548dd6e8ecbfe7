import { HTTPStatusError } from '../error/httpStatusError.js';
import type { TransportResponse } from '../transport/types.js';
import type { JsonCodec } from './codec.js';
import type { SafeWrap } from './wrap.js';

/**
 * Classifies a transport response and coerces its body.
 *
 * Behavior:
 * - Status 400 and above returns `[HTTPStatusError, null]` carrying the status and raw body text.
 * - Otherwise the body is decoded with the codec; decoded JSON is returned as-is.
 * - A body that isn't JSON (including an empty one) is returned as the plain text.
 *   A non-JSON body never fails the call.
 */
export function getResponseData(response: TransportResponse, codec: JsonCodec): SafeWrap<HTTPStatusError, unknown> {
  const text = new TextDecoder().decode(response.body);

  if (response.status >= 400) {
    return [new HTTPStatusError(response.status, text), null];
  }

  const [errJson, json] = codec.decode(text);
  if (errJson) {
    return [null, text];
  }

  return [null, json];
}
