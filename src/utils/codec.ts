import { tryParseJson } from './tryParse.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Stateless JSON codec shared by a client for request and response bodies.
 */
export interface JsonCodec {
  /** Encodes a request payload, failing for values JSON cannot represent. */
  encode(value: unknown): SafeWrap<Error, string>;
  /** Decodes a response body. */
  decode(text: string): SafeWrap<Error, unknown>;
}

/** Default codec backed by `JSON.stringify` / `JSON.parse`. */
export const jsonCodec: JsonCodec = {
  encode(value) {
    const [err, text] = safeWrap<string | undefined>(() => JSON.stringify(value));
    if (err) {
      return [err, null];
    }

    // undefined, functions and symbols have no JSON form
    if (text === undefined) {
      return [new TypeError(`error encoding ${typeof value} as json`), null];
    }

    return [null, text];
  },
  decode(text) {
    return tryParseJson(text);
  },
};
