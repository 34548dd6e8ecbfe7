import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Attempts to parse a string as JSON.
 *
 * Never throws: a parse failure comes back as the error half of the tuple, so callers
 * branch on the result instead of catching.
 *
 * @param input - The string to parse.
 * @returns `[null, value]` for valid JSON, `[SyntaxError, null]` otherwise.
 */
export function tryParseJson(input: string): SafeWrap<Error, unknown> {
  return safeWrap<unknown>(() => JSON.parse(input));
}
