import type { HeaderOptions } from './types.js';

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, string | null | undefined]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers || Array.isArray(headers)) {
    return headers;
  }

  return Object.entries(headers);
}

/**
 * Merges header sets left to right into a single `Headers` instance; later sets win,
 * names compare case-insensitively, and `null`/`undefined` values delete the header.
 */
export function mergeHeaderOptions(...sources: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const source of sources) {
    for (const [key, value] of toEntries(source)) {
      if (value == null) {
        merged.delete(key);
        continue;
      }

      merged.set(key, value);
    }
  }

  return merged;
}

/**
 * Accepts a proxy as either a URL or a bare `host:port`, returning a URL string.
 */
export function normalizeProxy(proxy: string): string {
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(proxy) ? proxy : `http://${proxy}`;
}
