import { ConstructURLError } from '../error/constructUrlError.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/** Query parameters appended to a resolved URL; nullish values are skipped. */
export type QueryParams = Record<string, string | number | boolean | null | undefined>;

/**
 * Normalizes a base URL so it ends with exactly one `/`.
 */
export function normalizeBaseUrl(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/`;
}

/**
 * Resolves `path` against `baseUrl` using relative-reference semantics and appends query params.
 *
 * - `users/1` is appended to the base path (`https://api.example.com/v1/` -> `.../v1/users/1`).
 * - `/users/1` replaces the base path (`https://api.example.com/users/1`).
 * - The base keeps scheme and host: a path naming another origin (`https://other.example.com/x`,
 *   `//other.example.com/x`) is a {@link ConstructURLError}.
 */
export function resolveUrl(baseUrl: string, path: string, params?: QueryParams): SafeWrap<ConstructURLError, URL> {
  const [errBase, base] = safeWrap(() => new URL(normalizeBaseUrl(baseUrl)));
  if (errBase) {
    return [new ConstructURLError(`error resolving ${path} against ${baseUrl}`, path, { cause: errBase }), null];
  }

  const [err, url] = safeWrap(() => new URL(path, base));
  if (err) {
    return [new ConstructURLError(`error resolving ${path} against ${baseUrl}`, path, { cause: err }), null];
  }

  if (url.origin !== base.origin) {
    return [new ConstructURLError(`error resolving ${path}: origin differs from ${base.origin}`, path), null];
  }

  for (const [key, value] of Object.entries(params ?? {})) {
    if (value === undefined || value === null) {
      continue;
    }

    url.searchParams.append(key, String(value));
  }

  return [null, url];
}
