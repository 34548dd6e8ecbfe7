import { hmacSha256Hex, sha256Hex } from './hmac.js';

/** Key-scheme credentials. */
export interface ApiKeyCredentials {
  apiKey: string;
  apiSecret: string;
}

/** Request facts that go into a signature. Built fresh for every request. */
export interface SigningContext {
  method: string;
  /** Path plus query string, e.g. `/v1/items?page=2` */
  path: string;
  timestamp: string;
  nonce: string;
  /** Exact serialized request body, `''` when there is none */
  body: string;
}

/** Names of the supported canonicalization schemes. */
export type SignerName = 'simple' | 'path';

/**
 * A canonicalization scheme. The timestamp unit belongs to the scheme, so a signer
 * both renders the timestamp and builds the string that gets signed.
 */
export interface Signer {
  readonly name: SignerName;
  /** Renders the wall-clock time (epoch milliseconds) the way this scheme expects it. */
  timestamp(nowMs: number): string;
  /** Builds the exact text that gets signed. */
  canonicalize(apiKey: string, ctx: SigningContext): string;
}

/**
 * `apiKey + timestampMillis + nonce + body`. Method and path are not covered.
 */
export const simpleSigner: Signer = {
  name: 'simple',
  timestamp: (nowMs) => String(Math.floor(nowMs)),
  canonicalize: (apiKey, { timestamp, nonce, body }) => `${apiKey}${timestamp}${nonce}${body}`,
};

/**
 * `METHOD + pathWithQuery + apiKey + timestampSeconds + nonce + sha256Hex(body)`.
 *
 * An empty body contributes `''`, not the digest of the empty string.
 */
export const pathSigner: Signer = {
  name: 'path',
  timestamp: (nowMs) => String(Math.floor(nowMs / 1000)),
  canonicalize: (apiKey, { method, path, timestamp, nonce, body }) =>
    `${method.toUpperCase()}${path}${apiKey}${timestamp}${nonce}${body ? sha256Hex(body) : ''}`,
};

const signers: Record<SignerName, Signer> = {
  simple: simpleSigner,
  path: pathSigner,
};

/** Looks up a built-in signer by name. */
export function getSigner(name: SignerName): Signer {
  return signers[name];
}

/**
 * Signs a request: HMAC-SHA256 over the scheme's canonical text, keyed by the API secret.
 * Pure; the same inputs always give the same signature.
 */
export function signRequest(signer: Signer, credentials: ApiKeyCredentials, ctx: SigningContext): string {
  return hmacSha256Hex(credentials.apiSecret, signer.canonicalize(credentials.apiKey, ctx));
}
