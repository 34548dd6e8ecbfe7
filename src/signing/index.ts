/**
 * Signing entrypoint: HMAC helpers and the request canonicalization schemes.
 * @module
 */
export { hmacSha256Hex, sha256Hex } from './hmac.js';
export { createNonce } from './nonce.js';
export type { ApiKeyCredentials, Signer, SignerName, SigningContext } from './signer.js';
export { getSigner, pathSigner, signRequest, simpleSigner } from './signer.js';
