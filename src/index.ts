/**
 * Root entrypoint: re-exports the clients, the token manager, signing helpers and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Header builders for the token and HMAC schemes.
 */
export { type AuthHeaderBuilder, type AuthRequest, type AuthType, HmacAuth, TokenAuth } from './auth/index.js';

/**
 * Clients, their options and the config schemas used by the `create*` factories.
 */
export {
  ApiClient,
  type ApiClientOptions,
  type ApiClientProps,
  type ClientConfig,
  clientConfigSchema,
  createKeyClient,
  createTokenClient,
  type FormFields,
  type HttpMethod,
  KeyClient,
  type KeyClientProps,
  keyClientConfigSchema,
  type RequestOptions,
  TokenClient,
  type TokenClientProps,
  tokenClientConfigSchema,
  type UploadFile,
} from './core/index.js';

/**
 * Typed errors and helpers for finding them in cause chains.
 */
export * from './error/index.js';

/**
 * Signature primitives, usable on their own to verify or reproduce signatures.
 */
export {
  type ApiKeyCredentials,
  createNonce,
  getSigner,
  hmacSha256Hex,
  pathSigner,
  type Signer,
  type SignerName,
  type SigningContext,
  sha256Hex,
  signRequest,
  simpleSigner,
} from './signing/index.js';

/**
 * Time-gated bearer token refresh.
 */
export { type ManagedRequestOptions, TokenManager, type TokenManagerProps } from './token/index.js';

/**
 * Transport contract for custom implementations, and the default undici transport.
 */
export {
  FetchTransport,
  type TransportDefinition,
  type TransportOptions,
  type TransportProvider,
  type TransportRequest,
  type TransportResponse,
} from './transport/index.js';

export type { JsonCodec } from './utils/codec.js';
export { jsonCodec } from './utils/codec.js';
export type { Logger } from './utils/logger.js';
export { noopLogger } from './utils/logger.js';
export type { QueryParams } from './utils/resolveUrl.js';
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
