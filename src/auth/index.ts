/**
 * Auth entrypoint: header builders for the token and HMAC schemes.
 * @module
 */
export { HmacAuth, type HmacAuthOptions } from './hmacAuth.js';
export { type AuthType, TokenAuth, type TokenAuthOptions } from './tokenAuth.js';
export type { AuthHeaderBuilder, AuthRequest } from './types.js';
