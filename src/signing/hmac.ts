import { createHash, createHmac } from 'node:crypto';

/**
 * HMAC-SHA256 of `message` keyed by `secret`, as 64 lowercase hex characters.
 * An empty secret is a valid HMAC key.
 */
export function hmacSha256Hex(secret: string | Uint8Array, message: string | Uint8Array): string {
  return createHmac('sha256', secret).update(message).digest('hex');
}

/** SHA-256 of `data`, as 64 lowercase hex characters. */
export function sha256Hex(data: string | Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}
