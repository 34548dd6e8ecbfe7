import { v4 as uuidv4 } from 'uuid';

/** A fresh 128-bit random nonce: a v4 UUID without hyphens, 32 lowercase hex characters. */
export function createNonce(): string {
  return uuidv4().replaceAll('-', '');
}
