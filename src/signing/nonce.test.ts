import { describe, expect, it } from 'vitest';
import { createNonce } from './nonce.js';

describe('createNonce', () => {
  it('renders 32 lowercase hex characters without separators', () => {
    expect(createNonce()).toMatch(/^[0-9a-f]{32}$/);
  });

  it('differs between calls', () => {
    const nonces = new Set(Array.from({ length: 50 }, () => createNonce()));

    expect(nonces.size).toBe(50);
  });
});
