import { createNonce } from '../signing/nonce.js';
import { type ApiKeyCredentials, getSigner, type Signer, type SignerName, signRequest } from '../signing/signer.js';
import type { AuthHeaderBuilder, AuthRequest } from './types.js';

/** Options for {@link HmacAuth}. */
export interface HmacAuthOptions extends ApiKeyCredentials {
  /**
   * Canonicalization scheme, by name or as a custom {@link Signer}.
   * @default 'simple'
   */
  signer?: Signer | SignerName;
  /** Wall-clock source in epoch milliseconds. Defaults to `Date.now`. */
  clock?: () => number;
  /** Nonce source. Defaults to {@link createNonce}. */
  nonce?: () => string;
}

/**
 * HMAC authentication: every request gets a fresh timestamp and nonce and a signature over them.
 * Headers are recomputed on every call.
 */
export class HmacAuth implements AuthHeaderBuilder {
  #credentials: ApiKeyCredentials;
  #signer: Signer;
  #clock: () => number;
  #nonce: () => string;

  constructor({ apiKey, apiSecret, signer = 'simple', clock = Date.now, nonce = createNonce }: HmacAuthOptions) {
    this.#credentials = { apiKey, apiSecret };
    this.#signer = typeof signer === 'string' ? getSigner(signer) : signer;
    this.#clock = clock;
    this.#nonce = nonce;
  }

  /** Name of the canonicalization scheme in use. */
  get scheme(): SignerName {
    return this.#signer.name;
  }

  headers({ method, path, body }: AuthRequest): Record<string, string> {
    const timestamp = this.#signer.timestamp(this.#clock());
    const nonce = this.#nonce();
    const signature = signRequest(this.#signer, this.#credentials, { method, path, timestamp, nonce, body });

    return {
      'X-Api-Key': this.#credentials.apiKey,
      'X-Timestamp': timestamp,
      'X-Nonce': nonce,
      'X-Signature': signature,
      'Content-Type': 'application/json',
    };
  }
}
