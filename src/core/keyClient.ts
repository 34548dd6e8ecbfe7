import { HmacAuth, type HmacAuthOptions } from '../auth/hmacAuth.js';
import type { ValidationError } from '../error/validationError.js';
import type { SignerName } from '../signing/signer.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { ApiClient } from './client.js';
import { keyClientConfigSchema } from './config.js';
import type { ApiClientOptions } from './types.js';

/** Constructor props for {@link KeyClient}. */
export interface KeyClientProps extends ApiClientOptions, HmacAuthOptions {}

/**
 * Client for the key scheme: every request carries `X-Api-Key`, `X-Timestamp`, `X-Nonce`
 * and an HMAC-SHA256 `X-Signature` computed at dispatch.
 *
 * @example
 * const client = new KeyClient({ baseUrl: 'https://api.example.com/v1', apiKey: 'k', apiSecret: 's', signer: 'path' });
 * const [err, user] = await client.get('users/1');
 */
export class KeyClient extends ApiClient {
  #auth: HmacAuth;

  constructor({ apiKey, apiSecret, signer, clock, nonce, ...opts }: KeyClientProps) {
    const auth = new HmacAuth({ apiKey, apiSecret, signer, clock, nonce });
    super({ ...opts, auth });
    this.#auth = auth;
  }

  /** Canonicalization scheme used for signatures. */
  get scheme(): SignerName {
    return this.#auth.scheme;
  }
}

/**
 * Validates untyped options and builds a {@link KeyClient}.
 *
 * @returns `[ValidationError, null]` when the options don't pass {@link keyClientConfigSchema}.
 */
export async function createKeyClient(props: KeyClientProps): SafeWrapAsync<ValidationError, KeyClient> {
  const [err] = await validator(props, keyClientConfigSchema);
  if (err) {
    return [err, null];
  }

  return [null, new KeyClient(props)];
}
