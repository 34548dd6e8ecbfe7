import { type AuthType, TokenAuth, type TokenAuthOptions } from '../auth/tokenAuth.js';
import type { ValidationError } from '../error/validationError.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import { ApiClient } from './client.js';
import { tokenClientConfigSchema } from './config.js';
import type { ApiClientOptions, RequestOptions } from './types.js';

/** Constructor props for {@link TokenClient}. */
export interface TokenClientProps extends ApiClientOptions, TokenAuthOptions {}

/**
 * Client for the token scheme: a static header on every request, `token: <token>` unless
 * `headerName` and `format` say otherwise (e.g. `Authorization` and `Bearer {}`).
 */
export class TokenClient extends ApiClient {
  #auth: TokenAuth;

  constructor({ token, headerName, format, ...opts }: TokenClientProps) {
    const auth = new TokenAuth({ token, headerName, format });
    super({ ...opts, auth });
    this.#auth = auth;
  }

  /** Token currently sent. */
  get token(): string {
    return this.#auth.token;
  }

  /**
   * Switches to a new token. Header name and format stay; requests already dispatched are unaffected.
   */
  refreshToken(token: string): void {
    this.#auth = this.#auth.withToken(token);
    this.useAuth(this.#auth);
  }

  /**
   * GET using another authentication style for this call only.
   *
   * @param authType - `bearer`, `basic` (base64 of the token) or `default` (`token` header).
   */
  getWithAuthType(path: string, authType: AuthType, opts: RequestOptions = {}): SafeWrapAsync<Error, unknown> {
    return this.send({ ...opts, method: 'GET', path }, this.#auth.forAuthType(authType));
  }
}

/**
 * Validates untyped options and builds a {@link TokenClient}.
 *
 * @returns `[ValidationError, null]` when the options don't pass {@link tokenClientConfigSchema}.
 */
export async function createTokenClient(props: TokenClientProps): SafeWrapAsync<ValidationError, TokenClient> {
  const [err] = await validator(props, tokenClientConfigSchema);
  if (err) {
    return [err, null];
  }

  return [null, new TokenClient(props)];
}
