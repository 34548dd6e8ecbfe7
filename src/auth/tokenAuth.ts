import type { AuthHeaderBuilder } from './types.js';

/** One-off authentication styles for a single token request. */
export type AuthType = 'bearer' | 'basic' | 'default';

/** Options for {@link TokenAuth}. */
export interface TokenAuthOptions {
  token: string;
  /**
   * Header carrying the token.
   * @default 'token'
   */
  headerName?: string;
  /**
   * Template for the header value; `{}` is replaced by the token, e.g. `Bearer {}`.
   * @default '{}'
   */
  format?: string;
}

/**
 * Static token authentication: the same header on every request.
 *
 * Instances never change. A refreshed token means a new instance via {@link TokenAuth.withToken},
 * so a request that already picked up a builder keeps a consistent header set.
 */
export class TokenAuth implements AuthHeaderBuilder {
  readonly token: string;
  readonly headerName: string;
  readonly format: string;

  constructor({ token, headerName = 'token', format = '{}' }: TokenAuthOptions) {
    this.token = token;
    this.headerName = headerName;
    this.format = format;
  }

  headers(): Record<string, string> {
    return { [this.headerName]: this.format.replace('{}', () => this.token) };
  }

  /** Same header name and format, different token. */
  withToken(token: string): TokenAuth {
    return new TokenAuth({ token, headerName: this.headerName, format: this.format });
  }

  /**
   * Builder for a single request that adds another authentication style on top of the
   * configured header; this instance is untouched.
   *
   * - `bearer`: `Authorization: Bearer <token>`
   * - `basic`: `Authorization: Basic <base64(token)>`
   * - `default`: `token: <token>`
   *
   * The added header wins when its name matches the configured one.
   */
  forAuthType(authType: AuthType): AuthHeaderBuilder {
    const headers = { ...this.headers(), ...authTypeHeaders(this.token, authType) };
    return { headers: () => ({ ...headers }) };
  }
}

function authTypeHeaders(token: string, authType: AuthType): Record<string, string> {
  switch (authType) {
    case 'bearer':
      return { Authorization: `Bearer ${token}` };
    case 'basic':
      return { Authorization: `Basic ${Buffer.from(token, 'utf8').toString('base64')}` };
    case 'default':
      return { token };
  }
}
