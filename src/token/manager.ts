import { z } from 'zod';
import type { TokenClientProps } from '../core/tokenClient.js';
import { TokenClient } from '../core/tokenClient.js';
import type { RequestOptions } from '../core/types.js';
import { RefreshError } from '../error/refreshError.js';
import { type Logger, noopLogger } from '../utils/logger.js';
import { validator } from '../utils/validator.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Default refresh interval, in seconds. */
export const DEFAULT_REFRESH_INTERVAL = 3600;

const refreshResponseSchema = z.object({ access_token: z.string() });

/** Constructor props for {@link TokenManager}. */
export interface TokenManagerProps extends TokenClientProps {
  /** Endpoint the current token is posted to for a new one. Without it nothing is ever refreshed. */
  refreshUrl?: string;
  /**
   * Seconds a token is used before the next request refreshes it; `0` refreshes before every request.
   * @default 3600
   */
  refreshInterval?: number;
  /** Wall-clock source in epoch milliseconds. Defaults to `Date.now`. */
  clock?: () => number;
}

/** Request options for managed calls. */
export interface ManagedRequestOptions extends RequestOptions {
  /**
   * Refresh the token first when it is due.
   * @default true
   */
  autoRefresh?: boolean;
}

/**
 * Keeps a bearer token fresh for a {@link TokenClient}.
 *
 * The check runs inline before each request; there are no timers. Refreshing POSTs
 * `{ token }` to the refresh URL and expects `{ access_token }` back. A failed refresh
 * leaves the token alone and the request goes out with it.
 */
export class TokenManager {
  #client: TokenClient;
  #refreshUrl: string | undefined;
  /** Seconds */
  #refreshInterval: number;
  #clock: () => number;
  #logger: Logger;
  /** Epoch seconds of the last successful refresh; 0 means never. */
  #lastRefreshTime = 0;
  /** Refresh in flight, shared by concurrent callers. */
  #pending: SafeWrapAsync<RefreshError, string> | null = null;

  constructor({
    refreshUrl,
    refreshInterval = DEFAULT_REFRESH_INTERVAL,
    clock = Date.now,
    headerName = 'Authorization',
    format = 'Bearer {}',
    logger = noopLogger,
    ...opts
  }: TokenManagerProps) {
    this.#client = new TokenClient({ ...opts, headerName, format, logger });
    this.#refreshUrl = refreshUrl || undefined;
    this.#refreshInterval = refreshInterval;
    this.#clock = clock;
    this.#logger = logger;
  }

  /** Underlying client, for calls the manager doesn't wrap. */
  get client(): TokenClient {
    return this.#client;
  }

  /** Token currently sent. */
  get token(): string {
    return this.#client.token;
  }

  /** Epoch seconds of the last successful refresh, `0` if there was none. */
  get lastRefreshTime(): number {
    return this.#lastRefreshTime;
  }

  /** Whether a refresh URL is configured and more than the interval has passed since the last refresh. */
  shouldRefresh(): boolean {
    if (!this.#refreshUrl) {
      return false;
    }

    return this.#nowSeconds() - this.#lastRefreshTime > this.#refreshInterval;
  }

  /**
   * Exchanges the current token for a new one.
   *
   * Concurrent calls share one request. On failure the token and last refresh time stay as they were.
   *
   * @returns `[null, newToken]` or `[RefreshError, null]`; never rejects.
   */
  refresh(): SafeWrapAsync<RefreshError, string> {
    if (!this.#pending) {
      this.#pending = this.#exchange().finally(() => {
        this.#pending = null;
      });
    }

    return this.#pending;
  }

  /** GET, refreshing the token first when due and `autoRefresh` is on. */
  async get(path: string, { autoRefresh = true, ...opts }: ManagedRequestOptions = {}): SafeWrapAsync<Error, unknown> {
    await this.#refreshIfDue(autoRefresh);
    return this.#client.get(path, opts);
  }

  /** POST, refreshing the token first when due and `autoRefresh` is on. */
  async post(
    path: string,
    body: unknown,
    { autoRefresh = true, ...opts }: ManagedRequestOptions = {},
  ): SafeWrapAsync<Error, unknown> {
    await this.#refreshIfDue(autoRefresh);
    return this.#client.post(path, body, opts);
  }

  close(): Promise<void> {
    return this.#client.close();
  }

  async #refreshIfDue(autoRefresh: boolean): Promise<void> {
    if (!autoRefresh || !this.shouldRefresh()) {
      return;
    }

    // failures are logged and returned by refresh; the request goes ahead with the old token
    await this.refresh();
  }

  async #exchange(): SafeWrapAsync<RefreshError, string> {
    const refreshUrl = this.#refreshUrl;
    if (!refreshUrl) {
      return [new RefreshError('error refreshing token: no refresh url configured'), null];
    }

    const [errPost, response] = await this.#client.post(refreshUrl, { token: this.#client.token });
    if (errPost) {
      this.#logger.warn('token refresh failed', { refreshUrl, error: errPost.message });
      return [new RefreshError(`error requesting token refresh from ${refreshUrl}`, { cause: errPost }), null];
    }

    const [errPayload, payload] = await validator(response, refreshResponseSchema);
    if (errPayload) {
      this.#logger.warn('token refresh returned an unexpected payload', { refreshUrl, error: errPayload.message });
      return [new RefreshError(`error reading token refresh response from ${refreshUrl}`, { cause: errPayload }), null];
    }

    this.#client.refreshToken(payload.access_token);
    this.#lastRefreshTime = this.#nowSeconds();
    this.#logger.info('token refreshed', { refreshUrl });

    return [null, payload.access_token];
  }

  #nowSeconds(): number {
    return Math.floor(this.#clock() / 1000);
  }
}
