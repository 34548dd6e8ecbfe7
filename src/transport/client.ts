import { Agent, type Dispatcher, fetch, ProxyAgent } from 'undici';
import { TransportError } from '../error/transportError.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import type {
  TransportDefinition,
  TransportOptions,
  TransportRequest,
  TransportResponse,
} from './types.js';
import { normalizeProxy } from './utils.js';

/**
 * Transport over undici's `fetch` that:
 * - owns one dispatcher (an `Agent`, or a `ProxyAgent` when a proxy is configured),
 * - applies connect/read timeouts and the TLS-verification toggle to it,
 * - reads the whole body and reports how long the exchange took,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * Status codes are not interpreted here; a 500 is a successful exchange.
 */
export class FetchTransport implements TransportDefinition {
  /** Dispatcher every request is routed through. */
  #dispatcher: Dispatcher;

  /** Creates a new transport with its own connection pool. */
  constructor(opts: TransportOptions = {}) {
    const tls = {
      rejectUnauthorized: opts.verifySSL !== false,
      ...(opts.connectTimeout !== undefined ? { timeout: opts.connectTimeout } : {}),
    };
    const timeouts =
      opts.readTimeout !== undefined ? { headersTimeout: opts.readTimeout, bodyTimeout: opts.readTimeout } : {};

    this.#dispatcher = opts.proxy
      ? new ProxyAgent({ uri: normalizeProxy(opts.proxy), ...timeouts, requestTls: tls, proxyTls: tls })
      : new Agent({ ...timeouts, connect: tls });
  }

  /**
   * Executes a single request.
   *
   * Errors:
   * - Connection, DNS, TLS and timeout failures come back as {@link TransportError}
   *   with the untouched undici error as `cause`.
   */
  async execute(request: TransportRequest): SafeWrapAsync<Error, TransportResponse> {
    const startedAt = performance.now();

    const [errFetch, res] = await safeWrapAsync(() =>
      fetch(request.url, {
        method: request.method,
        headers: Object.fromEntries(request.headers),
        body: request.body,
        dispatcher: this.#dispatcher,
      }),
    );
    if (errFetch) {
      return [new TransportError(`error executing ${request.method} ${request.url}`, { cause: errFetch }), null];
    }

    const [errBody, buffer] = await safeWrapAsync(() => res.arrayBuffer());
    if (errBody) {
      const message = `error reading response body of ${request.method} ${request.url}`;
      return [new TransportError(message, { cause: errBody }), null];
    }

    const headers = new Headers();
    for (const [key, value] of res.headers) {
      headers.append(key, value);
    }

    return [
      null,
      {
        status: res.status,
        headers,
        body: new Uint8Array(buffer),
        elapsedMs: performance.now() - startedAt,
      },
    ];
  }

  /** Closes the dispatcher, waiting for in-flight requests to finish. */
  close(): Promise<void> {
    return this.#dispatcher.close();
  }
}
