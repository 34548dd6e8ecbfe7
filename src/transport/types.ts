import type { FormData } from 'undici';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted wherever headers are merged. `null`/`undefined` values remove a header. */
export type HeaderOptions = Headers | Array<[string, string]> | Record<string, string | null | undefined>;

/** Methods that actually go over the wire; PUT and DELETE are tunnelled through these. */
export type WireMethod = 'GET' | 'POST';

/** A fully resolved outgoing request. */
export interface TransportRequest {
  method: WireMethod;
  url: string;
  headers: Headers;
  /** JSON or URL-encoded text, or a multipart form for uploads */
  body?: string | FormData;
}

/** Raw response as the transport saw it; classification happens in the client. */
export interface TransportResponse {
  status: number;
  /** Multi-valued response headers */
  headers: Headers;
  body: Uint8Array;
  /** Wall-clock time from dispatch until the body was fully read */
  elapsedMs: number;
}

/** Connection-level options for a transport. */
export interface TransportOptions {
  /**
   * Connect timeout in milliseconds; `0` disables it.
   * @default 10000 (undici's default)
   */
  connectTimeout?: number;
  /**
   * Timeout in milliseconds for receiving response headers and for gaps between body chunks; `0` disables it.
   * @default 300000 (undici's default)
   */
  readTimeout?: number;
  /** HTTP proxy, as a URL (`http://proxy.local:8080`) or `host:port`. */
  proxy?: string;
  /**
   * Verify TLS certificates and hostnames.
   * @default true
   */
  verifySSL?: boolean;
}

/** Contract for transports used by the API clients. */
export interface TransportDefinition {
  execute(request: TransportRequest): SafeWrapAsync<Error, TransportResponse>;
  /** Releases pooled connections. */
  close(): Promise<void>;
}

/** Factory signature for constructing transports. */
export interface TransportProvider {
  new (opts: TransportOptions): TransportDefinition;
}
