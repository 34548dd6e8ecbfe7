import type { FormData } from 'undici';
import type { AuthHeaderBuilder } from '../auth/types.js';
import type { HeaderOptions, TransportOptions, TransportProvider } from '../transport/types.js';
import type { JsonCodec } from '../utils/codec.js';
import type { Logger } from '../utils/logger.js';
import type { QueryParams } from '../utils/resolveUrl.js';

/** Methods the clients expose. PUT and DELETE are tunnelled, see {@link ApiClient.put}. */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/** URL-encoded form fields. */
export type FormFields = Record<string, string | number | boolean>;

/** Per-call options accepted by every verb helper. */
export interface RequestOptions {
  /** Headers for this call; they override defaults but never the auth headers. */
  headers?: HeaderOptions;
  /** Query params appended to the resolved URL. */
  params?: QueryParams;
}

/** A file sent by {@link ApiClient.upload}. */
export interface UploadFile {
  filename: string;
  content: string | Uint8Array;
  /**
   * Media type of the part.
   * @default 'application/octet-stream'
   */
  contentType?: string;
}

/** Serialized request body: what goes over the wire and what gets signed. */
export interface OutgoingBody {
  wire: string | FormData;
  signed: string;
  /** Unset for multipart bodies; the transport writes the boundary. */
  contentType?: string;
}

/** A request as the client dispatches it, before URL resolution and header merging. */
export interface OutgoingRequest extends RequestOptions {
  method: HttpMethod;
  path: string;
  body?: OutgoingBody;
}

/** Options shared by every client. */
export interface ApiClientOptions extends TransportOptions {
  /** Base URL requests are resolved against, e.g. `https://api.example.com/v1`. */
  baseUrl: string;
  /** Headers sent with every request. */
  headers?: Record<string, string>;
  /**
   * Value of the `User-Agent` header.
   * @default 'openapi-auth-client/1.0'
   */
  userAgent?: string;
  /** Transport implementation. Defaults to {@link FetchTransport}. */
  transportProvider?: TransportProvider;
  /** Codec for request and response bodies. Defaults to {@link jsonCodec}. */
  codec?: JsonCodec;
  /** Receives debug logs for each request. Defaults to a no-op logger. */
  logger?: Logger;
}

/** Constructor props for {@link ApiClient}. */
export interface ApiClientProps extends ApiClientOptions {
  auth: AuthHeaderBuilder;
}
