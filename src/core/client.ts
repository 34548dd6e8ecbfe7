import { FormData } from 'undici';
import type { AuthHeaderBuilder } from '../auth/types.js';
import { SerializationError } from '../error/serializationError.js';
import { TransportError } from '../error/transportError.js';
import { UnsupportedMethodError } from '../error/unsupportedMethodError.js';
import { FetchTransport } from '../transport/client.js';
import type { TransportDefinition, WireMethod } from '../transport/types.js';
import { mergeHeaderOptions } from '../transport/utils.js';
import { type JsonCodec, jsonCodec } from '../utils/codec.js';
import { getResponseData } from '../utils/getResponseData.js';
import { type Logger, noopLogger } from '../utils/logger.js';
import { normalizeBaseUrl, type QueryParams, resolveUrl } from '../utils/resolveUrl.js';
import { type SafeWrap, type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import type {
  ApiClientProps,
  FormFields,
  HttpMethod,
  OutgoingBody,
  OutgoingRequest,
  RequestOptions,
  UploadFile,
} from './types.js';

/** Default `User-Agent` header value. */
export const DEFAULT_USER_AGENT = 'openapi-auth-client/1.0';

/** Header telling the server which method a tunnelled request stands for. */
export const METHOD_OVERRIDE_HEADER = 'X-HTTP-Method-Override';

const WIRE_METHODS: Record<HttpMethod, WireMethod> = {
  GET: 'GET',
  POST: 'POST',
  PUT: 'POST',
  DELETE: 'GET',
};

/**
 * HTTP client for the OpenAPI backend that:
 * - resolves paths against a base URL,
 * - merges default, per-call and auth headers (auth always wins),
 * - serializes bodies through one shared codec,
 * - maps status codes of 400 and above to {@link HTTPStatusError} and coerces the rest to JSON or text.
 *
 * All methods return error-first tuples via {@link SafeWrapAsync}. Nothing is retried.
 */
export class ApiClient {
  /** Base URL with exactly one trailing slash. */
  #baseUrl: string;
  /** Headers applied to every request. */
  #defaultHeaders: Headers;
  /** Transport owned by this client. */
  #transport: TransportDefinition;
  /** Codec for request and response bodies. */
  #codec: JsonCodec;
  #logger: Logger;
  /** Current auth header builder; replaced wholesale, never mutated. */
  #auth: AuthHeaderBuilder;

  /**
   * Creates a client and the transport it owns.
   *
   * @param props - Base URL, default headers, transport options and the auth header builder.
   */
  constructor({
    baseUrl,
    headers,
    userAgent = DEFAULT_USER_AGENT,
    transportProvider = FetchTransport,
    codec = jsonCodec,
    logger = noopLogger,
    auth,
    connectTimeout,
    readTimeout,
    proxy,
    verifySSL,
  }: ApiClientProps) {
    this.#baseUrl = normalizeBaseUrl(baseUrl);
    this.#defaultHeaders = mergeHeaderOptions({ Accept: 'application/json', 'User-Agent': userAgent }, headers);
    this.#transport = new transportProvider({ connectTimeout, readTimeout, proxy, verifySSL });
    this.#codec = codec;
    this.#logger = logger;
    this.#auth = auth;
  }

  /** Base URL requests are resolved against. */
  get baseUrl(): string {
    return this.#baseUrl;
  }

  /**
   * Performs a GET request.
   *
   * @param path - Path relative to the base URL; a leading `/` replaces the base path.
   * @param opts - Per-call headers and query params.
   * @returns A promise resolving to `[error, data]`, with `data` parsed JSON or plain text.
   */
  get(path: string, opts: RequestOptions = {}): SafeWrapAsync<Error, unknown> {
    return this.send({ ...opts, method: 'GET', path });
  }

  /**
   * Performs a POST request with a JSON body.
   *
   * @param path - Path relative to the base URL.
   * @param body - Payload; fails with {@link SerializationError} before dispatch if it cannot be encoded.
   * @param opts - Per-call headers and query params.
   */
  async post(path: string, body: unknown, opts: RequestOptions = {}): SafeWrapAsync<Error, unknown> {
    const [errBody, encoded] = this.#encodeJson(body, 'POST');
    if (errBody) {
      return [errBody, null];
    }

    return this.send({ ...opts, method: 'POST', path, body: encoded });
  }

  /**
   * Performs a POST request with a URL-encoded form body.
   *
   * The signature, where there is one, covers the JSON encoding of the fields.
   */
  async postForm(path: string, fields: FormFields, opts: RequestOptions = {}): SafeWrapAsync<Error, unknown> {
    const [errSigned, signed] = this.#codec.encode(fields);
    if (errSigned) {
      return [new SerializationError('error encoding form fields in POST', { cause: errSigned }), null];
    }

    const wire = new URLSearchParams(Object.entries(fields).map<[string, string]>(([key, value]) => [key, String(value)]));
    return this.send({
      ...opts,
      method: 'POST',
      path,
      body: { wire: wire.toString(), signed, contentType: 'application/x-www-form-urlencoded' },
    });
  }

  /**
   * Uploads files as a `multipart/form-data` POST, one part per file named `file_<index>`.
   *
   * The multipart body is not signed; a signature covers `''` as for a bodyless request.
   * Any `Content-Type` header, the key scheme's included, is dropped so the transport can
   * write the multipart boundary.
   */
  upload(path: string, files: readonly UploadFile[], opts: RequestOptions = {}): SafeWrapAsync<Error, unknown> {
    const form = new FormData();
    for (const [index, file] of files.entries()) {
      const part = new Blob([file.content], { type: file.contentType ?? 'application/octet-stream' });
      form.append(`file_${index}`, part, file.filename);
    }

    return this.send({ ...opts, method: 'POST', path, body: { wire: form, signed: '' } });
  }

  /**
   * Performs a PUT, sent as a POST carrying `X-HTTP-Method-Override: PUT`.
   */
  async put(path: string, body: unknown, opts: RequestOptions = {}): SafeWrapAsync<Error, unknown> {
    const [errBody, encoded] = this.#encodeJson(body, 'PUT');
    if (errBody) {
      return [errBody, null];
    }

    return this.send({ ...opts, method: 'PUT', path, body: encoded });
  }

  /**
   * Performs a DELETE, sent as a GET carrying `X-HTTP-Method-Override: DELETE`.
   */
  delete(path: string, opts: RequestOptions = {}): SafeWrapAsync<Error, unknown> {
    return this.send({ ...opts, method: 'DELETE', path });
  }

  /**
   * Generic entrypoint dispatching on a method string (case-insensitive).
   *
   * A missing body for POST/PUT is sent as `{}`. Methods other than GET, POST, PUT and DELETE
   * fail with {@link UnsupportedMethodError}.
   */
  async request(method: string, path: string, body?: unknown, params?: QueryParams): SafeWrapAsync<Error, unknown> {
    switch (method.toUpperCase()) {
      case 'GET':
        return this.get(path, { params });
      case 'POST':
        return this.post(path, body ?? {}, { params });
      case 'PUT':
        return this.put(path, body ?? {}, { params });
      case 'DELETE':
        return this.delete(path, { params });
      default:
        return [new UnsupportedMethodError(method), null];
    }
  }

  /** Releases the transport's pooled connections. */
  close(): Promise<void> {
    return this.#transport.close();
  }

  /** Replaces the auth header builder used for subsequent requests. */
  protected useAuth(auth: AuthHeaderBuilder): void {
    this.#auth = auth;
  }

  /**
   * Core request implementation used by all verb helpers.
   *
   * - Resolves the URL and maps the method to what goes over the wire.
   * - Merges headers: defaults, body content type, method override, per-call, then auth.
   * - Delegates to the transport and classifies the response.
   *
   * Errors:
   * - {@link ConstructURLError} when the path doesn't resolve or names another origin.
   * - {@link TransportError} when no response arrived (the transport's own error is passed through).
   * - {@link HTTPStatusError} for status 400 and above.
   *
   * @param request - Method, path, options and serialized body.
   * @param auth - Builder for this request only; defaults to the client's current one.
   */
  protected async send(request: OutgoingRequest, auth: AuthHeaderBuilder = this.#auth): SafeWrapAsync<Error, unknown> {
    const { method, path, params, body } = request;
    const [errUrl, url] = resolveUrl(this.#baseUrl, path, params);
    if (errUrl) {
      return [errUrl, null];
    }

    const wireMethod = WIRE_METHODS[method];
    const headers = mergeHeaderOptions(
      this.#defaultHeaders,
      body?.contentType ? { 'Content-Type': body.contentType } : undefined,
      wireMethod !== method ? { [METHOD_OVERRIDE_HEADER]: method } : undefined,
      request.headers,
      auth.headers({ method, path: `${url.pathname}${url.search}`, body: body?.signed ?? '' }),
    );

    if (body?.wire instanceof FormData) {
      headers.delete('Content-Type');
    }

    this.#logger.debug('dispatching request', { method, wireMethod, url: url.toString() });

    const [errExecute, executed] = await safeWrapAsync(() =>
      this.#transport.execute({ method: wireMethod, url: url.toString(), headers, body: body?.wire }),
    );
    if (errExecute) {
      return [new TransportError(`error calling transport for ${method} ${url}`, { cause: errExecute }), null];
    }

    const [errTransport, response] = executed;
    if (errTransport) {
      this.#logger.debug('request failed without response', { method, url: url.toString(), error: errTransport.message });
      return [errTransport, null];
    }

    const [errStatus, data] = getResponseData(response, this.#codec);
    this.#logger.debug('request completed', {
      method,
      url: url.toString(),
      status: response.status,
      elapsedMs: response.elapsedMs,
    });

    if (errStatus) {
      return [errStatus, null];
    }

    return [null, data];
  }

  /** Encodes a JSON body, mapping codec failures to {@link SerializationError}. */
  #encodeJson(body: unknown, method: HttpMethod): SafeWrap<SerializationError, OutgoingBody> {
    const [err, text] = this.#codec.encode(body);
    if (err) {
      return [new SerializationError(`error encoding request body in ${method}`, { cause: err }), null];
    }

    return [null, { wire: text, signed: text, contentType: 'application/json' }];
  }
}
