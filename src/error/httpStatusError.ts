import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a response with a status code of 400 or above.
 * Carries the raw response body so callers can inspect what the server said.
 */
export class HTTPStatusError extends Error {
  /** HTTPStatusError error-name */
  static name = 'HTTPStatusError';

  /** Status code of the failed response */
  #status: number;
  /** Raw response body, decoded as UTF-8 */
  #body: string;

  /** Creates a new instance of a HTTPStatusError, defaulting the message to `HTTP <status>: <body>` */
  constructor(status: number, body: string, message = `HTTP ${status}: ${body}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#status = status;
    this.#body = body;
  }

  /** Status code of the failed response */
  get status(): number {
    return this.#status;
  }

  /** Raw response body text */
  get body(): string {
    return this.#body;
  }
}

/**
 * Extract an {@link HTTPStatusError} from an unknown error value, following nested causes.
 */
export function getHTTPStatusError(error: unknown): HTTPStatusError | null {
  return unwrapErrorType(HTTPStatusError, error);
}

/**
 * Type guard for {@link HTTPStatusError}.
 */
export function isHTTPStatusError(error: unknown): error is HTTPStatusError {
  return isErrorType(HTTPStatusError, error);
}
