import { isErrorType } from './isErrorType.js';

/**
 * Error raised by the generic `request` entrypoint for a verb it does not dispatch.
 */
export class UnsupportedMethodError extends Error {
  /** UnsupportedMethodError error-name */
  static name = 'UnsupportedMethodError';
  /** The method string as given by the caller */
  #method: string;

  /** Creates a new instance of an UnsupportedMethodError for the rejected method */
  constructor(method: string, message = `error unsupported http method ${method}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#method = method;
  }

  /** The rejected method string */
  get method(): string {
    return this.#method;
  }
}

/**
 * Type guard for {@link UnsupportedMethodError}.
 */
export function isUnsupportedMethodError(error: unknown): error is UnsupportedMethodError {
  return isErrorType(UnsupportedMethodError, error);
}
