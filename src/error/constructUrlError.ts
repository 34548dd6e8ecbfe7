import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a request path cannot be resolved against the client's base URL.
 */
export class ConstructURLError extends Error {
  /** ConstructURLError error-name */
  static name = 'ConstructURLError';
  /** Path as given by the caller */
  #path: string;

  /** Creates a new instance of a ConstructURLError with the path that failed to resolve */
  constructor(message: string, path: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#path = path;
  }

  /** Path that failed to resolve */
  get path(): string {
    return this.#path;
  }
}

/**
 * Extract a {@link ConstructURLError} from an unknown error value, following nested causes.
 */
export function getConstructURLError(error: unknown): ConstructURLError | null {
  return unwrapErrorType(ConstructURLError, error);
}

/**
 * Type guard for {@link ConstructURLError}.
 */
export function isConstructURLError(error: unknown): error is ConstructURLError {
  return isErrorType(ConstructURLError, error);
}
