import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the request never produced a response: connection refused,
 * DNS or TLS failure, connect/read timeouts. The underlying error is kept as `cause`.
 */
export class TransportError extends Error {
  /** TransportError error-name */
  static name = 'TransportError';
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): TransportError | null {
  return unwrapErrorType(TransportError, error);
}

/**
 * Type guard for {@link TransportError}.
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}
