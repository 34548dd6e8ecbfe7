import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a request body cannot be encoded. Nothing is sent when this happens.
 */
export class SerializationError extends Error {
  /** SerializationError error-name */
  static name = 'SerializationError';
}

/**
 * Type guard for {@link SerializationError}.
 */
export function isSerializationError(error: unknown): error is SerializationError {
  return isErrorType(SerializationError, error);
}
