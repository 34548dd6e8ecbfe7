import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error describing a failed token refresh. Returned from the token manager, never thrown;
 * requests continue with the previous token.
 */
export class RefreshError extends Error {
  /** RefreshError error-name */
  static name = 'RefreshError';
}

/**
 * Extract a {@link RefreshError} from an unknown error value, following nested causes.
 */
export function getRefreshError(error: unknown): RefreshError | null {
  return unwrapErrorType(RefreshError, error);
}

/**
 * Type guard for {@link RefreshError}.
 */
export function isRefreshError(error: unknown): error is RefreshError {
  return isErrorType(RefreshError, error);
}
