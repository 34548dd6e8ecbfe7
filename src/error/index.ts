/**
 * Error entrypoint: exports typed errors and helpers for identifying and unwrapping error types.
 * Use this when you only need error utilities without the clients.
 * @module
 */

/** Error representing a path that cannot be resolved against the base URL. */
/** Extract a {@link ConstructURLError} from an unknown error value, following nested causes. */
/** Type guard for {@link ConstructURLError}. */
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
/** Error representing a response with status 400 or above. */
export { getHTTPStatusError, HTTPStatusError, isHTTPStatusError } from './httpStatusError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error describing a failed token refresh. */
export { getRefreshError, isRefreshError, RefreshError } from './refreshError.js';
/** Error raised when a request body cannot be encoded. */
export { isSerializationError, SerializationError } from './serializationError.js';
/** Error raised when no response arrived: network, TLS, DNS or timeouts. */
export { getTransportError, isTransportError, TransportError } from './transportError.js';
/** Error raised for methods the generic dispatcher doesn't know. */
export { isUnsupportedMethodError, UnsupportedMethodError } from './unsupportedMethodError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { unwrapErrorType } from './unwrapErrorType.js';
/** Error thrown when validation of options or payloads fails. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
