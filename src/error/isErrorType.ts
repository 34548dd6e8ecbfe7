import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Type guard checking whether an unknown error, or anything in its `cause` chain,
 * is an instance of the given error class.
 */
export function isErrorType<T extends Error>(errorClass: new (...args: never[]) => T, err: unknown): boolean {
  return unwrapErrorType(errorClass, err) !== null;
}
