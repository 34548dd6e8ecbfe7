import { describe, expect, it } from 'vitest';
import { unwrapErrorType } from './unwrapErrorType.js';

class CustomError extends Error {}

class CustomOtherError extends Error {}

class DifferentError extends Error {}

class SubCustomError extends CustomError {}

describe('unwrapErrorType', () => {
  it('returns null for non-errors', () => {
    expect(unwrapErrorType(CustomError, { foo: 'bar' })).toBeNull();
    expect(unwrapErrorType(CustomError, 'boom')).toBeNull();
    expect(unwrapErrorType(CustomError, undefined)).toBeNull();
  });

  it('returns the error itself when it matches', () => {
    const err = new CustomError('test');

    expect(unwrapErrorType(CustomError, err)).toBe(err);
  });

  it('unwraps 7 layers', () => {
    const err = new CustomError('test');
    let wrapped: Error = err;
    for (let layer = 1; layer <= 7; layer++) {
      wrapped = new Error(`err${layer}`, { cause: wrapped });
    }

    expect(unwrapErrorType(CustomError, wrapped)).toBe(err);
  });

  it('returns the outermost match when the match wraps another error', () => {
    const original = new Error('first');
    const err = new CustomError('test', { cause: original });
    const wrapped1 = new Error('err1', { cause: err });
    const wrapped2 = new CustomOtherError('err2', { cause: wrapped1 });

    expect(unwrapErrorType(CustomError, wrapped2)).toBe(err);
  });

  it('matches subclasses', () => {
    const err = new SubCustomError('test');

    expect(unwrapErrorType(CustomError, new Error('outer', { cause: err }))).toBe(err);
  });

  it('returns null when nothing in the chain matches', () => {
    const err = new DifferentError('err', { cause: new Error('inner') });

    expect(unwrapErrorType(CustomError, new Error('outer', { cause: err }))).toBeNull();
  });

  it('ignores errors that only share the name', () => {
    const err = new DifferentError('boom');
    Object.defineProperty(err, 'name', { value: CustomError.name });

    expect(unwrapErrorType(CustomError, err)).toBeNull();
  });

  it('stops on cyclic cause chains', () => {
    const first = new Error('first');
    const second = new Error('second', { cause: first });
    first.cause = second;

    expect(unwrapErrorType(CustomError, first)).toBeNull();
  });

  it('stops at non-error causes', () => {
    const err = new Error('outer', { cause: { message: 'not an error' } });

    expect(unwrapErrorType(CustomError, err)).toBeNull();
  });
});
