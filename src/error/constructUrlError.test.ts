import { describe, expect, it } from 'vitest';
import { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';

describe('ConstructURLError', () => {
  it('exposes path via getter', () => {
    const err = new ConstructURLError('bad url', 'http://[');
    expect(err.path).toBe('http://[');
    expect(err.message).toBe('bad url');
  });
});

describe('isConstructURLError', () => {
  it('returns true for instances of ConstructURLError', () => {
    expect(isConstructURLError(new ConstructURLError('bad url', 'http://['))).toBe(true);
  });

  it('returns false for non ConstructURLError errors', () => {
    expect(isConstructURLError(new Error('boom'))).toBe(false);
  });
});

describe('getConstructURLError', () => {
  it('unwraps nested causes', () => {
    const err = new ConstructURLError('bad url', 'http://[');
    const wrapped = new Error('outer', { cause: err });
    expect(getConstructURLError(wrapped)).toBe(err);
  });

  it('returns null when no ConstructURLError exists', () => {
    const wrapped = new Error('outer', { cause: new Error('inner') });
    expect(getConstructURLError(wrapped)).toBeNull();
  });
});
