import { describe, expect, it } from 'vitest';
import { safeWrap, safeWrapAsync, toError } from './wrap.js';

class CustomError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CustomError';
  }
}

describe('safeWrap', () => {
  it('returns [null, data] when the function succeeds', () => {
    const [err, data] = safeWrap(() => 42);

    expect(err).toBeNull();
    expect(data).toBe(42);
  });

  it('returns [error, null] when the function throws', () => {
    const [err, data] = safeWrap(() => {
      throw new Error('boom');
    });

    expect(data).toBeNull();
    expect(err?.message).toBe('boom');
  });

  it('keeps the thrown error instance', () => {
    const thrown = new CustomError('custom boom');
    const [err] = safeWrap(() => {
      throw thrown;
    });

    expect(err).toBe(thrown);
  });
});

describe('safeWrapAsync', () => {
  it('returns [null, data] when the promise resolves', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.resolve('ok'));

    expect(err).toBeNull();
    expect(data).toBe('ok');
  });

  it('returns [error, null] when the promise rejects', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.reject(new Error('async boom')));

    expect(data).toBeNull();
    expect(err?.message).toBe('async boom');
  });

  it('returns [error, null] when the factory throws before returning a promise', async () => {
    const [err, data] = await safeWrapAsync<string>(() => {
      throw new Error('sync boom before promise');
    });

    expect(data).toBeNull();
    expect(err?.message).toBe('sync boom before promise');
  });

  it('captures JSON.parse errors inside async function', async () => {
    const [err, data] = await safeWrapAsync<unknown>(async () => {
      await Promise.resolve();
      return JSON.parse('{ value: 123 ');
    });

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(SyntaxError);
  });
});

describe('toError', () => {
  it('returns errors unchanged', () => {
    const err = new CustomError('boom');

    expect(toError(err)).toBe(err);
  });

  it('wraps non-errors and keeps them as cause', () => {
    const err = toError('boom');

    expect(err.message).toBe('non-error thrown: boom');
    expect(err.cause).toBe('boom');
  });
});
