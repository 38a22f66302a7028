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
      throw new CustomError('custom boom');
    });

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(CustomError);
    expect(err?.message).toBe('custom boom');
  });

  it('wraps thrown strings into errors', () => {
    const [err] = safeWrap(() => {
      throw 'plain failure';
    });

    expect(err).toBeInstanceOf(Error);
    expect(err?.message).toBe('plain failure');
    expect(err?.cause).toBe('plain failure');
  });
});

describe('safeWrapAsync', () => {
  it('returns [null, data] when the promise resolves', async () => {
    const [err, data] = await safeWrapAsync(async () => 'ok');

    expect(err).toBeNull();
    expect(data).toBe('ok');
  });

  it('returns [error, null] when the promise rejects', async () => {
    const [err, data] = await safeWrapAsync(async () => {
      throw new Error('async boom');
    });

    expect(data).toBeNull();
    expect(err?.message).toBe('async boom');
  });

  it('catches synchronous throws from the factory', async () => {
    const [err] = await safeWrapAsync(() => {
      throw new CustomError('sync boom');
    });

    expect(err).toBeInstanceOf(CustomError);
  });
});

describe('toError', () => {
  it('keeps errors as they are', () => {
    const err = new Error('same');

    expect(toError(err)).toBe(err);
  });

  it('wraps non-string values with a generic message', () => {
    const err = toError({ code: 7 });

    expect(err.message).toBe('non-error value thrown');
    expect(err.cause).toEqual({ code: 7 });
  });
});
