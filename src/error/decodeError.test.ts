import { describe, expect, it } from 'vitest';
import { DecodeError, getDecodeError, isDecodeError } from './decodeError.js';

describe('DecodeError', () => {
  it('keeps the message untouched without issues', () => {
    const err = new DecodeError('error parsing json response body');

    expect(err.message).toBe('error parsing json response body');
    expect(err.issues).toEqual([]);
  });

  it('appends issues with their paths', () => {
    const err = new DecodeError('error validating data', [
      { message: 'Expected string, received number', path: ['receivers', 0, 'email'] },
      { message: 'Required', path: [{ key: 'id' }] },
      { message: 'Invalid input' },
    ]);

    expect(err.message).toBe(
      'error validating data; issues: receivers.0.email: Expected string, received number, id: Required, Invalid input',
    );
    expect(err.issues).toHaveLength(3);
  });

  it('is found through nested causes', () => {
    const err = new DecodeError('bad');

    expect(isDecodeError(new Error('outer', { cause: err }))).toBe(true);
    expect(getDecodeError(new Error('outer', { cause: err }))).toBe(err);
    expect(getDecodeError(new Error('outer'))).toBeNull();
  });
});
