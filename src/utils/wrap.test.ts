import { describe, expect, it } from 'vitest';
import { safeWrap, safeWrapAsync, toError } from './wrap.js';

class ParseFailure extends Error {
  name = 'ParseFailure';
}

describe('safeWrap', () => {
  it('returns [null, data] when the function succeeds', () => {
    const [err, data] = safeWrap(() => JSON.parse('{"item":"home"}') as { item: string });

    expect(err).toBeNull();
    expect(data).toEqual({ item: 'home' });
  });

  it('returns [error, null] when the function throws', () => {
    const [err, data] = safeWrap(() => {
      throw new ParseFailure('bad body');
    });

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(ParseFailure);
    expect(err?.message).toBe('bad body');
  });

  it('captures JSON.parse failures as SyntaxError', () => {
    const [err, data] = safeWrap(() => JSON.parse('{ broken'));

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(SyntaxError);
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
    const [err, data] = await safeWrapAsync((): Promise<string> => {
      throw new Error('sync boom before promise');
    });

    expect(data).toBeNull();
    expect(err?.message).toBe('sync boom before promise');
  });

  it('normalizes rejections that are not errors', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.reject('plain string'));

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(Error);
    expect(err?.message).toBe('plain string');
  });
});

describe('toError', () => {
  it('returns errors unchanged', () => {
    const err = new Error('same');

    expect(toError(err)).toBe(err);
  });

  it('wraps other values and keeps them as cause', () => {
    const thrown = { code: 7 };
    const err = toError(thrown);

    expect(err.message).toBe('non-error value thrown');
    expect(err.cause).toBe(thrown);
  });
});
