import { describe, expect, test } from 'vitest';
import { mergeHeaderOptions } from './utils.js';

describe('mergeHeaderOptions', () => {
  test('merges two-dimensional arrays', () => {
    const merged = mergeHeaderOptions([['a', 'b']], [['c', 'd']]);

    expect(merged).toEqual(new Headers({ a: 'b', c: 'd' }));
  });

  test('later sources take precedence', () => {
    const merged = mergeHeaderOptions({ 'User-Agent': 'one' }, new Headers({ 'user-agent': 'two' }), [['User-Agent', 'three']]);

    expect(merged.get('user-agent')).toBe('three');
  });

  test('merges objects and headers', () => {
    const merged = mergeHeaderOptions({ a: 'b' }, new Headers({ c: 'd' }));

    expect(merged).toEqual(new Headers({ a: 'b', c: 'd' }));
  });

  test('removes headers explicitly set to null or undefined', () => {
    const merged = mergeHeaderOptions({ keep: '1', remove: 'x' }, { remove: null, added: '2', gone: undefined });

    expect(merged).toEqual(new Headers({ keep: '1', added: '2' }));
    expect(merged.get('remove')).toBeNull();
  });

  test('returns empty headers without sources', () => {
    expect(mergeHeaderOptions(undefined)).toEqual(new Headers());
  });
});
