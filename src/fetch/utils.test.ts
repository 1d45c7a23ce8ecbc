import { describe, expect, test } from 'vitest';
import { mergeHeaderOptions } from './utils.js';

const plain = (headers: Headers) => Object.fromEntries(headers.entries());

describe('mergeHeaderOptions', () => {
  test('merge two-dimensional arrays', () => {
    const merged = mergeHeaderOptions([['a', 'b']], [['c', 'd']]);

    expect(plain(merged)).toEqual({ a: 'b', c: 'd' });
  });

  test('last array takes precedence', () => {
    const merged = mergeHeaderOptions([['a', 'b']], [['a', 'd']]);

    expect(plain(merged)).toEqual({ a: 'd' });
  });

  test('merge objects', () => {
    const merged = mergeHeaderOptions({ a: 'b' }, { c: 'd' });

    expect(plain(merged)).toEqual({ a: 'b', c: 'd' });
  });

  test('last objects takes precedence regardless of key casing', () => {
    const merged = mergeHeaderOptions({ 'Content-Type': 'application/json' }, { 'content-type': 'text/plain' });

    expect(merged.get('Content-Type')).toBe('text/plain');
    expect([...merged.keys()]).toEqual(['content-type']);
  });

  test('merge headers', () => {
    const merged = mergeHeaderOptions(new Headers({ a: 'b' }), new Headers({ c: 'd' }));

    expect(plain(merged)).toEqual({ a: 'b', c: 'd' });
  });

  test('merges more than two layers in order', () => {
    const merged = mergeHeaderOptions({ a: '1' }, new Headers({ a: '2', b: '2' }), [['b', '3']]);

    expect(plain(merged)).toEqual({ a: '2', b: '3' });
  });

  test('drops headers explicitly set to undefined/null', () => {
    const merged = mergeHeaderOptions({ keep: '1', remove: '1' }, { remove: null, gone: undefined, added: '2' });

    expect(plain(merged)).toEqual({ keep: '1', added: '2' });
  });

  test('skips absent layers', () => {
    const merged = mergeHeaderOptions(undefined, { a: 'b' }, undefined);

    expect(plain(merged)).toEqual({ a: 'b' });
  });
});
