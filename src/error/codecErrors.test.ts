import { describe, expect, it } from 'vitest';
import { DecodingError, getDecodingError, isDecodingError } from './decodingError.js';
import { EncodingError, getEncodingError, isEncodingError } from './encodingError.js';
import { getTransportError, isTransportError, TransportError } from './transportError.js';

describe('EncodingError', () => {
  it('keeps the cause and is found through wrappers', () => {
    const cause = new TypeError('Do not know how to serialize a BigInt');
    const err = new EncodingError('error encoding payload', { cause });

    expect(err.name).toBe('EncodingError');
    expect(err.cause).toBe(cause);
    expect(isEncodingError(new Error('outer', { cause: err }))).toBe(true);
    expect(getEncodingError(err)).toBe(err);
    expect(isEncodingError(new DecodingError('x'))).toBe(false);
  });
});

describe('DecodingError', () => {
  it('keeps the cause and is found through wrappers', () => {
    const cause = new SyntaxError('Unexpected token');
    const err = new DecodingError('error parsing json', { cause });

    expect(err.name).toBe('DecodingError');
    expect(err.cause).toBe(cause);
    expect(isDecodingError(err)).toBe(true);
    expect(getDecodingError(new Error('outer', { cause: err }))).toBe(err);
  });
});

describe('TransportError', () => {
  it('exposes the method and url of the failed request', () => {
    const cause = new TypeError('fetch failed');
    const err = new TransportError('post', 'https://example.com/api/users', 'error calling POST', { cause });

    expect(err.method).toBe('post');
    expect(err.url).toBe('https://example.com/api/users');
    expect(err.cause).toBe(cause);
    expect(isTransportError(err)).toBe(true);
    expect(getTransportError(new Error('plain'))).toBeNull();
  });
});
