import { describe, expect, it } from 'vitest';
import { constructUrl } from '../utils/constructUrl.js';
import { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';

describe('ConstructURLError', () => {
  it('records the joined URL when no base URL was set', () => {
    const [err] = constructUrl('', 'users/1');

    expect(err).toBeInstanceOf(ConstructURLError);
    expect(err?.url).toBe('users/1');
    expect(err?.name).toBe('ConstructURLError');
  });

  it('records a base URL that is not a URL together with the endpoint', () => {
    const [err] = constructUrl('not a url/', 'users');

    expect(err?.url).toBe('not a url/users');
    expect(err?.cause).toBeInstanceOf(TypeError);
  });

  it('is recognized behind a wrapping error', () => {
    const [err] = constructUrl('', 'users');
    const wrapped = new Error('request failed', { cause: err });

    expect(isConstructURLError(wrapped)).toBe(true);
    expect(getConstructURLError(wrapped)).toBe(err);
  });

  it('is not confused with an unrelated TypeError', () => {
    const err = new Error('request failed', { cause: new TypeError('Invalid URL') });

    expect(isConstructURLError(err)).toBe(false);
    expect(getConstructURLError(err)).toBeNull();
  });
});
