import { ConstructURLError } from '../error/constructUrlError.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Joins base URL and endpoint by plain concatenation (no slash normalization) and
 * checks that the result parses as an absolute URL.
 *
 * @example
 * constructUrl('https://example.com/api/', 'users') // [null, 'https://example.com/api/users']
 */
export function constructUrl(baseUrl: string, endpoint: string): SafeWrap<ConstructURLError, string> {
  const joined = `${baseUrl}${endpoint}`;

  const [errParse] = safeWrap(() => new URL(joined));
  if (errParse) {
    const message = `error constructing URL from ${JSON.stringify(joined)}`;
    return [new ConstructURLError(message, joined, { cause: errParse }), null];
  }

  return [null, joined];
}
