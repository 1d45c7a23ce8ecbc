import { EncodingError } from '../error/encodingError.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Serializes a request payload to a JSON body.
 *
 * - `undefined` means "no payload" and yields `[null, undefined]`.
 * - A throw from `JSON.stringify` (cycles, BigInt) becomes an `EncodingError` with it as `cause`.
 * - Values JSON cannot represent at all (functions, symbols) stringify to `undefined`,
 *   which is an `EncodingError` too.
 */
export function encodePayload(payload: unknown): SafeWrap<EncodingError, string | undefined> {
  if (payload === undefined) {
    return [null, undefined];
  }

  const [errStringify, body] = safeWrap<string | undefined>(() => JSON.stringify(payload));
  if (errStringify) {
    return [new EncodingError('error encoding payload as json', { cause: errStringify }), null];
  }

  if (body === undefined) {
    return [new EncodingError(`error encoding payload as json, ${typeof payload} has no json form`), null];
  }

  return [null, body];
}
