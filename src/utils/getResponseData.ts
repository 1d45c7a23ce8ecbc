import type { StandardSchemaV1 } from '@standard-schema/spec';
import { DecodingError } from '../error/decodingError.js';
import type { TransportResponse } from '../types/request.js';
import { validator } from './validator.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Reads the response body and decodes it as JSON into a tuple-style result.
 *
 * Behavior:
 * - The body is read as text; a read failure returns a `DecodingError` with the original error as `cause`.
 * - The text must be JSON regardless of status or `Content-Type`; an empty body is not JSON and
 *   fails the same way as a malformed one.
 * - When a schema is given the parsed value is validated, and the schema output is returned.
 *   Issues return a `DecodingError` whose `cause` is the `ValidationError`.
 */
export async function getResponseData<ReturnValue>(
  response: TransportResponse,
  schema?: StandardSchemaV1<unknown, ReturnValue>,
): SafeWrapAsync<DecodingError, ReturnValue> {
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new DecodingError('error reading response body in getResponseData', { cause: errText }), null];
  }

  const [errJson, json] = safeWrap<unknown>(() => JSON.parse(text));
  if (errJson) {
    return [new DecodingError('error parsing json response body in getResponseData', { cause: errJson }), null];
  }

  // Without a schema the caller's type is taken on trust
  if (!schema) {
    return [null, json as ReturnValue];
  }

  const [errValidate, validated] = await validator(json, schema);
  if (errValidate) {
    return [new DecodingError('error validating response body in getResponseData', { cause: errValidate }), null];
  }

  return [null, validated];
}
