import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates an input value against a StandardSchemaV1 schema and wraps the result
 * in a tuple-style `[error, value]` response.
 *
 * Behavior:
 * - Calls `schema['~standard'].validate(input)` which may be sync or async.
 * - A throw from the schema (sync or async) becomes a `ValidationError` without issues,
 *   with the thrown error as `cause`.
 * - If the validation result contains `issues`, a `ValidationError` with message
 *   `"error validating data"` and the collected issues is returned.
 * - On successful validation without issues, returns `[null, result.value]`.
 */
export async function validator<Output>(
  input: unknown,
  schema: StandardSchemaV1<unknown, Output>,
): SafeWrapAsync<ValidationError, Output> {
  type ValidationResult = StandardSchemaV1.Result<Output>;

  const [err, pending] = safeWrap<ValidationResult | Promise<ValidationResult>>(() =>
    schema['~standard'].validate(input),
  );
  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  const [errAsync, result] = await safeWrapAsync(() => Promise.resolve(pending));
  if (errAsync) {
    return [new ValidationError('error validating async data', [], { cause: errAsync }), null];
  }

  if (!result || typeof result !== 'object') {
    return [new ValidationError('error validation failed with empty results', []), null];
  }

  if (result.issues) {
    return [new ValidationError('error validating data', result.issues), null];
  }

  return [null, result.value];
}
