import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a response body cannot be read, parsed as JSON, or fails the
 * response schema. A schema failure carries a `ValidationError` as `cause`.
 */
export class DecodingError extends Error {
  /** DecodingError error-name */
  static name = 'DecodingError';

  constructor(message: string, opts?: ErrorOptions) {
    super(message, opts);
    this.name = DecodingError.name;
  }
}

/**
 * Type guard for {@link DecodingError}.
 */
export function isDecodingError(error: unknown): error is DecodingError {
  return isErrorType(DecodingError, error);
}

/**
 * Extract a {@link DecodingError} from an unknown error value, following nested causes.
 */
export function getDecodingError(error: unknown): null | DecodingError {
  return unwrapErrorType(DecodingError, error);
}
