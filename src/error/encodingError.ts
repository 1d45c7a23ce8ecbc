import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a request payload cannot be encoded as JSON.
 */
export class EncodingError extends Error {
  /** EncodingError error-name */
  static name = 'EncodingError';

  constructor(message: string, opts?: ErrorOptions) {
    super(message, opts);
    this.name = EncodingError.name;
  }
}

/**
 * Type guard for {@link EncodingError}.
 */
export function isEncodingError(error: unknown): error is EncodingError {
  return isErrorType(EncodingError, error);
}

/**
 * Extract an {@link EncodingError} from an unknown error value, following nested causes.
 */
export function getEncodingError(error: unknown): null | EncodingError {
  return unwrapErrorType(EncodingError, error);
}
