/**
 * Error entrypoint: exports typed request errors and helpers for identifying and unwrapping error types.
 * Use this when you only need error utilities without the core client.
 * @module
 */

/** Error representing a base URL + endpoint that is not a valid URL. */
/** Extract an {@link ConstructURLError} from an unknown error value, following nested causes. */
/** Type guard for {@link ConstructURLError}. */
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
/** Error raised when a response body cannot be decoded. */
export { DecodingError, getDecodingError, isDecodingError } from './decodingError.js';
/** Error raised when a payload cannot be encoded as JSON. */
export { EncodingError, getEncodingError, isEncodingError } from './encodingError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error representing a response without status, or with a status outside 200-204. */
export { getResponseError, isResponseError, ResponseError, type ResponseErrorKind } from './responseError.js';
/** Error raised when the transport produced no response or could not be called. */
export { getTransportError, isTransportError, TransportError } from './transportError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { unwrapErrorType } from './unwrapErrorType.js';
/** Extracts a {@link ValidationError} from an unknown error value. */
/** Type guard that checks if an error is a {@link ValidationError}. */
/** Schema issues found in a decoded response body. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
