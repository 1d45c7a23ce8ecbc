/**
 * Root entrypoint: re-exports the core client, transport, types, and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Constructor options accepted by {@link RequestClient}.
 */
export type { RequestClientProps } from './core/client.js';

/**
 * HTTP client with a shared base URL, fluent header injection and a single request method.
 */
export { RequestClient } from './core/client.js';

/**
 * Public client contract, header set and per-request options.
 */
export type { HeaderSet, RequestOptions, RequestService } from './core/types.js';

/**
 * Base URL store; `setBaseURL` writes the process-wide value every default client reads.
 */
export { ConfigStore, defaultConfigStore, getBaseURL, setBaseURL } from './config/store.js';

/**
 * Default transport provider, wrapping the global `fetch`.
 */
export { FetchClient } from './fetch/client.js';

/**
 * Transport contracts and request types.
 */
export type {
  Config,
  FetchClientOptions,
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchOptions,
  HeaderOptions,
  TransportResponse,
} from './types/request.js';

/** HTTP methods the client issues. */
export { type HttpMethod, Method } from './types/request.js';

/** Builds the default pino logger; level from `MINI_REQUEST_LOG_LEVEL`. */
export { createLogger, type Logger } from './utils/logger.js';

/** Error-first tuple types returned by every request method. */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';

/**
 * Error representing a base URL + endpoint that is not a valid URL.
 */
export { ConstructURLError, getConstructURLError, isConstructURLError } from './error/constructUrlError.js';

/**
 * Error raised when a response body cannot be decoded.
 */
export { DecodingError, getDecodingError, isDecodingError } from './error/decodingError.js';

/**
 * Error raised when a payload cannot be encoded as JSON.
 */
export { EncodingError, getEncodingError, isEncodingError } from './error/encodingError.js';

/**
 * Error representing a response without status, or with a status outside 200-204.
 */
export { getResponseError, isResponseError, ResponseError, type ResponseErrorKind } from './error/responseError.js';

/**
 * Error raised when the transport produced no response.
 */
export { getTransportError, isTransportError, TransportError } from './error/transportError.js';

/**
 * Error thrown when validation of payloads fails.
 */
export { getValidationError, isValidationError, ValidationError } from './error/validationError.js';

/** Recursively unwraps nested causes to find a specific error class. */
export { unwrapErrorType } from './error/unwrapErrorType.js';

/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './error/isErrorType.js';
