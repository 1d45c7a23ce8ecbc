/**
 * Core entrypoint: exports the request client, its contract, and the base URL store.
 * Import from here if you only need the client/types without error helpers.
 * @module
 */

/**
 * Constructor options accepted by {@link RequestClient}.
 */
export type { RequestClientProps } from './client.js';

/**
 * HTTP client that resolves endpoints against a shared base URL, layers injected headers
 * over `Content-Type: application/json`, and decodes JSON responses.
 *
 * All request methods return error-first tuples via {@link SafeWrapAsync}.
 */
export { RequestClient } from './client.js';

/** Public client contract, header set and per-request options. */
export type { HeaderSet, RequestOptions, RequestService } from './types.js';

/** Base URL store and process-wide accessors. */
export { ConfigStore, defaultConfigStore, getBaseURL, setBaseURL } from '../config/store.js';

/** HTTP methods the client issues. */
export { type HttpMethod, Method } from '../types/request.js';
