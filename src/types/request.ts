import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the request pipeline; `null`/`undefined` values drop a key. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null | undefined>;

/**
 * HTTP methods the client can issue.
 */
export type HttpMethod = 'get' | 'post' | 'put' | 'delete';

/** Named members of {@link HttpMethod}, e.g. `Method.POST`. */
export const Method = {
  GET: 'get',
  POST: 'post',
  PUT: 'put',
  DELETE: 'delete',
} as const satisfies Record<string, HttpMethod>;

/** Per-request options handed to a transport provider. */
export interface FetchOptions {
  headers?: HeaderOptions;
  /** Serialized request body, usually JSON. */
  body?: string;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/**
 * The part of a response the client relies on. A WHATWG `Response` satisfies it;
 * `status` is optional because custom transports may fail to report one.
 */
export interface TransportResponse {
  readonly status?: number;
  text(): Promise<string>;
}

/** Defaults a provider applies to every request. */
export interface FetchClientOptions {
  /**
   * Fetch credentials mode.
   * {@link RequestCredentials}
   */
  credentials?: RequestCredentials;
  /** Fetch mode.
   * {@link RequestMode}
   */
  mode?: RequestMode;
}

/**
 * Runtime configuration payload accepted by `RequestClient.config`.
 * - `fetchOpts`: defaults forwarded to the transport provider.
 */
export interface Config {
  fetchOpts?: FetchClientOptions;
}

/** Contract for HTTP client implementations used by RequestClient. */
export interface FetchClientProviderDefinition {
  /** Executes a GET request. */
  get: (url: string, options: FetchOptions) => SafeWrapAsync<Error, TransportResponse>;
  /** Executes a POST request. */
  post: (url: string, options: FetchOptions) => SafeWrapAsync<Error, TransportResponse>;
  /** Executes a PUT request. */
  put: (url: string, options: FetchOptions) => SafeWrapAsync<Error, TransportResponse>;
  /** Executes a DELETE request. */
  delete: (url: string, options: FetchOptions) => SafeWrapAsync<Error, TransportResponse>;
  /** Updates default options for the provider. */
  config: (opts: FetchClientOptions) => void;
}

/** Factory signature for constructing HTTP providers. */
export interface FetchClientProvider {
  /** Creates a new instance of the provider with its default options */
  new (opts?: FetchClientOptions): FetchClientProviderDefinition;
}
