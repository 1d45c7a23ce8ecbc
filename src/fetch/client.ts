import type { FetchClientOptions, FetchOptions, HttpMethod } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/**
 * Thin wrapper around the native `fetch` API that:
 * - sends requests to absolute URLs resolved by the caller,
 * - merges default and per-request options,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * Status codes are not judged here; any response `fetch` resolves with is returned.
 */
export class FetchClient {
  /** Default fetch options (credentials, mode). */
  #opts: FetchClientOptions;

  /** Creates a new instance of the fetch-client with default options */
  constructor(opts?: FetchClientOptions) {
    this.#opts = opts ?? {};
  }

  /**
   * Updates default fetch options.
   */
  public config(opts: FetchClientOptions) {
    this.#opts = {
      ...this.#opts,
      ...opts,
    };
  }

  /**
   * Executes a GET request. A body is never sent, since `fetch` rejects GET bodies.
   *
   * @param url - Absolute request URL.
   * @param opts - Request options merged with the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  public get(url: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    return this.#request('get', url, { ...opts, body: undefined });
  }

  /**
   * Executes a POST request.
   *
   * @param url - Absolute request URL.
   * @param opts - Request options, `body` usually holding serialized JSON.
   * @returns A promise resolving to `[error, response]`.
   */
  public post(url: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    return this.#request('post', url, opts);
  }

  /**
   * Executes a PUT request.
   *
   * @param url - Absolute request URL.
   * @param opts - Request options, `body` usually holding serialized JSON.
   * @returns A promise resolving to `[error, response]`.
   */
  public put(url: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    return this.#request('put', url, opts);
  }

  /**
   * Executes a DELETE request.
   *
   * @param url - Absolute request URL.
   * @param opts - Request options merged with the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  public delete(url: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    return this.#request('delete', url, opts);
  }

  /**
   * Core request implementation used by all HTTP verb helpers.
   *
   * Network / fetch errors are returned wrapped in `Error` with the original as `cause`.
   */
  async #request(method: HttpMethod, url: string, opts: FetchOptions): SafeWrapAsync<Error, Response> {
    const verb = method.toUpperCase();
    const [err, res] = await safeWrapAsync(() =>
      fetch(url, {
        body: opts.body,
        method: verb,
        mode: this.#opts.mode,
        credentials: this.#opts.credentials,
        headers: mergeHeaderOptions(opts.headers),
        ...(opts.signal && { signal: opts.signal }),
      }),
    );

    if (err) {
      return [new Error(`error wrapping ${verb} request in fetchClient`, { cause: err }), null];
    }

    return [null, res];
  }
}
