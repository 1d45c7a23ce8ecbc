import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { HttpMethod } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Headers a client layers over the default `Content-Type: application/json`. */
export type HeaderSet = Record<string, string>;

/** Options for a single request. */
export interface RequestOptions<ResultType> {
  /**
   * Schema the decoded body is validated against; its output becomes the result.
   * Without one, the decoded JSON is returned as `ResultType` unchecked.
   */
  schema?: StandardSchemaV1<unknown, ResultType>;
  /** Abort signal handed to the transport as-is. */
  signal?: AbortSignal;
}

/**
 * Public contract of a request client. `insertHeader` returns the contract so
 * calls chain the same way on any implementation.
 */
export interface RequestService {
  /** Replaces the header set of this client; absent or empty clears it. */
  insertHeader(headers?: HeaderSet | null): RequestService;
  /** Sends one request and decodes its JSON response. */
  makeRequest<ResultType = unknown, PayloadType = unknown>(
    method: HttpMethod,
    endpoint: string,
    payload?: PayloadType,
    opts?: RequestOptions<ResultType>,
  ): SafeWrapAsync<Error, ResultType>;
  /** @deprecated Use `makeRequest('get', endpoint)` instead. */
  get<ResultType = unknown>(endpoint: string, opts?: RequestOptions<ResultType>): SafeWrapAsync<Error, ResultType>;
  /** @deprecated Use `makeRequest('post', endpoint, payload)` instead. */
  post<ResultType = unknown, PayloadType = unknown>(
    endpoint: string,
    payload: PayloadType,
    opts?: RequestOptions<ResultType>,
  ): SafeWrapAsync<Error, ResultType>;
  /** @deprecated Use `makeRequest('put', endpoint, payload)` instead. */
  put<ResultType = unknown, PayloadType = unknown>(
    endpoint: string,
    payload: PayloadType,
    opts?: RequestOptions<ResultType>,
  ): SafeWrapAsync<Error, ResultType>;
}
