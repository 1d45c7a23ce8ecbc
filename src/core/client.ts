import { type ConfigStore, defaultConfigStore, setBaseURL } from '../config/store.js';
import { ResponseError, statusOf } from '../error/responseError.js';
import { TransportError } from '../error/transportError.js';
import { FetchClient } from '../fetch/client.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import type {
  Config,
  FetchClientOptions,
  FetchClientProvider,
  FetchClientProviderDefinition,
  HttpMethod,
} from '../types/request.js';
import { constructUrl } from '../utils/constructUrl.js';
import { encodePayload } from '../utils/encodePayload.js';
import { getResponseData } from '../utils/getResponseData.js';
import { getDefaultLogger, type Logger } from '../utils/logger.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import type { HeaderSet, RequestOptions, RequestService } from './types.js';

/** Configuration for constructing a {@link RequestClient}. */
export interface RequestClientProps {
  /** Store the base URL is read from on every request. Defaults to the process-wide store. */
  configStore?: ConfigStore;
  /** HTTP client implementation used for requests. Defaults to {@link FetchClient}. */
  fetchProvider?: FetchClientProvider;
  /** Defaults handed to the provider (credentials, mode). */
  fetchOpts?: FetchClientOptions;
  /** Logger for request tracing. Defaults to a shared silent pino logger. */
  logger?: Logger;
}

/** Header every request starts from. */
const DEFAULT_HEADERS = { 'Content-Type': 'application/json' } as const;

/** Inclusive range of status codes treated as success. */
const SUCCESS_STATUS_MIN = 200;
const SUCCESS_STATUS_MAX = 204;

/**
 * HTTP client that:
 * - resolves URLs as base URL + endpoint,
 * - layers injected headers over `Content-Type: application/json`,
 * - sends JSON payloads through a pluggable provider,
 * - accepts only status codes 200-204 and decodes the body as JSON.
 *
 * Every request method returns an error-first tuple via {@link SafeWrapAsync}; nothing throws.
 *
 * @example
 * setBaseURL('https://example.com/api/');
 * const [err, user] = await new RequestClient()
 *   .insertHeader({ Authorization: 'Bearer test-token' })
 *   .makeRequest<User>('post', 'users', { name: 'John Doe' });
 */
export class RequestClient implements RequestService {
  /** Underlying fetch-capable HTTP provider instance. */
  #fetchClient: FetchClientProviderDefinition;
  /** Source of the base URL. */
  #configStore: ConfigStore;
  /** Headers layered over the defaults, if any. */
  #headers?: HeaderSet;
  #logger: Logger;

  /**
   * Sets the process-wide base URL read by every client without its own store.
   */
  static setBaseURL(url: string): void {
    setBaseURL(url);
  }

  constructor({
    configStore = defaultConfigStore,
    fetchProvider = FetchClient,
    fetchOpts,
    logger = getDefaultLogger(),
  }: RequestClientProps = {}) {
    this.#configStore = configStore;
    this.#logger = logger;
    this.#fetchClient = new fetchProvider({ ...fetchOpts });
  }

  /**
   * Updates provider options at runtime.
   */
  config(opts: Config): void {
    if (opts.fetchOpts) {
      this.#fetchClient.config(opts.fetchOpts);
    }
  }

  /**
   * Replaces the headers sent with every following request. Passing nothing,
   * `null` or `{}` leaves only the default `Content-Type`.
   *
   * @returns This client, for chaining.
   */
  insertHeader(headers?: HeaderSet | null): this {
    this.#headers = headers && Object.keys(headers).length > 0 ? { ...headers } : undefined;
    return this;
  }

  /**
   * Performs a request and decodes the JSON response.
   *
   * - URL is the base URL concatenated with `endpoint`, unchanged.
   * - `payload`, unless `undefined`, is sent as a JSON body.
   * - Status codes outside 200-204 fail with a {@link ResponseError}.
   *
   * @typeParam ResultType - Decoded response type, inferred from `opts.schema` when given.
   * @typeParam PayloadType - Request payload type.
   * @returns A promise resolving to `[error, data]`, where the error is one of
   *          `ConstructURLError`, `EncodingError`, `TransportError`, `ResponseError` or `DecodingError`.
   *          Headers `fetch` cannot send (invalid names, values outside Latin-1) fail as a `TransportError`
   *          before the provider is called.
   */
  async makeRequest<ResultType = unknown, PayloadType = unknown>(
    method: HttpMethod,
    endpoint: string,
    payload?: PayloadType,
    opts: RequestOptions<ResultType> = {},
  ): SafeWrapAsync<Error, ResultType> {
    const verb = method.toUpperCase();

    const [errUrl, url] = constructUrl(this.#configStore.baseUrl, endpoint);
    if (errUrl) {
      this.#logger.debug({ method: verb, url: errUrl.url }, 'malformed request url');
      return [errUrl, null];
    }

    const [errBody, body] = encodePayload(payload);
    if (errBody) {
      this.#logger.debug({ method: verb, url, err: errBody }, 'request payload not encodable');
      return [errBody, null];
    }

    const [errHeaders, headers] = safeWrap(() => mergeHeaderOptions(DEFAULT_HEADERS, this.#headers));
    if (errHeaders) {
      this.#logger.debug({ method: verb, url, err: errHeaders }, 'request headers rejected');
      return [new TransportError(method, url, `error building ${verb} request headers`, { cause: errHeaders }), null];
    }

    this.#logger.debug({ method: verb, url }, 'sending request');
    const [errWrapped, wrapped] = await safeWrapAsync(() =>
      this.#fetchClient[method](url, {
        headers,
        body,
        ...(opts.signal && { signal: opts.signal }),
      }),
    );
    if (errWrapped) {
      this.#logger.debug({ method: verb, url, err: errWrapped }, 'transport threw');
      return [new TransportError(method, url, `error calling ${verb} request`, { cause: errWrapped }), null];
    }

    const [errTransport, response] = wrapped;
    if (errTransport) {
      this.#logger.debug({ method: verb, url, err: errTransport }, 'transport failed');
      return [new TransportError(method, url, `error in ${verb} request transport`, { cause: errTransport }), null];
    }

    const status = statusOf(response);
    if (status === null) {
      this.#logger.debug({ method: verb, url }, 'response without status');
      return [new ResponseError(response, `error in ${verb} request, response has no status`), null];
    }

    if (status < SUCCESS_STATUS_MIN || status > SUCCESS_STATUS_MAX) {
      this.#logger.debug({ method: verb, url, status }, 'response status rejected');
      return [new ResponseError(response, `error in ${verb} request, status ${status}`), null];
    }

    const [errDecode, result] = await getResponseData(response, opts.schema);
    if (errDecode) {
      this.#logger.debug({ method: verb, url, err: errDecode }, 'response body not decodable');
      return [errDecode, null];
    }

    return [null, result];
  }

  /**
   * Performs a GET request.
   *
   * @deprecated Use `makeRequest('get', endpoint)` instead.
   */
  get<ResultType = unknown>(endpoint: string, opts?: RequestOptions<ResultType>): SafeWrapAsync<Error, ResultType> {
    return this.makeRequest<ResultType>('get', endpoint, undefined, opts);
  }

  /**
   * Performs a POST request with a JSON payload.
   *
   * @deprecated Use `makeRequest('post', endpoint, payload)` instead.
   */
  post<ResultType = unknown, PayloadType = unknown>(
    endpoint: string,
    payload: PayloadType,
    opts?: RequestOptions<ResultType>,
  ): SafeWrapAsync<Error, ResultType> {
    return this.makeRequest<ResultType, PayloadType>('post', endpoint, payload, opts);
  }

  /**
   * Performs a PUT request with a JSON payload.
   *
   * @deprecated Use `makeRequest('put', endpoint, payload)` instead.
   */
  put<ResultType = unknown, PayloadType = unknown>(
    endpoint: string,
    payload: PayloadType,
    opts?: RequestOptions<ResultType>,
  ): SafeWrapAsync<Error, ResultType> {
    return this.makeRequest<ResultType, PayloadType>('put', endpoint, payload, opts);
  }
}
