import type { HttpMethod } from '../types/request.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the transport fails to produce a response at all
 * (network down, connection reset, aborted signal), or is never called
 * because the request headers cannot be sent.
 */
export class TransportError extends Error {
  /** TransportError error-name */
  static name = 'TransportError';
  /** Method of the failed request */
  #method: HttpMethod;
  /** URL of the failed request */
  #url: string;

  constructor(method: HttpMethod, url: string, message: string, opts?: ErrorOptions) {
    super(message, opts);
    this.name = TransportError.name;
    this.#method = method;
    this.#url = url;
  }

  get method(): HttpMethod {
    return this.#method;
  }

  get url(): string {
    return this.#url;
  }
}

/**
 * Type guard for {@link TransportError}.
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): null | TransportError {
  return unwrapErrorType(TransportError, error);
}
