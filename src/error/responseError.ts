import type { TransportResponse } from '../types/request.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Whether the response had no status at all, or one outside the accepted range. */
export type ResponseErrorKind = 'no-status' | 'bad-status';

/**
 * Error representing a response that was received but not accepted: either it
 * carries no numeric status code, or the status falls outside 200-204.
 */
export class ResponseError extends Error {
  /** ResponseError error-name */
  static name = 'ResponseError';

  /** Response causing the ResponseError */
  #response: TransportResponse;

  /** Creates a new instance of a ResponseError with defaulting message + response to wrap */
  constructor(response: TransportResponse, message?: string, opts?: ErrorOptions) {
    super(message ?? ResponseError.#describe(response), opts);
    this.name = ResponseError.name;
    this.#response = response;
  }

  static #describe(response: TransportResponse): string {
    const status = statusOf(response);
    return status === null ? 'Response Error: no status' : `Response Error: ${status}`;
  }

  get kind(): ResponseErrorKind {
    return statusOf(this.#response) === null ? 'no-status' : 'bad-status';
  }

  /** Status code of the rejected response, `null` when it had no integer status */
  get status(): number | null {
    return statusOf(this.#response);
  }

  /** Response causing the ResponseError */
  get response(): TransportResponse {
    return this.#response;
  }
}

/**
 * Integer status code of a response, or `null` when it is missing or not an integer (`NaN`).
 */
export function statusOf(response: TransportResponse): number | null {
  const { status } = response;
  return status !== undefined && Number.isInteger(status) ? status : null;
}

/**
 * Extracts a {@link ResponseError} from an unknown error value, following nested causes.
 */
export function getResponseError(error: unknown): null | ResponseError {
  return unwrapErrorType(ResponseError, error);
}

/**
 * Type guard for {@link ResponseError}.
 */
export function isResponseError(error: unknown): error is ResponseError {
  return isErrorType(ResponseError, error);
}
