import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Generic type guard to check if an unknown error matches a specific error class.
 * Traverses nested `cause` chains.
 */
export function isErrorType<T extends Error>(errorClass: new (...args: never[]) => T, err: unknown): err is T {
  return unwrapErrorType(errorClass, err) !== null;
}
