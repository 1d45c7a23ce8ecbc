import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Issues a response schema reported about a decoded body. Callers of
 * `makeRequest` meet it as the `cause` of a `DecodingError`.
 */
export class ValidationError extends Error {
  /** ValidationError error-name */
  static name = 'ValidationError';

  #issues: readonly StandardSchemaV1.Issue[];

  constructor(message: string, issues: readonly StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    super(issues.length > 0 ? `${message} (${issues.map(describeIssue).join('; ')})` : message, opts);
    this.name = ValidationError.name;
    this.#issues = issues;
  }

  /** Issues as the schema reported them; empty when the schema itself failed to run */
  get issues(): readonly StandardSchemaV1.Issue[] {
    return this.#issues;
  }
}

function describeIssue(issue: StandardSchemaV1.Issue): string {
  if (!issue.path || issue.path.length === 0) {
    return issue.message;
  }

  const path = issue.path.map((segment) => String(typeof segment === 'object' ? segment.key : segment)).join('.');
  return `${path}: ${issue.message}`;
}

/**
 * Type guard for {@link ValidationError}.
 */
export function isValidationError(error: unknown): error is ValidationError {
  return isErrorType(ValidationError, error);
}

/**
 * Extract a {@link ValidationError} from an unknown error value, following nested causes.
 */
export function getValidationError(error: unknown): null | ValidationError {
  return unwrapErrorType(ValidationError, error);
}
