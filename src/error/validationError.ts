import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when client options or a response payload fail schema validation.
 */
export class ValidationError extends Error {
  /** ValidationError error-name */
  static name = 'ValidationError';
  /** Schema validation issues */
  readonly issues: readonly StandardSchemaV1.Issue[];

  /** Creates a new instance of the ValidationError, listing issue messages in the error message */
  constructor(message: string, issues: readonly StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    const details = issues.map((issue) => formatIssue(issue)).join('; ');
    super(details ? `${message}: ${details}` : message, opts);

    this.issues = issues;
  }
}

function formatIssue(issue: StandardSchemaV1.Issue): string {
  const path = (issue.path ?? [])
    .map((segment) => (typeof segment === 'object' ? segment.key : segment))
    .map(String)
    .join('.');

  return path ? `${path} ${issue.message}` : issue.message;
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
export function getValidationError(error: unknown): ValidationError | null {
  return unwrapErrorType(ValidationError, error);
}
