import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

function formatIssue({ message, path }: StandardSchemaV1.Issue): string {
  const at = path?.map((segment) => String(typeof segment === 'object' ? segment.key : segment)).join('.');
  return at ? `${at}: ${message}` : message;
}

/**
 * Error raised when a payload does not match its standard-schema.
 * The message lists each issue as `path: message`.
 */
export class ValidationError extends Error {
  /** ValidationError error-name */
  static name = 'ValidationError';
  /** Schema validation issues */
  #issues: readonly StandardSchemaV1.Issue[];

  /** Creates a new instance of the ValidationError, issues are summarized in the message */
  constructor(message: string, issues: readonly StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    super(issues.length ? `${message} (${issues.map(formatIssue).join(', ')})` : message, opts);
    this.#issues = issues;
  }

  /** Schema validation issues */
  get issues(): readonly StandardSchemaV1.Issue[] {
    return this.#issues;
  }
}

/**
 * Type guard for {@link ValidationError}.
 */
export function isValidationError(error: unknown): error is ValidationError {
  return isErrorType(ValidationError, error);
}

/**
 * Extract an {@link ValidationError} from an unknown error value, following nested causes.
 */
export function getValidationError(error: unknown): ValidationError | null {
  return unwrapErrorType(ValidationError, error);
}
