import { isErrorType } from './isErrorType.js';

/**
 * Error thrown when a query is sent through a context that cannot perform it,
 * e.g. a create query on an unauthenticated context, or encrypted headers on a secure one.
 */
export class InvalidOperationError extends Error {
  /** InvalidOperationError error-name */
  static name = 'InvalidOperationError';
}

/**
 * Type guard for {@link InvalidOperationError}.
 */
export function isInvalidOperationError(error: unknown): error is InvalidOperationError {
  return isErrorType(InvalidOperationError, error);
}
