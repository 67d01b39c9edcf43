import { isErrorType } from './isErrorType.js';

/**
 * Error thrown when an operation is called with an argument it cannot work with.
 */
export class InvalidArgumentError extends Error {
  /** InvalidArgumentError error-name */
  static name = 'InvalidArgumentError';
  #argument: string;

  /** Creates a new instance of an InvalidArgumentError naming the offending argument */
  constructor(message: string, argument: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#argument = argument;
  }

  /** Name of the offending argument */
  get argument(): string {
    return this.#argument;
  }
}

/**
 * Type guard for {@link InvalidArgumentError}.
 */
export function isInvalidArgumentError(error: unknown): error is InvalidArgumentError {
  return isErrorType(InvalidArgumentError, error);
}
