/** Constructor of an error class, as accepted by {@link unwrapErrorType} and `isErrorType`. */
export type ErrorClass<T extends Error> = new (...args: never[]) => T;

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 * Matches on `instanceof`, on `name`, or on a message prefixed with the class name
 * (errors re-created from another error's message keep their type that way).
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  let current: unknown = err;
  while (current instanceof Error) {
    if (current instanceof errorClass) {
      return current;
    }

    if (current.name === errorClass.name || current.message.startsWith(errorClass.name)) {
      // Same class from another module instance, the name is the only thing left to match on
      return current as T;
    }

    current = current.cause;
  }

  return null;
}
