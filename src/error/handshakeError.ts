import type { ApiResponse } from '../types/response.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when encrypted headers cannot be built because the server's public key
 * could not be fetched or was incomplete.
 */
export class HandshakeError extends Error {
  /** HandshakeError error-name */
  static name = 'HandshakeError';
  #keyResponse: ApiResponse | null;

  /** Creates a new instance of a HandshakeError, keeping the failed public key response when there was one */
  constructor(message: string, keyResponse: ApiResponse | null = null, opts?: ErrorOptions) {
    super(message, opts);
    this.#keyResponse = keyResponse;
  }

  /** Response of the failed public key request, if the request got that far */
  get keyResponse(): ApiResponse | null {
    return this.#keyResponse;
  }
}

/**
 * Type guard for {@link HandshakeError}.
 */
export function isHandshakeError(error: unknown): error is HandshakeError {
  return isErrorType(HandshakeError, error);
}

/**
 * Extract a {@link HandshakeError} from an unknown error value, following nested causes.
 */
export function getHandshakeError(error: unknown): HandshakeError | null {
  return unwrapErrorType(HandshakeError, error);
}
