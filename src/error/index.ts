/**
 * Error entrypoint: typed errors raised or captured by the data contexts, and helpers
 * for identifying and unwrapping them from `cause` chains.
 * @module
 */

/** Error thrown for unusable context settings (host name, credentials, secure + encrypted). */
export {
  type ConfigurationSetting,
  ConfigurationError,
  getConfigurationError,
  isConfigurationError,
} from './configurationError.js';
/** Error raised when the public key handshake for encrypted headers fails. */
export { getHandshakeError, HandshakeError, isHandshakeError } from './handshakeError.js';
/** Error representing a non-2xx HTTP response. */
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
/** Error thrown when an operation receives an argument it cannot work with. */
export { InvalidArgumentError, isInvalidArgumentError } from './invalidArgumentError.js';
/** Error thrown when a query needs a context with more capabilities. */
export { InvalidOperationError, isInvalidOperationError } from './invalidOperationError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Error thrown when validation of payloads fails. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
