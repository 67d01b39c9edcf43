/**
 * Root entrypoint for contentwire: re-exports the data contexts, queries, security helpers,
 * types, and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/**
 * Data context for anonymous reads and deletes.
 */
export { DataContext } from './context/dataContext.js';

/**
 * Data context that authenticates requests, with plaintext or RSA encrypted credential headers.
 */
export { AuthenticatedDataContext } from './context/authenticatedDataContext.js';

/**
 * Contracts and constructor options of the data contexts.
 */
export type {
  AuthenticatedDataContextDefinition,
  AuthenticatedDataContextProps,
  DataContextDefinition,
  DataContextProps,
} from './context/types.js';

/** Credential header names sent to the server. */
export { AUTH_HEADERS } from './context/request.js';

/**
 * Default `fetch` based transport.
 */
export { FetchClient } from './fetch/client.js';

/**
 * Item and action queries.
 */
export {
  ActionQuery,
  type ActionQueryOptions,
  type ItemMutationOptions,
  ItemMutationQuery,
  type ItemPayload,
  ItemQuery,
  type ItemQueryOptions,
  type ItemScope,
  isMutationQuery,
  toHttpMethod,
} from './query/index.js';

/** Credential checks run when an authenticated context is constructed. */
export { type Credentials, type CredentialValidation, validateCredentials } from './security/credentials.js';

/** RSA encryption of credential header values. */
export { encryptHeaderValue, encryptWithKeyMaterial, type KeyMaterial, toKeyMaterial } from './security/encryptHeaderValue.js';

/** Public key model of the `getpublickey` action. */
export { isPublicKeyResponse, type PublicKey, type PublicKeyResponse, publicKeySchema } from './security/publicKey.js';

/** Query capability shared by all queries. */
export type { MutationQuery, Query, QueryType, ResponseFormat } from './types/query.js';

/** Transport-neutral request and pluggable transport contracts. */
export type {
  ApiRequest,
  FetchClientOptions,
  FetchClientProvider,
  FetchClientProviderDefinition,
  HeaderOptions,
  HttpMethod,
} from './types/request.js';

/** Result of every data context call. */
export type { ApiResponse, FailureKind, ResponseFailure, ResponseInfo } from './types/response.js';

/** Error-first tuples returned by transports. */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';

/**
 * Error thrown for unusable context settings.
 */
export { ConfigurationError, getConfigurationError, isConfigurationError } from './error/configurationError.js';

/**
 * Error raised when the public key handshake for encrypted headers fails.
 */
export { getHandshakeError, HandshakeError, isHandshakeError } from './error/handshakeError.js';

/**
 * Error representing a non-2xx HTTP response.
 */
export { getHttpError, HTTPError, isHttpError } from './error/httpError.js';

/**
 * Error thrown when an operation receives an argument it cannot work with.
 */
export { InvalidArgumentError, isInvalidArgumentError } from './error/invalidArgumentError.js';

/**
 * Error thrown when a context cannot perform an operation, e.g. a create query without credentials.
 */
export { InvalidOperationError, isInvalidOperationError } from './error/invalidOperationError.js';

/**
 * Error thrown when validation of payloads fails.
 */
export { getValidationError, isValidationError, ValidationError } from './error/validationError.js';

/** Recursively unwraps nested causes to find a specific error class. */
export { unwrapErrorType } from './error/unwrapErrorType.js';

/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './error/isErrorType.js';
