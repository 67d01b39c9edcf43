import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ConfigurationError } from '../error/configurationError.js';
import { HandshakeError, isHandshakeError } from '../error/handshakeError.js';
import { InvalidArgumentError } from '../error/invalidArgumentError.js';
import { InvalidOperationError } from '../error/invalidOperationError.js';
import { isMutation, isMutationQuery, toHttpMethod } from '../query/queryType.js';
import { type Credentials, validateCredentials } from '../security/credentials.js';
import { encryptHeaderValue } from '../security/encryptHeaderValue.js';
import { isPublicKeyResponse, type PublicKeyResponse } from '../security/publicKey.js';
import type { Query, QueryType, ResponseFormat } from '../types/query.js';
import type { ApiRequest } from '../types/request.js';
import type { ApiResponse } from '../types/response.js';
import { serializeFields } from '../utils/serializeFields.js';
import { safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { DataContext, requestPublicKey } from './dataContext.js';
import { failureResponse, reportFailure } from './execute.js';
import { AUTH_HEADERS, attachBody, buildBaseRequest, FORM_CONTENT_TYPE } from './request.js';
import type { AuthenticatedDataContextDefinition, AuthenticatedDataContextProps, DataContextProps } from './types.js';

/**
 * Data context that authenticates every request with the credential headers and can
 * create and update items.
 *
 * With `credentials.encryptHeaders` the user name and password are encrypted with the server's
 * RSA public key, fetched anonymously before each authenticated request. That only works over
 * plain `http://`, so a secure context with encrypted headers is rejected at construction.
 *
 * @example
 * const context = new AuthenticatedDataContext({
 *   hostName: 'cms.example.com',
 *   credentials: { userName: 'extranet\\editor', password: 'b', encryptHeaders: true },
 * });
 * const response = await context.getResponse(
 *   new ItemMutationQuery('update', { itemPath: '/sitecore/content/home', fieldsToUpdate: { Title: 'Home' } }),
 * );
 */
export class AuthenticatedDataContext implements AuthenticatedDataContextDefinition {
  /** Anonymous context sharing host and transport, sends every request built here */
  #base: DataContext;
  #credentials: Readonly<Credentials>;
  /** Settings for the anonymous contexts the public key is requested through */
  #keyContextProps: Omit<DataContextProps, 'hostName' | 'secure'>;
  #debug: boolean;

  /**
   * Creates a new authenticated data context.
   *
   * Throws an `InvalidOperationError` for encrypted headers on a secure context, and a
   * `ConfigurationError` for an unrecognized host or missing or blank credentials.
   */
  constructor({ credentials, ...props }: AuthenticatedDataContextProps) {
    this.#base = new DataContext(props);

    if (this.#base.secure && credentials?.encryptHeaders === true) {
      throw new InvalidOperationError(
        'encrypted headers cannot be used over a secure connection, the server encrypts the transport',
      );
    }

    const validation = validateCredentials(credentials);
    if (!validation.valid) {
      throw new ConfigurationError(`credentials are invalid: ${validation.reason}`, 'credentials');
    }

    this.#credentials = Object.freeze({
      userName: credentials.userName,
      password: credentials.password,
      encryptHeaders: credentials.encryptHeaders === true,
    });
    this.#keyContextProps = { fetchProvider: props.fetchProvider, fetchOpts: props.fetchOpts, debug: props.debug };
    this.#debug = props.debug ?? false;
  }

  get hostName(): string {
    return this.#base.hostName;
  }

  get secure(): boolean {
    return this.#base.secure;
  }

  get credentials(): Readonly<Credentials> {
    return this.#credentials;
  }

  async applyHeaders(request: ApiRequest): Promise<void> {
    if (this.#credentials.encryptHeaders) {
      return this.applyEncryptedHeaders(request);
    }

    request.headers.set(AUTH_HEADERS.userName, this.#credentials.userName);
    request.headers.set(AUTH_HEADERS.password, this.#credentials.password);
  }

  /**
   * Encrypts user name and password independently with the server's public key.
   * Rejects with a `HandshakeError` when the key cannot be fetched or cannot encrypt.
   */
  async applyEncryptedHeaders(request: ApiRequest): Promise<void> {
    const keyResponse = await requestPublicKey(this.#keyContext());
    if (!isPublicKeyResponse(keyResponse)) {
      throw new HandshakeError('error fetching public key for encrypted headers', keyResponse, {
        cause: keyResponse.failure?.error,
      });
    }

    const key = keyResponse.data;
    const [errEncrypt, encrypted] = safeWrap(() => ({
      userName: encryptHeaderValue(this.#credentials.userName, key),
      password: encryptHeaderValue(this.#credentials.password, key),
    }));
    if (errEncrypt) {
      // A key that passes the schema can still be unusable, e.g. an even or too short modulus
      throw new HandshakeError('error encrypting credential headers with public key', keyResponse, {
        cause: errEncrypt,
      });
    }

    request.headers.set(AUTH_HEADERS.userName, encrypted.userName);
    request.headers.set(AUTH_HEADERS.password, encrypted.password);
    request.headers.set(AUTH_HEADERS.encrypted, '1');
  }

  /**
   * Builds an authenticated request. POST and PUT requests are sent as form content,
   * `body` (already form-url-encoded) becomes the UTF-8 request body when given.
   */
  async buildRequest(uri: string, queryType: QueryType, body?: string): Promise<ApiRequest> {
    const request = buildBaseRequest(uri, queryType);
    await this.applyHeaders(request);

    if (request.method === 'POST' || request.method === 'PUT') {
      request.headers.set('Content-Type', FORM_CONTENT_TYPE);
    }

    if (body !== undefined) {
      attachBody(request, body);
    }

    return request;
  }

  /**
   * Sends any query. Create and update queries carry their `fieldsToUpdate` as the body.
   * A failed public key handshake is reported as a failed response instead of rejecting.
   */
  getResponse<Schema extends StandardSchemaV1>(
    query: Query,
    schema: Schema,
  ): Promise<ApiResponse<StandardSchemaV1.InferOutput<Schema>>>;
  getResponse(query: Query, schema?: StandardSchemaV1): Promise<ApiResponse>;
  async getResponse(query: Query, schema?: StandardSchemaV1): Promise<ApiResponse> {
    if (!query) {
      throw new InvalidArgumentError('query cannot be null', 'query');
    }

    const uri = query.buildUri(this.hostName);
    const body = isMutation(query.queryType)
      ? serializeFields(isMutationQuery(query) ? query.fieldsToUpdate : {})
      : undefined;

    const [errBuild, request] = await safeWrapAsync(() => this.buildRequest(uri, query.queryType, body));
    if (errBuild) {
      if (!isHandshakeError(errBuild)) {
        throw errBuild;
      }

      return reportFailure(
        this.#debug,
        toHttpMethod(query.queryType),
        failureResponse({ uri, kind: 'unexpected', error: errBuild }),
      );
    }

    return this.#base.execute(request, query.responseFormat, schema);
  }

  execute<Schema extends StandardSchemaV1>(
    request: ApiRequest,
    responseFormat: ResponseFormat,
    schema: Schema,
  ): Promise<ApiResponse<StandardSchemaV1.InferOutput<Schema>>>;
  execute(request: ApiRequest, responseFormat: ResponseFormat, schema?: StandardSchemaV1): Promise<ApiResponse>;
  execute(request: ApiRequest, responseFormat: ResponseFormat, schema?: StandardSchemaV1): Promise<ApiResponse> {
    return this.#base.execute(request, responseFormat, schema);
  }

  /** Fetches the public key through a fresh anonymous context, never with credentials attached. */
  getPublicKey(): Promise<PublicKeyResponse | null> {
    return this.#keyContext().getPublicKey();
  }

  #keyContext(): DataContext {
    return new DataContext({ ...this.#keyContextProps, hostName: this.hostName });
  }
}
