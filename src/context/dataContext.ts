import type { StandardSchemaV1 } from '@standard-schema/spec';
import { InvalidArgumentError } from '../error/invalidArgumentError.js';
import { InvalidOperationError } from '../error/invalidOperationError.js';
import { FetchClient } from '../fetch/client.js';
import { ActionQuery } from '../query/actionQuery.js';
import { isMutation } from '../query/queryType.js';
import {
  isPublicKeyResponse,
  PUBLIC_KEY_ACTION,
  type PublicKey,
  type PublicKeyResponse,
  publicKeySchema,
} from '../security/publicKey.js';
import type { Query, QueryType, ResponseFormat } from '../types/query.js';
import type { ApiRequest, FetchClientProviderDefinition } from '../types/request.js';
import type { ApiResponse } from '../types/response.js';
import { normalizeHostName } from '../utils/hostName.js';
import { executeRequest } from './execute.js';
import { buildBaseRequest } from './request.js';
import type { DataContextDefinition, DataContextProps } from './types.js';

/**
 * Requests the server's public key through `context`. The response is returned as is,
 * callers narrow it with {@link isPublicKeyResponse}.
 */
export function requestPublicKey(context: DataContextDefinition): Promise<ApiResponse<PublicKey>> {
  return context.getResponse(new ActionQuery(PUBLIC_KEY_ACTION), publicKeySchema);
}

/**
 * Data context for anonymous access: reads and deletes, no credentials.
 *
 * @example
 * const context = new DataContext({ hostName: 'cms.example.com' });
 * const response = await context.getResponse(new ItemQuery('read', { itemPath: '/sitecore/content/home' }));
 * if (response.failure) {
 *   console.error(response.statusCode, response.info.errorMessage);
 * }
 */
export class DataContext implements DataContextDefinition {
  /** Normalized host, scheme included */
  #hostName: string;
  /** Transport every request goes through */
  #fetchClient: FetchClientProviderDefinition;
  #debug: boolean;

  /** Creates a new data context, throws a `ConfigurationError` for unrecognized hosts */
  constructor({ hostName, secure, fetchProvider = FetchClient, fetchOpts = {}, debug = false }: DataContextProps) {
    const [err, normalized] = normalizeHostName(hostName, secure);
    if (err) {
      throw err;
    }

    this.#hostName = normalized;
    this.#fetchClient = new fetchProvider(fetchOpts);
    this.#debug = debug;
  }

  get hostName(): string {
    return this.#hostName;
  }

  get secure(): boolean {
    return this.#hostName.startsWith('https://');
  }

  async buildRequest(uri: string, queryType: QueryType): Promise<ApiRequest> {
    return buildBaseRequest(uri, queryType);
  }

  /**
   * Sends a read or delete query. Create and update queries reject with an `InvalidOperationError`
   * before anything is sent.
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

    if (isMutation(query.queryType)) {
      throw new InvalidOperationError(`${query.queryType} queries must be used with an authenticated data context`);
    }

    const request = await this.buildRequest(query.buildUri(this.#hostName), query.queryType);
    return this.execute(request, query.responseFormat, schema);
  }

  execute<Schema extends StandardSchemaV1>(
    request: ApiRequest,
    responseFormat: ResponseFormat,
    schema: Schema,
  ): Promise<ApiResponse<StandardSchemaV1.InferOutput<Schema>>>;
  execute(request: ApiRequest, responseFormat: ResponseFormat, schema?: StandardSchemaV1): Promise<ApiResponse>;
  execute(request: ApiRequest, responseFormat: ResponseFormat, schema?: StandardSchemaV1): Promise<ApiResponse> {
    return executeRequest({ fetchClient: this.#fetchClient, debug: this.#debug }, request, responseFormat, schema);
  }

  async getPublicKey(): Promise<PublicKeyResponse | null> {
    const response = await requestPublicKey(this);
    return isPublicKeyResponse(response) ? response : null;
  }
}
