import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { Credentials } from '../security/credentials.js';
import type { PublicKeyResponse } from '../security/publicKey.js';
import type { Query, QueryType, ResponseFormat } from '../types/query.js';
import type { ApiRequest, FetchClientOptions, FetchClientProvider } from '../types/request.js';
import type { ApiResponse } from '../types/response.js';

/** Configuration for constructing a {@link DataContextDefinition}. */
export interface DataContextProps {
  /**
   * Host of the content-management server, with or without `http://`/`https://` and trailing slash
   * (e.g. `cms.example.com`, `https://cms.example.com/`, `localhost:8080`).
   */
  hostName: string;
  /**
   * Use `https://`. Defaults to the scheme written in `hostName`, `http://` when there is none.
   */
  secure?: boolean;
  /** HTTP transport implementation. Defaults to `FetchClient`. */
  fetchProvider?: FetchClientProvider;
  /** Options handed to the transport, e.g. default headers. */
  fetchOpts?: FetchClientOptions;
  /**
   * Log one line per request through `console.debug`, and captured failures through `console.warn`.
   * @default false
   */
  debug?: boolean;
}

/** Configuration for constructing an {@link AuthenticatedDataContextDefinition}. */
export interface AuthenticatedDataContextProps extends DataContextProps {
  credentials: Credentials;
}

/**
 * Client-side connection to one host of the item web API.
 *
 * `getResponse` and `execute` never reject for network, HTTP or parse failures; those are reported
 * through the returned {@link ApiResponse}.
 */
export interface DataContextDefinition {
  /** Normalized host, e.g. `http://cms.example.com`. */
  readonly hostName: string;
  /** Whether requests go over `https://`. */
  readonly secure: boolean;
  /** Builds the request for a target URI without sending it. */
  buildRequest(uri: string, queryType: QueryType): Promise<ApiRequest>;
  /** Builds, sends and deserializes a query, validating the payload with `schema`. */
  getResponse<Schema extends StandardSchemaV1>(
    query: Query,
    schema: Schema,
  ): Promise<ApiResponse<StandardSchemaV1.InferOutput<Schema>>>;
  /** Builds, sends and deserializes a query. */
  getResponse(query: Query, schema?: StandardSchemaV1): Promise<ApiResponse>;
  /** Sends a built request and deserializes the body per `responseFormat`, validating it with `schema`. */
  execute<Schema extends StandardSchemaV1>(
    request: ApiRequest,
    responseFormat: ResponseFormat,
    schema: Schema,
  ): Promise<ApiResponse<StandardSchemaV1.InferOutput<Schema>>>;
  /** Sends a built request and deserializes the body per `responseFormat`. */
  execute(request: ApiRequest, responseFormat: ResponseFormat, schema?: StandardSchemaV1): Promise<ApiResponse>;
  /** Fetches the server's RSA public key, `null` when it is unavailable or incomplete. */
  getPublicKey(): Promise<PublicKeyResponse | null>;
}

/**
 * Data context that sends credentials with every request and may create and update items.
 */
export interface AuthenticatedDataContextDefinition extends DataContextDefinition {
  readonly credentials: Readonly<Credentials>;
  /** Builds an authenticated request, with `body` as form-url-encoded content when given. */
  buildRequest(uri: string, queryType: QueryType, body?: string): Promise<ApiRequest>;
  /** Adds the credential headers, encrypted when the credentials ask for it. */
  applyHeaders(request: ApiRequest): Promise<void>;
  /** Adds credential headers encrypted with the server's public key and flags them as encrypted. */
  applyEncryptedHeaders(request: ApiRequest): Promise<void>;
}
