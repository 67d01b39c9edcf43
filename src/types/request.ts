import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the fetch wrapper, `null`/`undefined` values remove a header. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null | undefined>;

/** HTTP verbs the item web API understands. */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Transport-neutral request built by a data context.
 * Authentication headers and form bodies are attached to it before it is sent.
 */
export interface ApiRequest {
  /** Absolute request URL. */
  url: string;
  method: HttpMethod;
  headers: Headers;
  /**
   * UTF-8 encoded form body, only present for create/update requests.
   * Transports send its `byteLength` as `Content-Length`, `fetch` does so itself.
   */
  body?: Uint8Array;
}

/** Options to configure a fetch provider. */
export interface FetchClientOptions {
  /** Default headers merged into every request, request headers take precedence. */
  headers?: HeaderOptions;
}

/** Contract for HTTP transports used by the data contexts. */
export interface FetchClientProviderDefinition {
  /**
   * Sends the request. Resolves `[HTTPError, null]` for non-2xx responses and
   * `[Error, null]` when no response was received at all.
   */
  send: (request: ApiRequest) => SafeWrapAsync<Error, Response>;
}

/** Factory signature for constructing HTTP providers. */
export interface FetchClientProvider {
  new (opts?: FetchClientOptions): FetchClientProviderDefinition;
}
