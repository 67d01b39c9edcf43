import { HTTPError } from '../error/httpError.js';
import type { ApiRequest, FetchClientOptions, FetchClientProviderDefinition } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/**
 * Thin wrapper around the native `fetch` API that:
 * - merges default headers into each request,
 * - sends the body bytes as-is (fetch derives `Content-Length` from them),
 * - returns error-first tuples via {@link SafeWrapAsync}.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Default fetch options (headers). */
  #opts: FetchClientOptions;

  /** Creates a new instance of the fetch-client with default options */
  constructor(opts?: FetchClientOptions) {
    this.#opts = opts ?? {};
  }

  /**
   * Sends a built request.
   *
   * Errors:
   * - Network / fetch errors are wrapped in `Error` with the original as `cause`.
   * - Non-2xx responses are wrapped in `HTTPError`, body left unread.
   *
   * @param request - Request built by a data context.
   * @returns A promise resolving to `[error, response]`.
   */
  async send(request: ApiRequest): SafeWrapAsync<Error, Response> {
    const headers = mergeHeaderOptions(this.#opts.headers, request.headers);

    const [err, res] = await safeWrapAsync(() =>
      fetch(request.url, {
        method: request.method,
        headers,
        body: request.body,
      }),
    );

    if (err) {
      return [new Error(`error sending ${request.method} request in fetchClient`, { cause: err }), null];
    }

    if (!res.ok) {
      return [new HTTPError(res, `error in ${request.method} request in fetchClient`), null];
    }

    return [null, res];
  }
}
