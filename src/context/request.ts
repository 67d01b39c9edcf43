import { toHttpMethod } from '../query/queryType.js';
import type { QueryType } from '../types/query.js';
import type { ApiRequest } from '../types/request.js';

/** Credential headers the server reads, names are part of the wire contract. */
export const AUTH_HEADERS = {
  userName: 'X-Scitemwebapi-Username',
  password: 'X-Scitemwebapi-Password',
  encrypted: 'X-Scitemwebapi-Encrypted',
} as const;

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

/**
 * Request both contexts start from: verb from the query type, persistent connections off.
 */
export function buildBaseRequest(uri: string, queryType: QueryType): ApiRequest {
  return {
    url: uri,
    method: toHttpMethod(queryType),
    headers: new Headers({ Connection: 'close' }),
  };
}

/**
 * Sets `body` as the UTF-8 encoded request content.
 */
export function attachBody(request: ApiRequest, body: string): ApiRequest {
  request.body = new TextEncoder().encode(body);

  return request;
}
