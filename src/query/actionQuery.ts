import type { Query, QueryType, ResponseFormat } from '../types/query.js';

export interface ActionQueryOptions {
  /** @default 'xml' */
  responseFormat?: ResponseFormat;
  /** @default 'v1' */
  apiVersion?: string;
}

/**
 * Invokes a named server action, e.g. `getpublickey`, at `{host}/-/item/{apiVersion}/-/actions/{action}`.
 */
export class ActionQuery implements Query {
  readonly queryType: QueryType = 'read';
  readonly responseFormat: ResponseFormat;
  readonly action: string;
  readonly #apiVersion: string;

  constructor(action: string, { responseFormat = 'xml', apiVersion = 'v1' }: ActionQueryOptions = {}) {
    this.action = action;
    this.responseFormat = responseFormat;
    this.#apiVersion = apiVersion;
  }

  buildUri(hostName: string): string {
    return `${hostName}/-/item/${this.#apiVersion}/-/actions/${encodeURIComponent(this.action)}`;
  }
}
