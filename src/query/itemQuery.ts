import type { MutationQuery, Query, QueryType, ResponseFormat } from '../types/query.js';

/** How much of the tree around the target item a read returns. */
export type ItemScope = 'self' | 'children' | 'parent';

/** How much item data the server includes per item. */
export type ItemPayload = 'min' | 'content' | 'full';

export interface ItemQueryOptions {
  /** Content path, e.g. `/sitecore/content/home`. */
  itemPath?: string;
  /** Item id, sent as `sc_itemid`. Takes precedence on the server over the path. */
  itemId?: string;
  /** Content query expression, sent as `query`. */
  query?: string;
  database?: string;
  language?: string;
  /** Field names to return, sent `|`-separated. */
  fields?: string[];
  scope?: ItemScope[];
  payload?: ItemPayload;
  /** @default 'json' */
  responseFormat?: ResponseFormat;
  /** @default 'v1' */
  apiVersion?: string;
}

/**
 * Read or delete items through the item web API.
 *
 * @example
 * const query = new ItemQuery('read', { itemPath: '/sitecore/content/home', fields: ['Title'] });
 * query.buildUri('http://cms.example.com');
 * // 'http://cms.example.com/-/item/v1/sitecore/content/home?fields=Title'
 */
export class ItemQuery implements Query {
  readonly queryType: QueryType;
  readonly responseFormat: ResponseFormat;
  protected readonly options: ItemQueryOptions;

  constructor(queryType: QueryType, options: ItemQueryOptions = {}) {
    this.queryType = queryType;
    this.responseFormat = options.responseFormat ?? 'json';
    this.options = options;
  }

  buildUri(hostName: string): string {
    const { itemPath = '', itemId, query, database, language, fields, scope, payload, apiVersion = 'v1' } = this.options;
    const path = itemPath
      .split('/')
      .filter(Boolean)
      .map((segment) => encodeURIComponent(segment))
      .join('/');

    const search = new URLSearchParams();
    if (itemId) {
      search.set('sc_itemid', itemId);
    }
    if (query) {
      search.set('query', query);
    }
    if (database) {
      search.set('sc_database', database);
    }
    if (language) {
      search.set('language', language);
    }
    if (fields?.length) {
      search.set('fields', fields.join('|'));
    }
    if (scope?.length) {
      search.set('scope', scope.join('|'));
    }
    if (payload) {
      search.set('payload', payload);
    }

    const base = `${hostName}/-/item/${apiVersion}${path ? `/${path}` : ''}`;
    const queryString = search.toString();
    return queryString ? `${base}?${queryString}` : base;
  }
}

export interface ItemMutationOptions extends ItemQueryOptions {
  /** Field values to write. */
  fieldsToUpdate: Record<string, string>;
  /** Template for new items, sent as `template` (create only). */
  template?: string;
  /** Name for new items, sent as `name` (create only). */
  name?: string;
}

/**
 * Creates an item below `itemPath`, or updates the targeted item, with `fieldsToUpdate`.
 */
export class ItemMutationQuery extends ItemQuery implements MutationQuery {
  declare readonly queryType: 'create' | 'update';
  readonly fieldsToUpdate: Readonly<Record<string, string>>;
  readonly #template?: string;
  readonly #name?: string;

  constructor(queryType: 'create' | 'update', options: ItemMutationOptions) {
    super(queryType, options);
    this.fieldsToUpdate = { ...options.fieldsToUpdate };
    this.#template = options.template;
    this.#name = options.name;
  }

  override buildUri(hostName: string): string {
    const uri = super.buildUri(hostName);
    if (this.queryType !== 'create' || (!this.#template && !this.#name)) {
      return uri;
    }

    const extra = new URLSearchParams();
    if (this.#template) {
      extra.set('template', this.#template);
    }
    if (this.#name) {
      extra.set('name', this.#name);
    }

    return `${uri}${uri.includes('?') ? '&' : '?'}${extra.toString()}`;
  }
}
