/** Operation a query performs against the item web API. */
export type QueryType = 'read' | 'create' | 'update' | 'delete';

/** Body format requested from, and parsed out of, the server. */
export type ResponseFormat = 'json' | 'xml';

/** Caller-supplied description of one API operation. */
export interface Query {
  readonly queryType: QueryType;
  readonly responseFormat: ResponseFormat;
  /** Builds the absolute target URI against a normalized host name (e.g. `http://cms.example.com`). */
  buildUri(hostName: string): string;
}

/** Query that creates or updates items, carrying the field values to send. */
export interface MutationQuery extends Query {
  readonly queryType: 'create' | 'update';
  /** Field name to value map, sent form-url-encoded. */
  readonly fieldsToUpdate: Readonly<Record<string, string>>;
}
