import type { HttpMethod } from '../types/request.js';
import type { MutationQuery, Query, QueryType } from '../types/query.js';

const QUERY_METHODS: Readonly<Record<QueryType, HttpMethod>> = {
  read: 'GET',
  create: 'POST',
  update: 'PUT',
  delete: 'DELETE',
};

/**
 * HTTP verb the item web API expects for a query type.
 */
export function toHttpMethod(queryType: QueryType): HttpMethod {
  return QUERY_METHODS[queryType];
}

/**
 * Whether the query type changes items and therefore needs credentials and a body.
 */
export function isMutation(queryType: QueryType): queryType is MutationQuery['queryType'] {
  return queryType === 'create' || queryType === 'update';
}

/**
 * Type guard for queries carrying fields to send.
 */
export function isMutationQuery(query: Query): query is MutationQuery {
  return (
    isMutation(query.queryType) &&
    'fieldsToUpdate' in query &&
    typeof query.fieldsToUpdate === 'object' &&
    query.fieldsToUpdate !== null
  );
}
