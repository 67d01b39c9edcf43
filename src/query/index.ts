/**
 * Query entrypoint: concrete queries for the item web API and helpers around query types.
 * @module
 */
export { ActionQuery, type ActionQueryOptions } from './actionQuery.js';
export {
  type ItemMutationOptions,
  ItemMutationQuery,
  type ItemPayload,
  ItemQuery,
  type ItemQueryOptions,
  type ItemScope,
} from './itemQuery.js';
export { isMutation, isMutationQuery, toHttpMethod } from './queryType.js';
