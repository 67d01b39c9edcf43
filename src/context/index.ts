/**
 * Context entrypoint: the anonymous and authenticated data contexts and their types.
 * @module
 */

export { AuthenticatedDataContext } from './authenticatedDataContext.js';
export { DataContext } from './dataContext.js';
export { AUTH_HEADERS, FORM_CONTENT_TYPE } from './request.js';
export type {
  AuthenticatedDataContextDefinition,
  AuthenticatedDataContextProps,
  DataContextDefinition,
  DataContextProps,
} from './types.js';
