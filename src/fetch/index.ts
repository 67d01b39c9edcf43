/**
 * Fetch entrypoint: exports the default transport and its helpers.
 * @module
 */
export { FetchClient } from './client.js';
export { mergeHeaderOptions } from './utils.js';
