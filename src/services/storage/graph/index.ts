/**
 * Graph store barrel
 *
 * @module services/storage/graph
 */

export { GraphStore, DEFAULT_STORAGE_PATH } from './graph-store.js';
export { GraphStoreError, GraphStoreErrorCode } from './types.js';
export type { StoredGraphInfo } from './types.js';
