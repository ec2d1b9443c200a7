/**
 * Graph store types and errors
 *
 * @module services/storage/graph/types
 */

/**
 * Error codes for graph store operations
 */
export enum GraphStoreErrorCode {
  INVALID_NAME = 'INVALID_NAME',
  STORE_OPEN_FAILED = 'STORE_OPEN_FAILED',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  CORRUPT_ROW = 'CORRUPT_ROW',
  STORE_CLOSED = 'STORE_CLOSED',
}

/**
 * Graph store error
 */
export class GraphStoreError extends Error {
  constructor(
    message: string,
    public readonly code: GraphStoreErrorCode,
    public readonly detail?: unknown
  ) {
    super(message);
    this.name = 'GraphStoreError';
  }
}

/**
 * Summary row of a stored graph
 */
export interface StoredGraphInfo {
  keyword: string;
  entity_count: number;
  relation_count: number;
  created_at: string;
  updated_at: string;
}
