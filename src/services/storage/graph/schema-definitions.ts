/**
 * SQL Schema Definitions for the fused graph store
 *
 * One row per stored graph (keyed by keyword), with its entities and
 * relations in child tables. List-valued fields are stored as JSON text.
 *
 * @module services/storage/graph/schema-definitions
 */

/** Current schema version */
export const SCHEMA_VERSION = 1;

/**
 * Database configuration pragmas
 */
export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
] as const;

export const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

export const CREATE_GRAPHS_TABLE = `
CREATE TABLE IF NOT EXISTS fused_graphs (
  keyword TEXT PRIMARY KEY,
  entity_count INTEGER NOT NULL,
  relation_count INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

export const CREATE_ENTITIES_TABLE = `
CREATE TABLE IF NOT EXISTS graph_entities (
  keyword TEXT NOT NULL REFERENCES fused_graphs(keyword) ON DELETE CASCADE,
  entity_id TEXT NOT NULL,
  canonical_name TEXT NOT NULL,
  type_set TEXT NOT NULL,
  description TEXT,
  aliases TEXT NOT NULL,
  provenance TEXT NOT NULL,
  external_ids TEXT NOT NULL,
  importance REAL NOT NULL CHECK (importance >= 0 AND importance <= 1),
  PRIMARY KEY (keyword, entity_id)
)
`;

export const CREATE_RELATIONS_TABLE = `
CREATE TABLE IF NOT EXISTS graph_relations (
  keyword TEXT NOT NULL REFERENCES fused_graphs(keyword) ON DELETE CASCADE,
  subject_id TEXT NOT NULL,
  object_id TEXT NOT NULL,
  relation_type TEXT NOT NULL CHECK (relation_type IN ('RELATED_TO', 'INSTANCE_OF', 'SUBCLASS_OF', 'PART_OF', 'HAS_PART')),
  weight REAL NOT NULL CHECK (weight >= 0 AND weight <= 1),
  evidence TEXT NOT NULL,
  PRIMARY KEY (keyword, subject_id, object_id, relation_type)
)
`;

export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_graph_entities_importance ON graph_entities(keyword, importance DESC)',
  'CREATE INDEX IF NOT EXISTS idx_graph_relations_object ON graph_relations(keyword, object_id)',
] as const;

export const TABLE_DEFINITIONS = [
  CREATE_SCHEMA_VERSION_TABLE,
  CREATE_GRAPHS_TABLE,
  CREATE_ENTITIES_TABLE,
  CREATE_RELATIONS_TABLE,
] as const;

export const REQUIRED_TABLES = ['schema_version', 'fused_graphs', 'graph_entities', 'graph_relations'] as const;
