/**
 * GraphStore - SQLite persistence for fused graphs
 *
 * Graphs are stored whole under a keyword: saving replaces every entity and
 * relation row of that keyword inside one transaction. Loading rebuilds a
 * frozen FusedGraph with importance recomputed from the stored edges.
 *
 * @module services/storage/graph/graph-store
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { RELATION_TYPES } from '../../../models/candidate.js';
import type { Entity, FusedGraph, Relation } from '../../../models/knowledge-graph.js';
import { rerankGraph } from '../../knowledge-graph/graph-service.js';
import { compareStrings } from '../../knowledge-graph/string-similarity.js';
import {
  CREATE_INDEXES,
  DATABASE_PRAGMAS,
  REQUIRED_TABLES,
  SCHEMA_VERSION,
  TABLE_DEFINITIONS,
} from './schema-definitions.js';
import { GraphStoreError, GraphStoreErrorCode, type StoredGraphInfo } from './types.js';

/**
 * Default storage path for graph stores
 */
export const DEFAULT_STORAGE_PATH = join(homedir(), '.semantic-coverage', 'graphs');

const VALID_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

// ═══════════════════════════════════════════════════════════════════════════════
// ROW SHAPES
// ═══════════════════════════════════════════════════════════════════════════════

interface EntityRow {
  entity_id: string;
  canonical_name: string;
  type_set: string;
  description: string | null;
  aliases: string;
  provenance: string;
  external_ids: string;
  importance: number;
}

interface RelationRow {
  subject_id: string;
  object_id: string;
  relation_type: string;
  weight: number;
  evidence: string;
}

const StringListColumn = z.array(z.string());
const ProvenanceColumn = z.array(
  z.object({ source_id: z.string(), external_ref: z.string().nullable() })
);
const ExternalIdsColumn = z.record(z.array(z.string()));
const EvidenceColumn = z.array(
  z.object({ source_id: z.string(), evidence_weight: z.number().min(0).max(1) })
);
const RelationTypeColumn = z.enum(RELATION_TYPES);

function parseColumn<T>(schema: z.ZodType<T>, text: string, column: string, keyword: string): T {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new GraphStoreError(
      `Column ${column} of graph "${keyword}" is not valid JSON`,
      GraphStoreErrorCode.CORRUPT_ROW,
      error
    );
  }
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new GraphStoreError(
      `Column ${column} of graph "${keyword}" has an unexpected shape: ${result.error.errors
        .map((e) => e.message)
        .join(', ')}`,
      GraphStoreErrorCode.CORRUPT_ROW
    );
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

function initializeSchema(db: Database.Database): void {
  for (const pragma of DATABASE_PRAGMAS) {
    db.exec(pragma);
  }
  db.transaction(() => {
    for (const ddl of TABLE_DEFINITIONS) {
      db.exec(ddl);
    }
    for (const index of CREATE_INDEXES) {
      db.exec(index);
    }
    const now = new Date().toISOString();
    db.prepare(
      `INSERT OR IGNORE INTO schema_version (id, version, created_at, updated_at) VALUES (1, ?, ?, ?)`
    ).run(SCHEMA_VERSION, now, now);
  })();

  const row = db
    .prepare<[], { version: number }>('SELECT version FROM schema_version WHERE id = 1')
    .get();
  if (!row || row.version !== SCHEMA_VERSION) {
    throw new GraphStoreError(
      `Graph store schema version ${row?.version ?? 'missing'} does not match expected ${SCHEMA_VERSION}`,
      GraphStoreErrorCode.SCHEMA_MISMATCH
    );
  }

  const tables = new Set(
    db
      .prepare<[], { name: string }>(`SELECT name FROM sqlite_master WHERE type = 'table'`)
      .all()
      .map((t) => t.name)
  );
  const missing = REQUIRED_TABLES.filter((t) => !tables.has(t));
  if (missing.length > 0) {
    throw new GraphStoreError(
      `Graph store is missing tables: ${missing.join(', ')}`,
      GraphStoreErrorCode.SCHEMA_MISMATCH
    );
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// GRAPH STORE
// ═══════════════════════════════════════════════════════════════════════════════

export class GraphStore {
  private closed = false;

  private constructor(
    private readonly db: Database.Database,
    readonly name: string,
    readonly path: string
  ) {}

  /**
   * Open a named store under storagePath, creating it when absent
   *
   * @throws GraphStoreError on an invalid name or an unreadable file
   */
  static open(name: string, storagePath: string = DEFAULT_STORAGE_PATH): GraphStore {
    if (!VALID_NAME_PATTERN.test(name)) {
      throw new GraphStoreError(
        `Invalid store name "${name}". Only alphanumeric characters, underscores, and hyphens are allowed.`,
        GraphStoreErrorCode.INVALID_NAME
      );
    }
    if (!existsSync(storagePath)) {
      mkdirSync(storagePath, { recursive: true, mode: 0o700 });
    }
    const dbPath = join(storagePath, `${name}.db`);

    let db: Database.Database;
    try {
      db = new Database(dbPath);
    } catch (error) {
      throw new GraphStoreError(
        `Failed to open graph store "${name}": ${String(error)}`,
        GraphStoreErrorCode.STORE_OPEN_FAILED,
        error
      );
    }
    try {
      initializeSchema(db);
    } catch (error) {
      db.close();
      throw error;
    }
    return new GraphStore(db, name, dbPath);
  }

  /**
   * Open a throwaway store held in memory
   */
  static inMemory(name: string = 'memory'): GraphStore {
    const db = new Database(':memory:');
    initializeSchema(db);
    return new GraphStore(db, name, ':memory:');
  }

  getConnection(): Database.Database {
    this.assertOpen();
    return this.db;
  }

  /**
   * Store a graph under a keyword, replacing any graph already stored there
   */
  saveGraph(keyword: string, graph: FusedGraph): StoredGraphInfo {
    this.assertOpen();
    const now = new Date().toISOString();

    const existing = this.db
      .prepare<[string], { created_at: string }>('SELECT created_at FROM fused_graphs WHERE keyword = ?')
      .get(keyword);
    const createdAt = existing?.created_at ?? now;

    const insertEntity = this.db.prepare(`
      INSERT INTO graph_entities
        (keyword, entity_id, canonical_name, type_set, description, aliases, provenance, external_ids, importance)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertRelation = this.db.prepare(`
      INSERT INTO graph_relations (keyword, subject_id, object_id, relation_type, weight, evidence)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    this.db.transaction(() => {
      this.db.prepare('DELETE FROM fused_graphs WHERE keyword = ?').run(keyword);
      this.db
        .prepare(
          `INSERT INTO fused_graphs (keyword, entity_count, relation_count, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?)`
        )
        .run(keyword, graph.entities.length, graph.relations.length, createdAt, now);

      for (const e of graph.entities) {
        insertEntity.run(
          keyword,
          e.entity_id,
          e.canonical_name,
          JSON.stringify(e.type_set),
          e.description,
          JSON.stringify(e.aliases),
          JSON.stringify(e.provenance),
          JSON.stringify(e.external_ids),
          e.importance
        );
      }
      for (const r of graph.relations) {
        insertRelation.run(
          keyword,
          r.subject_id,
          r.object_id,
          r.relation_type,
          r.weight,
          JSON.stringify(r.evidence)
        );
      }
    })();

    return {
      keyword,
      entity_count: graph.entities.length,
      relation_count: graph.relations.length,
      created_at: createdAt,
      updated_at: now,
    };
  }

  /**
   * Load the graph stored under a keyword
   *
   * @returns The frozen graph, or null when nothing is stored under the keyword
   * @throws GraphStoreError CORRUPT_ROW when a stored row cannot be decoded
   */
  loadGraph(keyword: string): FusedGraph | null {
    this.assertOpen();
    const header = this.db
      .prepare<[string], { keyword: string }>('SELECT keyword FROM fused_graphs WHERE keyword = ?')
      .get(keyword);
    if (!header) return null;

    const entityRows = this.db
      .prepare<[string], EntityRow>(
        `SELECT entity_id, canonical_name, type_set, description, aliases, provenance, external_ids, importance
         FROM graph_entities WHERE keyword = ?`
      )
      .all(keyword);
    const relationRows = this.db
      .prepare<[string], RelationRow>(
        `SELECT subject_id, object_id, relation_type, weight, evidence
         FROM graph_relations WHERE keyword = ?`
      )
      .all(keyword);

    const entities: Entity[] = entityRows.map((row) => ({
      entity_id: row.entity_id,
      canonical_name: row.canonical_name,
      type_set: parseColumn(StringListColumn, row.type_set, 'type_set', keyword),
      description: row.description,
      aliases: parseColumn(StringListColumn, row.aliases, 'aliases', keyword),
      provenance: parseColumn(ProvenanceColumn, row.provenance, 'provenance', keyword),
      external_ids: parseColumn(ExternalIdsColumn, row.external_ids, 'external_ids', keyword),
      importance: row.importance,
    }));
    const relations: Relation[] = relationRows.map((row) => {
      const type = RelationTypeColumn.safeParse(row.relation_type);
      if (!type.success) {
        throw new GraphStoreError(
          `Unknown relation type "${row.relation_type}" in graph "${keyword}"`,
          GraphStoreErrorCode.CORRUPT_ROW
        );
      }
      return {
        subject_id: row.subject_id,
        object_id: row.object_id,
        relation_type: type.data,
        weight: row.weight,
        evidence: parseColumn(EvidenceColumn, row.evidence, 'evidence', keyword),
      };
    });

    entities.sort((a, b) => compareStrings(a.entity_id, b.entity_id));
    relations.sort(
      (a, b) =>
        compareStrings(a.subject_id, b.subject_id) ||
        compareStrings(a.object_id, b.object_id) ||
        compareStrings(a.relation_type, b.relation_type)
    );
    return rerankGraph({ entities, relations });
  }

  /**
   * List stored graphs, ordered by keyword
   */
  listGraphs(): StoredGraphInfo[] {
    this.assertOpen();
    return this.db
      .prepare<[], StoredGraphInfo>(
        `SELECT keyword, entity_count, relation_count, created_at, updated_at
         FROM fused_graphs ORDER BY keyword`
      )
      .all();
  }

  /**
   * Delete the graph stored under a keyword
   *
   * @returns true when a graph was deleted
   */
  deleteGraph(keyword: string): boolean {
    this.assertOpen();
    const result = this.db.prepare('DELETE FROM fused_graphs WHERE keyword = ?').run(keyword);
    return result.changes > 0;
  }

  close(): void {
    if (this.closed) return;
    this.db.close();
    this.closed = true;
  }

  isOpen(): boolean {
    return !this.closed;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new GraphStoreError(`Graph store "${this.name}" is closed`, GraphStoreErrorCode.STORE_CLOSED);
    }
  }
}
