/**
 * Semantic Coverage MCP System - Zod Validation Schemas
 *
 * Input validation for candidates, serialized graphs and shared tool inputs.
 * Each schema includes:
 * - Type validation
 * - Constraint validation (min/max, ranges)
 * - Descriptive error messages
 * - Default values where the data model defines one
 *
 * @module utils/validation
 */

import { z } from 'zod';
import { RELATION_TYPES } from '../models/candidate.js';
import type { EntityCandidate, RelationCandidate } from '../models/candidate.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    })
    .join('; ');
}

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data
 * @throws ValidationError with descriptive message if validation fails
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Safely validate input without throwing, returns result object
 */
export function safeValidateInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown
): { success: true; data: T } | { success: false; error: ValidationError } {
  const result = schema.safeParse(input);
  if (!result.success) {
    return { success: false, error: new ValidationError(formatIssues(result.error)) };
  }
  return { success: true, data: result.data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED ENUMS AND BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const RelationTypeSchema = z.enum(RELATION_TYPES);

const UnitInterval = z.number().min(0, 'Must be >= 0').max(1, 'Must be <= 1');

const NonBlank = z.string().refine((s) => s.trim().length > 0, 'Must not be blank');

/**
 * Log levels accepted by configuration
 */
export const LogLevel = z.enum(['debug', 'info', 'warn', 'error']);

// ═══════════════════════════════════════════════════════════════════════════════
// CANDIDATE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const CrossReferenceSchema = z.object({
  namespace: NonBlank,
  ref: NonBlank,
});

/**
 * Entity candidate. `source_id` and `name` are required; everything else
 * has the default the data model gives it.
 */
export const EntityCandidateSchema: z.ZodType<EntityCandidate, z.ZodTypeDef, unknown> = z.object({
  source_id: NonBlank,
  external_ref: z.string().min(1).nullable().default(null),
  name: NonBlank,
  type_hints: z.array(z.string()).default([]),
  description: z.string().nullable().default(null),
  aliases: z.array(z.string()).default([]),
  confidence: UnitInterval.default(1.0),
  cross_refs: z.array(CrossReferenceSchema).default([]),
});

export const RelationCandidateSchema: z.ZodType<RelationCandidate, z.ZodTypeDef, unknown> = z.object({
  source_id: NonBlank,
  subject_ref: NonBlank,
  object_ref: NonBlank,
  relation_type: RelationTypeSchema,
  evidence_weight: UnitInterval,
});

// ═══════════════════════════════════════════════════════════════════════════════
// SERIALIZED GRAPH SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const SerializedEntitySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  type: z.array(z.string()).default([]),
  description: z.string().nullable().default(null),
  aliases: z.array(z.string()).default([]),
  source: z
    .array(
      z.object({
        source_id: z.string().min(1),
        external_ref: z.string().nullable(),
      })
    )
    .min(1, 'Every entity needs at least one provenance entry'),
  external_ids: z.record(z.array(z.string())).default({}),
  importance: UnitInterval.default(0),
});

export const SerializedRelationSchema = z.object({
  source: z.string().min(1),
  target: z.string().min(1),
  type: RelationTypeSchema,
  weight: UnitInterval,
  evidence: z
    .array(
      z.object({
        source_id: z.string().min(1),
        evidence_weight: UnitInterval,
      })
    )
    .default([]),
});

export const SerializedGraphSchema = z.object({
  entities: z.array(SerializedEntitySchema),
  relations: z.array(SerializedRelationSchema).default([]),
});

export type SerializedEntity = z.infer<typeof SerializedEntitySchema>;
export type SerializedRelation = z.infer<typeof SerializedRelationSchema>;
export type SerializedGraph = z.infer<typeof SerializedGraphSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// GRAPH STORE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Keyword a fused graph is stored under
 */
export const Keyword = z
  .string()
  .min(1, 'Keyword is required')
  .max(200, 'Keyword must be 200 characters or less');

/**
 * Schema for opening a graph store
 */
export const DatabaseOpenInput = z.object({
  name: z
    .string()
    .min(1, 'Store name is required')
    .max(64, 'Store name must be 64 characters or less')
    .regex(
      /^[a-zA-Z0-9_-]+$/,
      'Store name must contain only alphanumeric characters, underscores, and hyphens'
    ),
  storage_path: z.string().optional(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Configuration keys that can be read and set
 */
export const ConfigKey = z.enum([
  'source_priority',
  'reliability',
  'default_reliability',
  'alias_jaccard_threshold',
  'max_recommendations',
  'topical_types',
  'cooccurrence_window',
  'log_level',
]);

export const ConfigGetInput = z.object({
  key: ConfigKey.optional(),
});

export const ConfigSetInput = z.object({
  key: ConfigKey,
  value: z.unknown(),
});
