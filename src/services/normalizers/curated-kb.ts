/**
 * Curated knowledge base normalizer
 *
 * Shapes curated-KB search results into entity/relation candidates. Records
 * that embed identifiers of other sources (`same_as`) surface them as cross
 * references so the resolver can match across families.
 *
 * @module services/normalizers/curated-kb
 */

import { z } from 'zod';
import type { CrossReference, EntityCandidate, NormalizedBatch, RelationCandidate } from '../../models/candidate.js';
import { RelationTypeSchema, safeValidateInput, validateInput } from '../../utils/validation.js';

export const CURATED_KB_SOURCE_ID = 'curated_kb';

const WIKIDATA_URI = /^https?:\/\/(?:www\.|m\.)?wikidata\.org\/(?:wiki|entity)\/(Q\d+)\/?$/i;
const WIKIDATA_QID = /^Q\d+$/;

const CuratedEntitySchema = z.object({
  id: z.string().min(1),
  name: z.string().refine((s) => s.trim().length > 0, 'Name must not be blank'),
  types: z.array(z.string()).default([]),
  description: z.string().nullable().optional(),
  aliases: z.array(z.string()).default([]),
  score: z.number().nonnegative().optional(),
  same_as: z.array(z.string()).default([]),
});

const CuratedRelationSchema = z.object({
  subject: z.string().min(1),
  object: z.string().min(1),
  type: RelationTypeSchema.default('RELATED_TO'),
  weight: z.number().min(0).max(1).default(1),
});

export const CuratedKbPayloadSchema = z.object({
  entities: z.array(z.unknown()),
  relations: z.array(z.unknown()).default([]),
});

/**
 * Parse a `same_as` value into a cross reference, or null when the
 * identifier belongs to no known family
 */
export function parseSameAs(value: string): CrossReference | null {
  const trimmed = value.trim();
  const uriMatch = WIKIDATA_URI.exec(trimmed);
  if (uriMatch?.[1]) {
    return { namespace: 'wikidata', ref: uriMatch[1].toUpperCase() };
  }
  if (WIKIDATA_QID.test(trimmed)) {
    return { namespace: 'wikidata', ref: trimmed };
  }
  return null;
}

/**
 * Normalize a curated-KB payload
 *
 * Confidence is each record's score relative to the highest score in the
 * payload (1.0 when the source reports none).
 *
 * @throws ValidationError when the payload envelope is malformed
 */
export function normalizeCuratedKb(payload: unknown, sourceId: string = CURATED_KB_SOURCE_ID): NormalizedBatch {
  const envelope = validateInput(CuratedKbPayloadSchema, payload);
  let skipped = 0;

  const records: Array<z.infer<typeof CuratedEntitySchema>> = [];
  for (const raw of envelope.entities) {
    const parsed = safeValidateInput(CuratedEntitySchema, raw);
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      skipped++;
    }
  }

  const maxScore = records.reduce((max, r) => Math.max(max, r.score ?? 0), 0);

  const entities: EntityCandidate[] = records.map((record) => {
    const crossRefs: CrossReference[] = [];
    for (const value of record.same_as) {
      const ref = parseSameAs(value);
      if (ref && !crossRefs.some((x) => x.namespace === ref.namespace && x.ref === ref.ref)) {
        crossRefs.push(ref);
      }
    }
    return {
      source_id: sourceId,
      external_ref: record.id,
      name: record.name.trim(),
      type_hints: record.types,
      description: record.description ?? null,
      aliases: record.aliases,
      confidence: record.score === undefined || maxScore === 0 ? 1.0 : record.score / maxScore,
      cross_refs: crossRefs,
    };
  });

  const relations: RelationCandidate[] = [];
  for (const raw of envelope.relations) {
    const parsed = safeValidateInput(CuratedRelationSchema, raw);
    if (!parsed.success) {
      skipped++;
      continue;
    }
    relations.push({
      source_id: sourceId,
      subject_ref: parsed.data.subject,
      object_ref: parsed.data.object,
      relation_type: parsed.data.type,
      evidence_weight: parsed.data.weight,
    });
  }

  return { entities, relations, skipped };
}
