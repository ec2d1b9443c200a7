/**
 * Collaborative triple store (Wikidata) normalizer
 *
 * Shapes SPARQL JSON result rows into candidates. Rows are grouped per item,
 * so an item returned on several rows (one per type, one per related item)
 * becomes a single candidate with its types and aliases unioned.
 *
 * Expected variables: item, itemLabel, itemDescription, itemAltLabel,
 * typeLabel, related, relatedLabel, property. Only `item` is required.
 *
 * @module services/normalizers/wikidata
 */

import { z } from 'zod';
import type { EntityCandidate, NormalizedBatch, RelationCandidate, RelationType } from '../../models/candidate.js';
import { safeValidateInput, validateInput } from '../../utils/validation.js';

export const WIKIDATA_SOURCE_ID = 'wikidata';

/** Direct-claim properties with a dedicated relation type; everything else is RELATED_TO */
const PROPERTY_TO_RELATION: Record<string, RelationType> = {
  P31: 'INSTANCE_OF',
  P279: 'SUBCLASS_OF',
  P361: 'PART_OF',
  P527: 'HAS_PART',
};

const ENTITY_ID = /(Q\d+)$/;
const PROPERTY_ID = /(P\d+)$/;

const BindingValue = z.object({
  type: z.string().optional(),
  value: z.string(),
});

const SparqlRowSchema = z.object({
  item: BindingValue,
  itemLabel: BindingValue.optional(),
  itemDescription: BindingValue.optional(),
  itemAltLabel: BindingValue.optional(),
  typeLabel: BindingValue.optional(),
  related: BindingValue.optional(),
  relatedLabel: BindingValue.optional(),
  property: BindingValue.optional(),
});

export const SparqlResultSchema = z.object({
  head: z.object({ vars: z.array(z.string()) }).optional(),
  results: z.object({
    bindings: z.array(z.unknown()),
  }),
});

interface ItemAccumulator {
  qid: string;
  label: string | null;
  description: string | null;
  types: Set<string>;
  aliases: Set<string>;
}

/**
 * Extract the Q-id from an entity URI or bare id
 */
export function extractQid(value: string): string | null {
  return ENTITY_ID.exec(value.trim())?.[1] ?? null;
}

/**
 * Map a property URI or bare id onto a relation type
 */
export function relationTypeForProperty(value: string | undefined): RelationType {
  if (value === undefined) return 'RELATED_TO';
  const pid = PROPERTY_ID.exec(value.trim())?.[1];
  return (pid && PROPERTY_TO_RELATION[pid]) || 'RELATED_TO';
}

/**
 * A label equal to the Q-id is the service's "no label" placeholder
 */
function usableLabel(label: string | undefined, qid: string): string | null {
  const trimmed = label?.trim() ?? '';
  return trimmed.length > 0 && trimmed !== qid ? trimmed : null;
}

function accumulator(items: Map<string, ItemAccumulator>, qid: string): ItemAccumulator {
  let acc = items.get(qid);
  if (!acc) {
    acc = { qid, label: null, description: null, types: new Set(), aliases: new Set() };
    items.set(qid, acc);
  }
  return acc;
}

/**
 * Normalize a SPARQL JSON result set
 *
 * @throws ValidationError when the result envelope is malformed
 */
export function normalizeWikidata(payload: unknown, sourceId: string = WIKIDATA_SOURCE_ID): NormalizedBatch {
  const envelope = validateInput(SparqlResultSchema, payload);
  let skipped = 0;

  const items = new Map<string, ItemAccumulator>();
  const relations: RelationCandidate[] = [];
  const seenRelations = new Set<string>();

  for (const raw of envelope.results.bindings) {
    const parsed = safeValidateInput(SparqlRowSchema, raw);
    const row = parsed.success ? parsed.data : null;
    const qid = row ? extractQid(row.item.value) : null;
    if (!row || !qid) {
      skipped++;
      continue;
    }

    const acc = accumulator(items, qid);
    acc.label ??= usableLabel(row.itemLabel?.value, qid);
    const description = row.itemDescription?.value.trim() ?? '';
    if (acc.description === null && description.length > 0) acc.description = description;
    const typeLabel = row.typeLabel?.value.trim() ?? '';
    if (typeLabel.length > 0) acc.types.add(typeLabel);
    for (const alias of (row.itemAltLabel?.value ?? '').split(',')) {
      if (alias.trim().length > 0) acc.aliases.add(alias.trim());
    }

    const relatedQid = row.related ? extractQid(row.related.value) : null;
    if (relatedQid && relatedQid !== qid) {
      const related = accumulator(items, relatedQid);
      related.label ??= usableLabel(row.relatedLabel?.value, relatedQid);

      const relationType = relationTypeForProperty(row.property?.value);
      const key = `${qid}\u0000${relatedQid}\u0000${relationType}`;
      if (!seenRelations.has(key)) {
        seenRelations.add(key);
        relations.push({
          source_id: sourceId,
          subject_ref: qid,
          object_ref: relatedQid,
          relation_type: relationType,
          evidence_weight: 1.0,
        });
      }
    }
  }

  const entities: EntityCandidate[] = [];
  for (const acc of items.values()) {
    if (acc.label === null) {
      skipped++;
      continue;
    }
    entities.push({
      source_id: sourceId,
      external_ref: acc.qid,
      name: acc.label,
      type_hints: [...acc.types],
      description: acc.description,
      aliases: [...acc.aliases],
      confidence: 1.0,
      cross_refs: [],
    });
  }

  return { entities, relations, skipped };
}
