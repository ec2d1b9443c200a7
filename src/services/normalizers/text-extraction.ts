/**
 * Free-text entity extraction normalizer
 *
 * Shapes named-entity spans extracted from a document into candidates, one per
 * distinct normalized surface text, and derives RELATED_TO co-occurrence
 * relations between entities mentioned together.
 *
 * Co-occurrence is counted per sentence when sentence boundaries are given,
 * otherwise per pair of mentions whose start offsets lie within a character
 * window. Evidence grows with the count: 1 - 0.5^count.
 *
 * @module services/normalizers/text-extraction
 */

import { z } from 'zod';
import type { EntityCandidate, NormalizedBatch, RelationCandidate } from '../../models/candidate.js';
import { safeValidateInput, validateInput } from '../../utils/validation.js';
import { compareStrings, normalizeName } from '../knowledge-graph/string-similarity.js';

export const TEXT_EXTRACTION_SOURCE_ID = 'text_extraction';

/** Default distance between mention starts that still counts as co-occurrence */
export const DEFAULT_COOCCURRENCE_WINDOW = 250;

const SpanSchema = z
  .object({
    text: z.string().refine((s) => s.trim().length > 0, 'Span text must not be blank'),
    label: z.string().min(1),
    start: z.number().int().nonnegative(),
    end: z.number().int().nonnegative(),
    score: z.number().min(0).max(1).optional(),
  })
  .refine((s) => s.end >= s.start, 'Span end must not precede start');

const SentenceSchema = z.object({
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
});

export const TextExtractionPayloadSchema = z.object({
  entities: z.array(z.unknown()),
  sentences: z.array(SentenceSchema).optional(),
});

export interface TextExtractionOptions {
  sourceId?: string;
  /** Used only when the payload carries no sentence boundaries */
  cooccurrenceWindow?: number;
}

type Span = z.infer<typeof SpanSchema>;

interface Mention {
  key: string;
  start: number;
}

/**
 * Evidence weight for a pair co-occurring `count` times
 */
export function cooccurrenceEvidence(count: number): number {
  return count <= 0 ? 0 : 1 - Math.pow(0.5, count);
}

function pairKey(a: string, b: string): string {
  return compareStrings(a, b) <= 0 ? `${a}\u0000${b}` : `${b}\u0000${a}`;
}

function countBySentence(
  mentions: readonly Mention[],
  sentences: ReadonlyArray<{ start: number; end: number }>
): Map<string, number> {
  const counts = new Map<string, number>();
  for (const sentence of sentences) {
    const keys = new Set(
      mentions.filter((m) => m.start >= sentence.start && m.start < sentence.end).map((m) => m.key)
    );
    const ordered = [...keys].sort(compareStrings);
    for (let i = 0; i < ordered.length; i++) {
      for (let j = i + 1; j < ordered.length; j++) {
        const key = pairKey(ordered[i], ordered[j]);
        counts.set(key, (counts.get(key) ?? 0) + 1);
      }
    }
  }
  return counts;
}

function countByWindow(mentions: readonly Mention[], window: number): Map<string, number> {
  const counts = new Map<string, number>();
  const ordered = [...mentions].sort((a, b) => a.start - b.start || compareStrings(a.key, b.key));
  for (let i = 0; i < ordered.length; i++) {
    for (let j = i + 1; j < ordered.length && ordered[j].start - ordered[i].start <= window; j++) {
      if (ordered[i].key === ordered[j].key) continue;
      const key = pairKey(ordered[i].key, ordered[j].key);
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }
  }
  return counts;
}

/**
 * Normalize extracted spans
 *
 * @throws ValidationError when the payload envelope is malformed
 */
export function normalizeTextExtraction(
  payload: unknown,
  options: TextExtractionOptions = {}
): NormalizedBatch {
  const sourceId = options.sourceId ?? TEXT_EXTRACTION_SOURCE_ID;
  const window = options.cooccurrenceWindow ?? DEFAULT_COOCCURRENCE_WINDOW;
  const envelope = validateInput(TextExtractionPayloadSchema, payload);
  let skipped = 0;

  const spans: Span[] = [];
  for (const raw of envelope.entities) {
    const parsed = safeValidateInput(SpanSchema, raw);
    if (parsed.success) {
      spans.push(parsed.data);
    } else {
      skipped++;
    }
  }
  spans.sort((a, b) => a.start - b.start || a.end - b.end || compareStrings(a.text, b.text));

  const grouped = new Map<string, Span[]>();
  const mentions: Mention[] = [];
  for (const span of spans) {
    const key = normalizeName(span.text);
    const group = grouped.get(key);
    if (group) {
      group.push(span);
    } else {
      grouped.set(key, [span]);
    }
    mentions.push({ key, start: span.start });
  }

  const names = new Map<string, string>();
  const entities: EntityCandidate[] = [];
  for (const [key, group] of grouped) {
    const name = group[0].text.trim();
    names.set(key, name);
    const surfaceForms = new Set(group.map((s) => s.text.trim()));
    surfaceForms.delete(name);
    entities.push({
      source_id: sourceId,
      external_ref: null,
      name,
      type_hints: [...new Set(group.map((s) => s.label))],
      description: null,
      aliases: [...surfaceForms],
      confidence: group.reduce((max, s) => Math.max(max, s.score ?? 1.0), 0),
      cross_refs: [],
    });
  }

  const counts =
    envelope.sentences !== undefined && envelope.sentences.length > 0
      ? countBySentence(mentions, envelope.sentences)
      : countByWindow(mentions, window);

  const relations: RelationCandidate[] = [];
  for (const [key, count] of [...counts].sort(([a], [b]) => compareStrings(a, b))) {
    const [subjectKey, objectKey] = key.split('\u0000');
    relations.push({
      source_id: sourceId,
      subject_ref: names.get(subjectKey) ?? subjectKey,
      object_ref: names.get(objectKey) ?? objectKey,
      relation_type: 'RELATED_TO',
      evidence_weight: cooccurrenceEvidence(count),
    });
  }

  return { entities, relations, skipped };
}
