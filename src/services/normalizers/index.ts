/**
 * Source Normalizers
 *
 * One normalizer per source family, plus a dispatcher and a helper that
 * concatenates batches from several sources into one fuse() input.
 *
 * @module services/normalizers
 */

import type { KnownSourceFamily, NormalizedBatch } from '../../models/candidate.js';
import { normalizeCuratedKb } from './curated-kb.js';
import { normalizeWikidata } from './wikidata.js';
import { normalizeTextExtraction } from './text-extraction.js';

export { normalizeCuratedKb, parseSameAs, CURATED_KB_SOURCE_ID } from './curated-kb.js';
export { normalizeWikidata, extractQid, relationTypeForProperty, WIKIDATA_SOURCE_ID } from './wikidata.js';
export {
  normalizeTextExtraction,
  cooccurrenceEvidence,
  DEFAULT_COOCCURRENCE_WINDOW,
  TEXT_EXTRACTION_SOURCE_ID,
} from './text-extraction.js';
export type { TextExtractionOptions } from './text-extraction.js';

export type SourceKind = KnownSourceFamily;

export interface NormalizeOptions {
  /** Overrides the default source id of the family */
  sourceId?: string;
  cooccurrenceWindow?: number;
}

/**
 * Normalize a raw payload from one source
 *
 * @throws ValidationError when the payload envelope is malformed
 */
export function normalizeSource(
  kind: SourceKind,
  payload: unknown,
  options: NormalizeOptions = {}
): NormalizedBatch {
  switch (kind) {
    case 'curated_kb':
      return normalizeCuratedKb(payload, options.sourceId);
    case 'wikidata':
      return normalizeWikidata(payload, options.sourceId);
    case 'text_extraction':
      return normalizeTextExtraction(payload, {
        sourceId: options.sourceId,
        cooccurrenceWindow: options.cooccurrenceWindow,
      });
  }
}

/**
 * Concatenate batches from several sources
 */
export function mergeBatches(batches: readonly NormalizedBatch[]): NormalizedBatch {
  return {
    entities: batches.flatMap((b) => b.entities),
    relations: batches.flatMap((b) => b.relations),
    skipped: batches.reduce((sum, b) => sum + b.skipped, 0),
  };
}
