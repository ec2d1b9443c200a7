/**
 * Wikidata SPARQL Normalizer Tests
 *
 * @module tests/unit/services/normalizers/wikidata
 */

import { describe, it, expect } from 'vitest';
import {
  extractQid,
  normalizeWikidata,
  relationTypeForProperty,
} from '../../../../src/services/normalizers/wikidata.js';
import { ValidationError } from '../../../../src/utils/validation.js';

const ENTITY = 'http://www.wikidata.org/entity/';
const PROP = 'http://www.wikidata.org/prop/direct/';

function uri(value: string) {
  return { type: 'uri', value };
}

function literal(value: string) {
  return { type: 'literal', value };
}

const RESULT = {
  head: { vars: ['item', 'itemLabel', 'typeLabel', 'related', 'relatedLabel', 'property'] },
  results: {
    bindings: [
      {
        item: uri(`${ENTITY}Q11660`),
        itemLabel: literal('artificial intelligence'),
        itemDescription: literal('intelligence of machines'),
        itemAltLabel: literal('AI, machine intelligence'),
        typeLabel: literal('academic discipline'),
        related: uri(`${ENTITY}Q2539`),
        relatedLabel: literal('machine learning'),
        property: uri(`${PROP}P527`),
      },
      {
        item: uri(`${ENTITY}Q11660`),
        itemLabel: literal('artificial intelligence'),
        typeLabel: literal('field of study'),
        related: uri(`${ENTITY}Q2539`),
        property: uri(`${PROP}P527`),
      },
      {
        item: uri(`${ENTITY}Q11660`),
        related: uri(`${ENTITY}Q12345`),
        relatedLabel: literal('Q12345'),
        property: uri(`${PROP}P1269`),
      },
      { item: uri('not-an-entity') },
      { foo: literal('bar') },
    ],
  },
};

describe('extractQid / relationTypeForProperty', () => {
  it('extracts Q-ids from URIs and bare ids', () => {
    expect(extractQid(`${ENTITY}Q42`)).toBe('Q42');
    expect(extractQid('Q42')).toBe('Q42');
    expect(extractQid('nothing')).toBeNull();
  });

  it('maps direct-claim properties onto relation types', () => {
    expect(relationTypeForProperty('P31')).toBe('INSTANCE_OF');
    expect(relationTypeForProperty(`${PROP}P279`)).toBe('SUBCLASS_OF');
    expect(relationTypeForProperty('P361')).toBe('PART_OF');
    expect(relationTypeForProperty('P527')).toBe('HAS_PART');
    expect(relationTypeForProperty('P999')).toBe('RELATED_TO');
    expect(relationTypeForProperty(undefined)).toBe('RELATED_TO');
  });
});

describe('normalizeWikidata', () => {
  const batch = normalizeWikidata(RESULT);

  it('emits one candidate per labelled item with unioned types and aliases', () => {
    expect(batch.entities).toEqual([
      {
        source_id: 'wikidata',
        external_ref: 'Q11660',
        name: 'artificial intelligence',
        type_hints: ['academic discipline', 'field of study'],
        description: 'intelligence of machines',
        aliases: ['AI', 'machine intelligence'],
        confidence: 1,
        cross_refs: [],
      },
      {
        source_id: 'wikidata',
        external_ref: 'Q2539',
        name: 'machine learning',
        type_hints: [],
        description: null,
        aliases: [],
        confidence: 1,
        cross_refs: [],
      },
    ]);
  });

  it('emits each (subject, object, type) relation once', () => {
    expect(batch.relations).toEqual([
      { source_id: 'wikidata', subject_ref: 'Q11660', object_ref: 'Q2539', relation_type: 'HAS_PART', evidence_weight: 1 },
      { source_id: 'wikidata', subject_ref: 'Q11660', object_ref: 'Q12345', relation_type: 'RELATED_TO', evidence_weight: 1 },
    ]);
  });

  it('skips malformed rows and unlabelled items', () => {
    expect(batch.skipped).toBe(3);
  });

  it('rejects a payload that is not a SPARQL result set', () => {
    expect(() => normalizeWikidata({ bindings: [] })).toThrow(ValidationError);
  });
});
