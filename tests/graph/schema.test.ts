import { describe, it, expect } from 'vitest';
import {
  DEFAULT_SCHEMA,
  mergeSchema,
  requiredParents,
  rollupRelations,
  validateSchema,
  type GraphSchema,
  type RelationshipSchema,
} from '../../src/graph/schema.js';
import { SchemaError } from '../../src/core/errors.js';

function withRelationships(relationships: RelationshipSchema[]): GraphSchema {
  return { ...DEFAULT_SCHEMA, relationships };
}

const VERIFIES: RelationshipSchema = {
  name: 'verifies',
  from: ['test'],
  to: ['requirement'],
  direction: 'up',
  sourceField: 'validates',
  rollup: false,
  requiredForNonRoot: false,
};

describe('validateSchema', () => {
  it('should accept the default schema', () => {
    expect(() => validateSchema(DEFAULT_SCHEMA)).not.toThrow();
  });

  it('should reject duplicate relationship names', () => {
    const schema = withRelationships([...DEFAULT_SCHEMA.relationships, { ...VERIFIES, name: 'implements' }]);
    expect(() => validateSchema(schema)).toThrow(SchemaError);
    expect(() => validateSchema(schema)).toThrow("Duplicate relationship 'implements'");
  });

  it('should reject a source field the source kind does not have', () => {
    const schema = withRelationships([{ ...VERIFIES, from: ['code'], sourceField: 'results' }]);
    expect(() => validateSchema(schema)).toThrow("Relationship 'verifies': code nodes have no field 'results'");
  });

  it('should reject a relationship without target kinds', () => {
    const schema = withRelationships([{ ...VERIFIES, to: [] }]);
    expect(() => validateSchema(schema)).toThrow("Relationship 'verifies' must name source and target kinds");
  });

  it('should reject level constraints on unknown relationships', () => {
    const schema: GraphSchema = {
      ...DEFAULT_SCHEMA,
      levelConstraints: [
        { relation: 'satisfies', allowed: { product: [], operational: [], development: [] } },
      ],
    };
    expect(() => validateSchema(schema)).toThrow("Level constraint names unknown relationship 'satisfies'");
  });
});

describe('schema queries', () => {
  it('should list rollup relationships', () => {
    expect([...rollupRelations(DEFAULT_SCHEMA)]).toEqual(['contains', 'implements', 'validates', 'produces']);
  });

  it('should map each kind to the relationships that give it a required parent', () => {
    const required = requiredParents(DEFAULT_SCHEMA);
    expect([...(required.get('requirement') ?? [])]).toEqual(['implements', 'addresses', 'motivates']);
    expect([...(required.get('test') ?? [])]).toEqual(['validates']);
    expect([...(required.get('code') ?? [])]).toEqual(['validates']);
    expect([...(required.get('test_result') ?? [])]).toEqual(['produces']);
    expect(required.has('assertion')).toBe(false);
    expect(required.has('journey')).toBe(false);
  });
});

describe('mergeSchema', () => {
  it('should replace rows by name and append new ones', () => {
    const merged = mergeSchema(DEFAULT_SCHEMA, {
      relationships: [{ ...VERIFIES }, { ...VERIFIES, name: 'refines', from: ['requirement'], sourceField: 'refines' }],
    });

    const names = merged.relationships.map((r) => r.name);
    expect(names).toEqual(['contains', 'implements', 'refines', 'addresses', 'validates', 'produces', 'motivates', 'verifies']);
    expect(merged.relationships[2].to).toEqual(['requirement']);
  });

  it('should overlay checks and roots without touching the base', () => {
    const merged = mergeSchema(DEFAULT_SCHEMA, { checks: { orphan: false }, roots: { levels: [] } });

    expect(merged.checks.orphan).toBe(false);
    expect(merged.checks.cycle).toBe(true);
    expect(merged.roots).toEqual({ kinds: ['journey'], levels: [] });
    expect(DEFAULT_SCHEMA.checks.orphan).toBe(true);
  });
});
