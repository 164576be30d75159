/**
 * Declarative description of the trace graph: which relationships exist,
 * which node kinds they connect, and which rules validation applies.
 *
 * The builder interprets this table; adding a relationship needs a new
 * row, not new builder code.
 */

import type { Level, NodeKind } from '../core/types.js';
import { isNodeKind } from '../core/types.js';
import { SchemaError } from '../core/errors.js';

/**
 * `up`: the source node declares its parent (child → ancestor).
 * `down`: the source node declares its child (owner → owned).
 */
export type Direction = 'up' | 'down';

export interface RelationshipSchema {
  name: string;
  from: NodeKind[];
  to: NodeKind[];
  direction: Direction;
  /** Payload field of the source node that lists target ids. */
  sourceField: string;
  /** Edges count toward coverage and pass-rate rollup. */
  rollup: boolean;
  /** Gives the node that receives the parent a mandatory parent. */
  requiredForNonRoot: boolean;
}

/**
 * Nodes that are entry points by declaration and never orphans.
 */
export interface RootDeclaration {
  kinds: NodeKind[];
  levels: Level[];
}

/**
 * For edges of `relation`, the levels a requirement of each level may
 * attach to.
 */
export interface LevelConstraint {
  relation: string;
  allowed: Record<Level, Level[]>;
}

/**
 * Authoring rules applied by the `format` check.
 */
export interface FormatRules {
  /** Every requirement carries a `**Hash**` in its footer. */
  requireHash: boolean;
  requireRationale: boolean;
  /** Every requirement lists at least one assertion. */
  requireAssertions: boolean;
}

export interface ValidationChecks {
  duplicateId: boolean;
  cycle: boolean;
  orphan: boolean;
  brokenLink: boolean;
  levelConstraint: boolean;
  assertionCoverage: boolean;
  hash: boolean;
  format: boolean;
}

export interface GraphSchema {
  relationships: RelationshipSchema[];
  roots: RootDeclaration;
  levelConstraints: LevelConstraint[];
  format: FormatRules;
  checks: ValidationChecks;
}

/**
 * Payload fields each node kind exposes to `sourceField`.
 */
export const NODE_FIELDS: Record<NodeKind, readonly string[]> = {
  requirement: ['implements', 'refines', 'addresses', 'assertions'],
  assertion: [],
  code: ['validates'],
  test: ['validates', 'results'],
  test_result: [],
  journey: ['addresses'],
};

export const DEFAULT_SCHEMA: GraphSchema = {
  relationships: [
    {
      name: 'contains',
      from: ['requirement'],
      to: ['assertion'],
      direction: 'down',
      sourceField: 'assertions',
      rollup: true,
      requiredForNonRoot: false,
    },
    {
      name: 'implements',
      from: ['requirement'],
      to: ['requirement', 'assertion'],
      direction: 'up',
      sourceField: 'implements',
      rollup: true,
      requiredForNonRoot: true,
    },
    {
      name: 'refines',
      from: ['requirement'],
      to: ['requirement', 'assertion'],
      direction: 'up',
      sourceField: 'refines',
      rollup: false,
      requiredForNonRoot: false,
    },
    {
      name: 'addresses',
      from: ['requirement'],
      to: ['journey'],
      direction: 'up',
      sourceField: 'addresses',
      rollup: false,
      requiredForNonRoot: true,
    },
    {
      name: 'validates',
      from: ['test', 'code'],
      to: ['requirement', 'assertion'],
      direction: 'up',
      sourceField: 'validates',
      rollup: true,
      requiredForNonRoot: true,
    },
    {
      name: 'produces',
      from: ['test'],
      to: ['test_result'],
      direction: 'down',
      sourceField: 'results',
      rollup: true,
      requiredForNonRoot: true,
    },
    {
      name: 'motivates',
      from: ['journey'],
      to: ['requirement'],
      direction: 'down',
      sourceField: 'addresses',
      rollup: false,
      requiredForNonRoot: true,
    },
  ],
  roots: { kinds: ['journey'], levels: ['product'] },
  levelConstraints: [
    {
      relation: 'implements',
      allowed: {
        development: ['operational', 'product'],
        operational: ['product'],
        product: ['product'],
      },
    },
  ],
  format: {
    requireHash: true,
    requireRationale: false,
    requireAssertions: true,
  },
  checks: {
    duplicateId: true,
    cycle: true,
    orphan: true,
    brokenLink: true,
    levelConstraint: true,
    assertionCoverage: true,
    hash: true,
    format: false,
  },
};

/**
 * Throw SchemaError when the table is inconsistent. A bad schema is a
 * configuration fault, not a data problem, so it aborts the build.
 */
export function validateSchema(schema: GraphSchema): void {
  const names = new Set<string>();

  for (const rel of schema.relationships) {
    if (names.has(rel.name)) {
      throw new SchemaError(`Duplicate relationship '${rel.name}'`);
    }
    names.add(rel.name);

    if (rel.direction !== 'up' && rel.direction !== 'down') {
      throw new SchemaError(`Relationship '${rel.name}' has unknown direction '${String(rel.direction)}'`);
    }
    if (rel.from.length === 0 || rel.to.length === 0) {
      throw new SchemaError(`Relationship '${rel.name}' must name source and target kinds`);
    }
    for (const kind of [...rel.from, ...rel.to]) {
      if (!isNodeKind(kind)) {
        throw new SchemaError(`Relationship '${rel.name}' names unknown node kind '${String(kind)}'`);
      }
    }
    for (const kind of rel.from) {
      if (!NODE_FIELDS[kind].includes(rel.sourceField)) {
        throw new SchemaError(
          `Relationship '${rel.name}': ${kind} nodes have no field '${rel.sourceField}'`
        );
      }
    }
  }

  for (const kind of schema.roots.kinds) {
    if (!isNodeKind(kind)) {
      throw new SchemaError(`Root declaration names unknown node kind '${String(kind)}'`);
    }
  }

  for (const constraint of schema.levelConstraints) {
    if (!names.has(constraint.relation)) {
      throw new SchemaError(`Level constraint names unknown relationship '${constraint.relation}'`);
    }
  }
}

/**
 * Names of relationships whose edges take part in rollup and cycle checks.
 */
export function rollupRelations(schema: GraphSchema): Set<string> {
  return new Set(schema.relationships.filter((r) => r.rollup).map((r) => r.name));
}

/**
 * Node kinds that must have a parent through a required relationship,
 * mapped to the relationships that satisfy the requirement.
 */
export function requiredParents(schema: GraphSchema): Map<NodeKind, Set<string>> {
  const result = new Map<NodeKind, Set<string>>();
  for (const rel of schema.relationships) {
    if (!rel.requiredForNonRoot) continue;
    const kinds = rel.direction === 'up' ? rel.from : rel.to;
    for (const kind of kinds) {
      let names = result.get(kind);
      if (!names) {
        names = new Set<string>();
        result.set(kind, names);
      }
      names.add(rel.name);
    }
  }
  return result;
}

/**
 * Partial schema as written in project configuration.
 */
export interface SchemaOverrides {
  relationships?: RelationshipSchema[];
  roots?: Partial<RootDeclaration>;
  levelConstraints?: LevelConstraint[];
  format?: Partial<FormatRules>;
  checks?: Partial<ValidationChecks>;
}

/**
 * Overlay configuration on a base schema. Relationships replace rows of
 * the same name and append new ones.
 */
export function mergeSchema(base: GraphSchema, overrides: SchemaOverrides): GraphSchema {
  const relationships = base.relationships.map((r) => ({ ...r }));
  for (const rel of overrides.relationships ?? []) {
    const existing = relationships.findIndex((r) => r.name === rel.name);
    if (existing >= 0) relationships[existing] = rel;
    else relationships.push(rel);
  }

  return {
    relationships,
    roots: { ...base.roots, ...overrides.roots },
    levelConstraints: overrides.levelConstraints ?? base.levelConstraints,
    format: { ...base.format, ...overrides.format },
    checks: { ...base.checks, ...overrides.checks },
  };
}
