/**
 * Structural checks over a built graph.
 *
 * Each check is independent and returns its own diagnostics; none of
 * them throws or stops the others. Duplicate identifiers and broken
 * links are found while the graph is built and are not repeated here.
 */

import type { Diagnostic, Level } from '../core/types.js';
import type { GraphNode, TraceGraph } from './model.js';
import type { GraphSchema } from './schema.js';
import { requiredParents, rollupRelations } from './schema.js';

/**
 * `strict` turns hash mismatches into errors.
 */
export type HashPolicy = 'informational' | 'strict';

export interface ValidationContext {
  hashPolicy: HashPolicy;
}

function diagnosticFor(
  node: GraphNode,
  fields: Pick<Diagnostic, 'severity' | 'check' | 'message'>
): Diagnostic {
  const diagnostic: Diagnostic = { ...fields, nodeId: node.id };
  if (node.source) diagnostic.location = node.source;
  return diagnostic;
}

/**
 * Cycles over rollup edges, each reported once with its full path.
 * Iterative three-colour depth-first search.
 */
export function findCycles(graph: TraceGraph, schema: GraphSchema): Diagnostic[] {
  const relations = rollupRelations(schema);
  const IN_PROGRESS = 1;
  const DONE = 2;
  const colour = new Map<GraphNode, number>();
  const diagnostics: Diagnostic[] = [];

  for (const start of graph.nodeList()) {
    if (colour.has(start)) continue;

    const path: GraphNode[] = [start];
    const pending: GraphNode[][] = [start.childrenVia(relations)];
    colour.set(start, IN_PROGRESS);

    while (path.length > 0) {
      const children = pending[pending.length - 1];
      const child = children?.shift();
      if (child === undefined) {
        const finished = path.pop();
        pending.pop();
        if (finished) colour.set(finished, DONE);
        continue;
      }

      const state = colour.get(child);
      if (state === IN_PROGRESS) {
        const cycle = [...path.slice(path.indexOf(child)), child];
        diagnostics.push(
          diagnosticFor(child, {
            severity: 'error',
            check: 'cycle',
            message: `Cycle: ${cycle.map((n) => n.id).join(' -> ')}`,
          })
        );
      } else if (state === undefined) {
        colour.set(child, IN_PROGRESS);
        path.push(child);
        pending.push(child.childrenVia(relations));
      }
    }
  }

  return diagnostics;
}

function isDeclaredRoot(node: GraphNode, schema: GraphSchema): boolean {
  if (schema.roots.kinds.includes(node.kind)) return true;
  return node.payload.kind === 'requirement' && schema.roots.levels.includes(node.payload.requirement.level);
}

/**
 * Nodes that must have a parent through a required relationship, have
 * none, and are not declared roots.
 */
export function findOrphans(graph: TraceGraph, schema: GraphSchema): Diagnostic[] {
  const required = requiredParents(schema);
  const diagnostics: Diagnostic[] = [];

  for (const node of graph.nodeList()) {
    const relations = required.get(node.kind);
    if (!relations || isDeclaredRoot(node, schema)) continue;
    if (node.parentsVia(relations).length > 0) continue;
    diagnostics.push(
      diagnosticFor(node, {
        severity: 'warning',
        check: 'orphan',
        message: `${node.id} has no parent through ${[...relations].join(' or ')}`,
      })
    );
  }

  return diagnostics;
}

/**
 * Level of a requirement node, or of the requirement owning an assertion.
 */
function levelOf(node: GraphNode, graph: TraceGraph): Level | undefined {
  switch (node.payload.kind) {
    case 'requirement':
      return node.payload.requirement.level;
    case 'assertion': {
      const owner = graph.findById(node.payload.assertion.requirementId);
      return owner?.payload.kind === 'requirement' ? owner.payload.requirement.level : undefined;
    }
    default:
      return undefined;
  }
}

/**
 * Hierarchy rules per edge: the child's level decides which parent
 * levels it may attach to.
 */
export function checkLevels(graph: TraceGraph, schema: GraphSchema): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  for (const constraint of schema.levelConstraints) {
    for (const edge of graph.edges()) {
      if (edge.relation !== constraint.relation) continue;
      const childLevel = levelOf(edge.child, graph);
      const parentLevel = levelOf(edge.parent, graph);
      if (!childLevel || !parentLevel) continue;
      if (constraint.allowed[childLevel].includes(parentLevel)) continue;
      diagnostics.push(
        diagnosticFor(edge.child, {
          severity: 'error',
          check: 'level-constraint',
          message: `${edge.child.id} (${childLevel}) may not ${edge.relation} ${edge.parent.id} (${parentLevel})`,
        })
      );
    }
  }

  return diagnostics;
}

/**
 * Relationships whose edges cover the parent: rollup rows declared from
 * the child's side.
 */
export function coveringRelations(schema: GraphSchema): Set<string> {
  return new Set(
    schema.relationships.filter((r) => r.rollup && r.direction === 'up').map((r) => r.name)
  );
}

/**
 * Assertions with nothing validating or implementing them. Assertions
 * marked expected-broken are skipped.
 */
export function checkCoverage(graph: TraceGraph, schema: GraphSchema): Diagnostic[] {
  const covering = coveringRelations(schema);
  const diagnostics: Diagnostic[] = [];

  for (const node of graph.nodesByKind('assertion')) {
    if (node.payload.kind !== 'assertion' || node.payload.assertion.expectedBroken) continue;
    if (node.childrenVia(covering).length > 0) continue;
    diagnostics.push(
      diagnosticFor(node, {
        severity: 'warning',
        check: 'coverage-gap',
        message: `Assertion ${node.id} is not covered`,
      })
    );
  }

  return diagnostics;
}

/**
 * Requirements whose stored hash differs from the recomputed one.
 * Requirements without a stored hash are not checked.
 */
export function checkHashes(graph: TraceGraph, context: ValidationContext): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];

  for (const node of graph.nodesByKind('requirement')) {
    if (node.payload.kind !== 'requirement') continue;
    const { hash, computedHash } = node.payload.requirement;
    if (hash === undefined || hash === computedHash) continue;
    const diagnostic = diagnosticFor(node, {
      severity: context.hashPolicy === 'strict' ? 'error' : 'info',
      check: 'hash-mismatch',
      message: `${node.id} hash ${hash} does not match content (expected ${computedHash})`,
    });
    diagnostic.suggestion = computedHash;
    diagnostics.push(diagnostic);
  }

  return diagnostics;
}

/**
 * Authoring rules: a hash footer, a rationale and assertions, each
 * enforced when its rule is on.
 */
export function checkFormat(graph: TraceGraph, schema: GraphSchema): Diagnostic[] {
  const { requireHash, requireRationale, requireAssertions } = schema.format;
  const diagnostics: Diagnostic[] = [];

  for (const node of graph.nodesByKind('requirement')) {
    if (node.payload.kind !== 'requirement') continue;
    const req = node.payload.requirement;
    if (requireHash && req.hash === undefined) {
      const diagnostic = diagnosticFor(node, {
        severity: 'error',
        check: 'format',
        message: `${node.id} has no hash footer`,
      });
      diagnostic.suggestion = req.computedHash;
      diagnostics.push(diagnostic);
    }
    if (requireRationale && !req.rationale?.trim()) {
      diagnostics.push(
        diagnosticFor(node, { severity: 'warning', check: 'format', message: `${node.id} has no rationale` })
      );
    }
    if (requireAssertions && req.assertions.length === 0) {
      diagnostics.push(
        diagnosticFor(node, { severity: 'error', check: 'format', message: `${node.id} has no assertions` })
      );
    }
  }

  return diagnostics;
}

/**
 * Run every check the schema enables, in a fixed order.
 */
export function runValidation(
  graph: TraceGraph,
  schema: GraphSchema,
  context: ValidationContext
): Diagnostic[] {
  const { checks } = schema;
  return [
    ...(checks.cycle ? findCycles(graph, schema) : []),
    ...(checks.orphan ? findOrphans(graph, schema) : []),
    ...(checks.levelConstraint ? checkLevels(graph, schema) : []),
    ...(checks.assertionCoverage ? checkCoverage(graph, schema) : []),
    ...(checks.hash ? checkHashes(graph, context) : []),
    ...(checks.format ? checkFormat(graph, schema) : []),
  ];
}
