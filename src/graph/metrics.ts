/**
 * Coverage and pass-rate rollup.
 *
 * A node's metrics are counted over the node itself and the set of
 * distinct nodes below it through rollup edges. Counting the set, never
 * summing children, keeps a descendant shared by several paths from
 * being counted twice.
 */

import type { TestStatus } from '../core/types.js';
import type { GraphNode, RollupMetrics, TraceGraph } from './model.js';
import type { GraphSchema } from './schema.js';
import { rollupRelations } from './schema.js';
import { walk } from './traverse.js';
import { coveringRelations } from './validate.js';

const STATUS_PRIORITY: readonly TestStatus[] = ['failed', 'passed', 'skipped', 'unknown'];

/**
 * Status of a test from its results: any failure wins, then any pass,
 * then any skip. A test without results is unknown.
 */
export function testStatus(test: GraphNode): TestStatus {
  const statuses = new Set<TestStatus>();
  for (const child of test.children) {
    if (child.payload.kind === 'test_result') statuses.add(child.payload.result.status);
  }
  return STATUS_PRIORITY.find((status) => statuses.has(status)) ?? 'unknown';
}

export function percentage(part: number, total: number): number {
  return total === 0 ? 0 : (part / total) * 100;
}

/**
 * True when the requirement owning `assertion` is itself implemented by
 * another requirement, which claims every assertion it holds.
 */
function isImplementedWhole(assertion: GraphNode, covering: ReadonlySet<string>): boolean {
  if (assertion.payload.kind !== 'assertion') return false;
  const ownerId = assertion.payload.assertion.requirementId;
  const owner = assertion.parents.find((p) => p.id === ownerId);
  return owner !== undefined && owner.childrenVia(covering).some((c) => c.kind === 'requirement');
}

/**
 * Metrics over an explicit node set.
 */
export function summarize(nodes: Iterable<GraphNode>, covering: ReadonlySet<string>): RollupMetrics {
  const metrics: RollupMetrics = {
    totalRequirements: 0,
    totalAssertions: 0,
    coveredAssertions: 0,
    uncoveredAssertions: [],
    directCovered: 0,
    explicitCovered: 0,
    inferredCovered: 0,
    validatedAssertions: 0,
    totalTests: 0,
    passedTests: 0,
    failedTests: 0,
    skippedTests: 0,
    unknownTests: 0,
    totalCodeRefs: 0,
    hasFailures: false,
    coveragePct: 0,
    passRatePct: 0,
  };

  for (const node of nodes) {
    switch (node.kind) {
      case 'requirement':
        metrics.totalRequirements++;
        break;
      case 'assertion': {
        metrics.totalAssertions++;
        const coveredBy = node.childrenVia(covering);
        if (coveredBy.length > 0) metrics.coveredAssertions++;
        else metrics.uncoveredAssertions.push(node.id);

        if (coveredBy.some((c) => c.kind === 'test' || c.kind === 'code')) metrics.directCovered++;
        if (coveredBy.some((c) => c.kind === 'requirement')) metrics.explicitCovered++;
        if (coveredBy.some((c) => c.kind === 'test' && testStatus(c) === 'passed')) metrics.validatedAssertions++;
        if (isImplementedWhole(node, covering)) metrics.inferredCovered++;
        break;
      }
      case 'test':
        metrics.totalTests++;
        switch (testStatus(node)) {
          case 'passed':
            metrics.passedTests++;
            break;
          case 'failed':
            metrics.failedTests++;
            break;
          case 'skipped':
            metrics.skippedTests++;
            break;
          case 'unknown':
            metrics.unknownTests++;
            break;
        }
        break;
      case 'code':
        metrics.totalCodeRefs++;
        break;
      case 'test_result':
      case 'journey':
        break;
    }
  }

  metrics.hasFailures = metrics.failedTests > 0;
  metrics.coveragePct = percentage(metrics.coveredAssertions, metrics.totalAssertions);
  metrics.passRatePct = percentage(metrics.passedTests, metrics.totalTests);
  return metrics;
}

/**
 * Distinct descendants of every node through the given relationships,
 * computed leaves first. A child still on the walk (a cycle) has no set
 * yet, so sets are widened again until none grows.
 */
export function descendantSets(
  graph: TraceGraph,
  relations: ReadonlySet<string>
): Map<GraphNode, Set<GraphNode>> {
  const memo = new Map<GraphNode, Set<GraphNode>>();
  const finished: Array<[GraphNode, Set<GraphNode>]> = [];
  const starts = [...graph.roots(), ...graph.nodeList()];
  let incomplete = false;

  for (const node of walk(starts, 'post', { relations })) {
    const below = new Set<GraphNode>();
    for (const child of node.childrenVia(relations)) {
      below.add(child);
      const childBelow = memo.get(child);
      if (!childBelow) {
        incomplete = true;
        continue;
      }
      for (const descendant of childBelow) below.add(descendant);
    }
    below.delete(node);
    memo.set(node, below);
    finished.push([node, below]);
  }

  let changed = incomplete;
  while (changed) {
    changed = false;
    for (const [node, below] of finished) {
      const before = below.size;
      for (const child of node.childrenVia(relations)) {
        below.add(child);
        for (const descendant of memo.get(child) ?? []) below.add(descendant);
      }
      below.delete(node);
      if (below.size !== before) changed = true;
    }
  }

  return memo;
}

/**
 * Set `metrics` on every indexed node.
 */
export function computeMetrics(graph: TraceGraph, schema: GraphSchema): void {
  const sets = descendantSets(graph, rollupRelations(schema));
  const covering = coveringRelations(schema);

  for (const node of graph.nodeList()) {
    const below = sets.get(node) ?? new Set<GraphNode>();
    node.metrics = summarize([node, ...below], covering);
  }
}

/**
 * Metrics over every indexed node, for whole-build summaries.
 */
export function graphTotals(graph: TraceGraph, schema: GraphSchema): RollupMetrics {
  return summarize(graph.nodeList(), coveringRelations(schema));
}
