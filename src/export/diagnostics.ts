/**
 * Terminal rendering of diagnostics, build summaries and single nodes.
 *
 * Colour goes through a chalk instance so callers (and tests) can turn
 * it off with `new Chalk({ level: 0 })`.
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { Diagnostic, Severity } from '../core/types.js';
import type { ValidationResult } from '../core/diagnostics.js';
import type { GraphNode, RollupMetrics, TraceGraph } from '../graph/model.js';

function severityLabel(severity: Severity, c: ChalkInstance): string {
  switch (severity) {
    case 'error':
      return c.red('error');
    case 'warning':
      return c.yellow('warning');
    case 'info':
      return c.blue('info');
  }
}

export function formatDiagnostic(diagnostic: Diagnostic, c: ChalkInstance = chalk): string {
  const where = diagnostic.location
    ? `${c.gray(`${diagnostic.location.path}:${diagnostic.location.line}`)} `
    : '';
  let line = `${where}${severityLabel(diagnostic.severity, c)} ${diagnostic.message} ${c.gray(`[${diagnostic.check}]`)}`;
  if (diagnostic.suggestion) {
    line += `\n    ${c.cyan('suggestion:')} ${diagnostic.suggestion}`;
  }
  return line;
}

export function formatDiagnostics(diagnostics: readonly Diagnostic[], c: ChalkInstance = chalk): string {
  return diagnostics.map((d) => formatDiagnostic(d, c)).join('\n');
}

function pct(value: number): string {
  return `${value.toFixed(1)}%`;
}

export function formatCoverage(metrics: RollupMetrics): string {
  return `${metrics.coveredAssertions}/${metrics.totalAssertions} assertions covered (${pct(metrics.coveragePct)})`;
}

export function formatPassRate(metrics: RollupMetrics): string {
  return `${metrics.passedTests}/${metrics.totalTests} tests passed (${pct(metrics.passRatePct)})`;
}

/**
 * Totals for a whole build plus diagnostic counts.
 *
 * @param totals - metrics over every node in the graph
 */
export function formatSummary(
  graph: TraceGraph,
  totals: RollupMetrics,
  validation: ValidationResult,
  c: ChalkInstance = chalk
): string {
  const errors = validation.errors.length;
  const warnings = validation.warnings.length;
  const infos = validation.bySeverity('info').length;

  const lines = [
    c.bold('Summary'),
    `  Nodes: ${graph.nodeCount()}  Requirements: ${totals.totalRequirements}  Tests: ${totals.totalTests}  Code refs: ${totals.totalCodeRefs}`,
    `  Coverage: ${formatCoverage(totals)}`,
    `  Pass rate: ${formatPassRate(totals)}`,
  ];

  const counts = `${errors} errors, ${warnings} warnings, ${infos} info`;
  lines.push(`  Diagnostics: ${errors > 0 ? c.red(counts) : c.green(counts)}`);
  if (graph.conflicts().length > 0) {
    lines.push(`  Conflicts: ${graph.conflicts().map((n) => n.id).join(', ')}`);
  }
  return lines.join('\n');
}

function nodeList(nodes: readonly GraphNode[]): string {
  return nodes.length > 0 ? nodes.map((n) => n.id).join(', ') : '-';
}

/**
 * One node with its neighbours and rolled-up metrics.
 */
export function formatNode(node: GraphNode, c: ChalkInstance = chalk): string {
  const lines = [`${c.cyan(node.id)} (${node.kind}) ${c.bold(node.label)}`];
  if (node.source) {
    lines.push(c.gray(`  ${node.source.path}:${node.source.line}`));
  }
  if (node.payload.kind === 'requirement') {
    const req = node.payload.requirement;
    lines.push(`  Level: ${req.level} | Status: ${req.status}`);
  }
  lines.push(`  Parents: ${nodeList(node.parents)}`);
  lines.push(`  Children: ${nodeList(node.children)}`);
  if (node.metrics) {
    lines.push(`  Coverage: ${formatCoverage(node.metrics)}`);
    lines.push(`  Pass rate: ${formatPassRate(node.metrics)}`);
    if (node.metrics.uncoveredAssertions.length > 0) {
      lines.push(`  Uncovered: ${node.metrics.uncoveredAssertions.join(', ')}`);
    }
  }
  return lines.join('\n');
}
