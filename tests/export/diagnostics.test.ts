/**
 * Tests for terminal rendering.
 */

import { describe, it, expect } from 'vitest';
import { Chalk } from 'chalk';
import {
  formatCoverage,
  formatDiagnostic,
  formatDiagnostics,
  formatNode,
  formatSummary,
} from '../../src/export/diagnostics.js';
import { buildGraph } from '../../src/graph/builder.js';
import { DEFAULT_SCHEMA } from '../../src/graph/schema.js';
import { graphTotals } from '../../src/graph/metrics.js';
import { parseCorpus } from '../../src/parser/corpus.js';
import type { Diagnostic } from '../../src/core/types.js';
import { doc } from '../fixtures.js';

const plain = new Chalk({ level: 0 });

function halfCovered() {
  const parsed = parseCorpus([
    doc('prd.md', { id: 'REQ-p00001', title: 'Auth', level: 'PRD', assertions: ['One.', 'Two.'] }),
  ]);
  return buildGraph({
    requirements: parsed.requirements,
    tests: [{ file: 'tests/auth.test.ts', line: 1, name: 'covers A', validates: ['REQ-p00001-A'] }],
  });
}

describe('formatDiagnostic', () => {
  it('should render location, severity, message and check', () => {
    const diagnostic: Diagnostic = {
      severity: 'error',
      check: 'broken-link',
      message: "Broken link from REQ-d00001 to 'REQ-p00099' (line 3): 'REQ-p00099' does not exist",
      location: { path: 'dev.md', line: 3 },
    };

    expect(formatDiagnostic(diagnostic, plain)).toBe(
      "dev.md:3 error Broken link from REQ-d00001 to 'REQ-p00099' (line 3): 'REQ-p00099' does not exist [broken-link]"
    );
  });

  it('should add the suggestion on its own line', () => {
    const diagnostic: Diagnostic = {
      severity: 'info',
      check: 'hash-mismatch',
      message: 'REQ-p00001 hash deadbeef does not match content (expected 0123abcd)',
      suggestion: '0123abcd',
    };

    expect(formatDiagnostic(diagnostic, plain)).toBe(
      'info REQ-p00001 hash deadbeef does not match content (expected 0123abcd) [hash-mismatch]\n    suggestion: 0123abcd'
    );
  });

  it('should join several diagnostics by line', () => {
    const diagnostics: Diagnostic[] = [
      { severity: 'warning', check: 'orphan', message: 'a' },
      { severity: 'warning', check: 'orphan', message: 'b' },
    ];
    expect(formatDiagnostics(diagnostics, plain)).toBe('warning a [orphan]\nwarning b [orphan]');
  });
});

describe('formatCoverage', () => {
  it('should show one decimal place', () => {
    const { graph } = halfCovered();
    const metrics = graph.findById('REQ-p00001')?.metrics;
    if (!metrics) throw new Error('metrics missing');

    expect(formatCoverage(metrics)).toBe('1/2 assertions covered (50.0%)');
  });
});

describe('formatSummary', () => {
  it('should report totals and diagnostic counts', () => {
    const { graph, validation } = halfCovered();

    expect(formatSummary(graph, graphTotals(graph, DEFAULT_SCHEMA), validation, plain)).toBe(
      [
        'Summary',
        '  Nodes: 4  Requirements: 1  Tests: 1  Code refs: 0',
        '  Coverage: 1/2 assertions covered (50.0%)',
        '  Pass rate: 0/1 tests passed (0.0%)',
        '  Diagnostics: 0 errors, 1 warnings, 0 info',
      ].join('\n')
    );
  });

  it('should list conflicting identifiers', () => {
    const parsed = parseCorpus([
      doc('a.md', { id: 'REQ-p00002', title: 'First', level: 'PRD' }),
      doc('b.md', { id: 'REQ-p00002', title: 'Second', level: 'PRD' }),
    ]);
    const { graph, validation } = buildGraph({ requirements: parsed.requirements });

    const summary = formatSummary(graph, graphTotals(graph, DEFAULT_SCHEMA), validation, plain).split('\n');
    expect(summary[4]).toBe('  Diagnostics: 1 errors, 0 warnings, 0 info');
    expect(summary[5]).toBe('  Conflicts: REQ-p00002');
  });
});

describe('formatNode', () => {
  it('should show a requirement with its neighbours and metrics', () => {
    const { graph } = halfCovered();
    const node = graph.findById('REQ-p00001');
    if (!node) throw new Error('node missing');

    expect(formatNode(node, plain)).toBe(
      [
        'REQ-p00001 (requirement) Auth',
        '  prd.md:1',
        '  Level: product | Status: active',
        '  Parents: -',
        '  Children: REQ-p00001-A, REQ-p00001-B',
        '  Coverage: 1/2 assertions covered (50.0%)',
        '  Pass rate: 0/1 tests passed (0.0%)',
        '  Uncovered: REQ-p00001-B',
      ].join('\n')
    );
  });
});
