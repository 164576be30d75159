import { describe, it, expect } from 'vitest';
import { buildGraph, testNodeId } from '../../src/graph/builder.js';
import { DEFAULT_SCHEMA } from '../../src/graph/schema.js';
import { graphTotals, percentage, testStatus } from '../../src/graph/metrics.js';
import { parseCorpus } from '../../src/parser/corpus.js';
import type { TestReference, TestResult, TestStatus } from '../../src/core/types.js';
import { doc } from '../fixtures.js';

function authTest(name: string, validates: string[] = ['REQ-p00001-A']): TestReference {
  return { file: 'tests/auth.test.ts', line: 1, name, validates };
}

function resultsFor(test: TestReference, ...statuses: TestStatus[]): TestResult[] {
  return statuses.map((status) => ({ testId: testNodeId(test), status }));
}

describe('percentage', () => {
  it('should be zero for an empty total', () => {
    expect(percentage(0, 0)).toBe(0);
  });

  it('should not round', () => {
    expect(percentage(1, 3)).toBeCloseTo(33.333, 3);
  });
});

describe('testStatus', () => {
  const requirements = parseCorpus([
    doc('prd.md', { id: 'REQ-p00001', title: 'Auth', level: 'PRD', assertions: ['One.'] }),
  ]).requirements;

  function statusOf(...statuses: TestStatus[]): TestStatus {
    const test = authTest('case');
    const { graph } = buildGraph({ requirements, tests: [test], results: resultsFor(test, ...statuses) });
    const node = graph.findById(testNodeId(test));
    if (!node) throw new Error('test node missing');
    return testStatus(node);
  }

  it('should let any failure win', () => {
    expect(statusOf('passed', 'failed', 'skipped')).toBe('failed');
  });

  it('should prefer a pass over a skip', () => {
    expect(statusOf('skipped', 'passed')).toBe('passed');
  });

  it('should report skipped when every result skipped', () => {
    expect(statusOf('skipped')).toBe('skipped');
  });

  it('should report unknown without results', () => {
    expect(statusOf()).toBe('unknown');
  });
});

describe('computeMetrics', () => {
  it('should count a descendant shared by two paths once', () => {
    const parsed = parseCorpus([
      doc('prd.md', { id: 'REQ-p00001', title: 'Auth', level: 'PRD', assertions: ['One.', 'Two.'] }),
      doc(
        'ops.md',
        { id: 'REQ-o00001', title: 'Sessions', level: 'OPS', implements: 'REQ-p00001-A' },
        { id: 'REQ-o00002', title: 'Lockout', level: 'OPS', implements: 'REQ-p00001-B' }
      ),
      doc('dev.md', { id: 'REQ-d00001', title: 'Login Form', level: 'DEV', implements: 'REQ-o00001, REQ-o00002' }),
    ]);

    const { graph } = buildGraph({ requirements: parsed.requirements });

    const root = graph.findById('REQ-p00001')?.metrics;
    expect(root?.totalRequirements).toBe(4);
    expect(root?.totalAssertions).toBe(2);
    expect(root?.coveredAssertions).toBe(2);
    expect(root?.coveragePct).toBe(100);
    expect(graph.findById('REQ-o00001')?.metrics?.totalRequirements).toBe(2);
    expect(graph.findById('REQ-d00001')?.metrics?.totalRequirements).toBe(1);
  });

  it('should report half coverage and name the uncovered assertion', () => {
    const parsed = parseCorpus([
      doc('prd.md', { id: 'REQ-p00001', title: 'Auth', level: 'PRD', assertions: ['One.', 'Two.'] }),
    ]);

    const { graph } = buildGraph({
      requirements: parsed.requirements,
      tests: [authTest('covers A')],
    });

    const metrics = graph.findById('REQ-p00001')?.metrics;
    expect(metrics?.coveragePct).toBe(50);
    expect(metrics?.uncoveredAssertions).toEqual(['REQ-p00001-B']);
  });

  it('should roll up pass rate over distinct tests', () => {
    const parsed = parseCorpus([
      doc('prd.md', { id: 'REQ-p00001', title: 'Auth', level: 'PRD', assertions: ['One.', 'Two.'] }),
    ]);
    const passing = authTest('passes', ['REQ-p00001-A', 'REQ-p00001-B']);
    const failing = authTest('fails');
    const skipped = authTest('skips');
    const unrun = authTest('never ran');

    const { graph } = buildGraph({
      requirements: parsed.requirements,
      tests: [passing, failing, skipped, unrun],
      results: [
        ...resultsFor(passing, 'passed'),
        ...resultsFor(failing, 'failed'),
        ...resultsFor(skipped, 'skipped'),
      ],
    });

    expect(graph.findById('REQ-p00001')?.metrics).toMatchObject({
      totalTests: 4,
      passedTests: 1,
      failedTests: 1,
      skippedTests: 1,
      unknownTests: 1,
      passRatePct: 25,
    });
    expect(graph.findById('REQ-p00001-B')?.metrics).toMatchObject({
      totalTests: 1,
      passedTests: 1,
      passRatePct: 100,
    });
  });

  it('should count code references below a requirement', () => {
    const parsed = parseCorpus([doc('prd.md', { id: 'REQ-p00001', title: 'Auth', level: 'PRD' })]);

    const { graph } = buildGraph({
      requirements: parsed.requirements,
      code: [
        { file: 'src/auth.ts', line: 4, validates: ['REQ-p00001'] },
        { file: 'src/auth.ts', line: 40, validates: ['REQ-p00001'] },
      ],
    });

    expect(graph.findById('REQ-p00001')?.metrics?.totalCodeRefs).toBe(2);
  });

  it('should terminate on cycles', () => {
    const parsed = parseCorpus([
      doc(
        'ops.md',
        { id: 'REQ-o00001', title: 'One', level: 'OPS', implements: 'REQ-o00002' },
        { id: 'REQ-o00002', title: 'Two', level: 'OPS', implements: 'REQ-o00001' }
      ),
    ]);

    const { graph } = buildGraph({ requirements: parsed.requirements });

    expect(graph.findById('REQ-o00001')?.metrics?.totalRequirements).toBe(2);
    expect(graph.findById('REQ-o00002')?.metrics?.totalRequirements).toBe(2);
  });

  it('should give every node on a cycle the descendants of the whole cycle', () => {
    const parsed = parseCorpus([
      doc(
        'dev.md',
        { id: 'REQ-d00001', title: 'One', level: 'DEV', implements: 'REQ-d00002', assertions: ['One.'] },
        { id: 'REQ-d00002', title: 'Two', level: 'DEV', implements: 'REQ-d00001' }
      ),
    ]);

    const { graph } = buildGraph({ requirements: parsed.requirements });

    expect(graph.findById('REQ-d00001')?.metrics).toMatchObject({ totalRequirements: 2, totalAssertions: 1 });
    expect(graph.findById('REQ-d00002')?.metrics).toMatchObject({ totalRequirements: 2, totalAssertions: 1 });
  });
});

describe('coverage sources', () => {
  it('should split coverage into direct and explicit', () => {
    const parsed = parseCorpus([
      doc('prd.md', { id: 'REQ-p00001', title: 'Auth', level: 'PRD', assertions: ['One.', 'Two.', 'Three.'] }),
      doc('ops.md', { id: 'REQ-o00001', title: 'Sessions', level: 'OPS', implements: 'REQ-p00001-B' }),
    ]);
    const passing = authTest('passes');

    const { graph } = buildGraph({
      requirements: parsed.requirements,
      tests: [passing],
      results: resultsFor(passing, 'passed'),
      code: [{ file: 'src/auth.ts', line: 4, validates: ['REQ-p00001-C'] }],
    });

    expect(graph.findById('REQ-p00001')?.metrics).toMatchObject({
      coveredAssertions: 3,
      directCovered: 2,
      explicitCovered: 1,
      inferredCovered: 0,
      validatedAssertions: 1,
      hasFailures: false,
    });
  });

  it('should infer coverage from a requirement implemented as a whole without counting it as covered', () => {
    const parsed = parseCorpus([
      doc('prd.md', { id: 'REQ-p00001', title: 'Auth', level: 'PRD', assertions: ['One.', 'Two.'] }),
      doc('ops.md', { id: 'REQ-o00001', title: 'Sessions', level: 'OPS', implements: 'REQ-p00001' }),
    ]);

    const { graph } = buildGraph({ requirements: parsed.requirements });

    expect(graph.findById('REQ-p00001')?.metrics).toMatchObject({
      coveredAssertions: 0,
      directCovered: 0,
      explicitCovered: 0,
      inferredCovered: 2,
      coveragePct: 0,
    });
  });

  it('should flag failures and not count a failing test as validation', () => {
    const parsed = parseCorpus([
      doc('prd.md', { id: 'REQ-p00001', title: 'Auth', level: 'PRD', assertions: ['One.', 'Two.'] }),
    ]);
    const failing = authTest('fails');

    const { graph } = buildGraph({
      requirements: parsed.requirements,
      tests: [failing],
      results: resultsFor(failing, 'failed'),
    });

    expect(graph.findById('REQ-p00001')?.metrics).toMatchObject({
      directCovered: 1,
      validatedAssertions: 0,
      hasFailures: true,
    });
    expect(graph.findById('REQ-p00001-B')?.metrics?.hasFailures).toBe(false);
  });
});

describe('graphTotals', () => {
  it('should summarise every indexed node', () => {
    const parsed = parseCorpus([
      doc('prd.md', { id: 'REQ-p00001', title: 'Auth', level: 'PRD', assertions: ['One.', 'Two.'] }),
    ]);
    const { graph } = buildGraph({ requirements: parsed.requirements, tests: [authTest('covers A')] });

    expect(graphTotals(graph, DEFAULT_SCHEMA)).toMatchObject({
      totalRequirements: 1,
      totalAssertions: 2,
      coveredAssertions: 1,
      totalTests: 1,
      unknownTests: 1,
      coveragePct: 50,
      passRatePct: 0,
    });
  });
});
