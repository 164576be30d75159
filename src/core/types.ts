/**
 * Core record types shared by the parser, the graph builder and the
 * metrics engine.
 */

/**
 * Requirement hierarchy levels.
 */
export type Level = 'product' | 'operational' | 'development';

/**
 * Requirement lifecycle status.
 */
export type RequirementStatus = 'active' | 'draft' | 'deprecated' | 'superseded';

/**
 * Relationships a requirement can declare in its metadata.
 */
export type ReferenceRelation = 'implements' | 'refines' | 'addresses';

/**
 * Kinds of node in the trace graph.
 */
export type NodeKind =
  | 'requirement'
  | 'assertion'
  | 'code'
  | 'test'
  | 'test_result'
  | 'journey';

export const NODE_KINDS: readonly NodeKind[] = [
  'requirement',
  'assertion',
  'code',
  'test',
  'test_result',
  'journey',
];

export function isNodeKind(value: string): value is NodeKind {
  return NODE_KINDS.some((kind) => kind === value);
}

/**
 * Position of an element in its source file (1-based lines).
 */
export interface SourceLocation {
  path: string;
  line: number;
  endLine?: number;
}

/**
 * An outbound reference declared by a requirement.
 */
export interface Reference {
  relation: ReferenceRelation;
  /** Canonical target key, e.g. `REQ-p00001-A` or `JNY-Login-01`. */
  target: string;
  line: number;
}

export interface Assertion {
  label: string;
  text: string;
  /** Canonical key of the owning requirement. */
  requirementId: string;
  line: number;
  /** Suppresses the coverage-gap diagnostic. */
  expectedBroken: boolean;
}

export interface Requirement {
  id: string;
  title: string;
  level: Level;
  status: RequirementStatus;
  body: string;
  rationale?: string;
  assertions: Assertion[];
  references: Reference[];
  /** Hash written in the footer, if any. */
  hash?: string;
  /** Hash recomputed from title, body and assertions. */
  computedHash: string;
  location: SourceLocation;
  tags: string[];
  /** Directory of the source document relative to the corpus root ('' at top level). */
  subdirectory: string;
  /** Set on later claimants of an identifier already taken. */
  conflict: boolean;
}

export interface CodeReference {
  file: string;
  line: number;
  symbol?: string;
  validates: string[];
}

export interface TestReference {
  /** Explicit id; derived from file, suite and name when absent. */
  id?: string;
  file: string;
  line: number;
  name: string;
  suite?: string;
  validates: string[];
}

export type TestStatus = 'passed' | 'failed' | 'skipped' | 'unknown';

export interface TestResult {
  testId: string;
  status: TestStatus;
  durationMs?: number;
  message?: string;
  location?: SourceLocation;
}

/**
 * A user journey. Non-normative: contributes no coverage.
 */
export interface Journey {
  id: string;
  title: string;
  actor?: string;
  goal?: string;
  steps: string[];
  /** Requirement identifiers this journey motivates. */
  addresses: string[];
  location?: SourceLocation;
}

export type Severity = 'error' | 'warning' | 'info';

/**
 * Names of the parse and validation checks that emit diagnostics.
 */
export type CheckName =
  | 'malformed-block'
  | 'malformed-reference'
  | 'malformed-assertion'
  | 'metadata'
  | 'duplicate-id'
  | 'cycle'
  | 'orphan'
  | 'broken-link'
  | 'level-constraint'
  | 'coverage-gap'
  | 'hash-mismatch'
  | 'format';

export interface Diagnostic {
  severity: Severity;
  check: CheckName;
  message: string;
  nodeId?: string;
  location?: SourceLocation;
  suggestion?: string;
}

/**
 * A document handed to the parser, already read.
 */
export interface SourceDocument {
  path: string;
  text: string;
}

/**
 * Records produced outside the document corpus by format adapters.
 */
export interface ExternalRecords {
  code: CodeReference[];
  tests: TestReference[];
  results: TestResult[];
  journeys: Journey[];
}
