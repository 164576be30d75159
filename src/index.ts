/**
 * spectrace - requirement traceability graphs from spec documents
 *
 * @packageDocumentation
 */

export type {
  Assertion,
  CheckName,
  CodeReference,
  Diagnostic,
  ExternalRecords,
  Journey,
  Level,
  NodeKind,
  Reference,
  ReferenceRelation,
  Requirement,
  RequirementStatus,
  Severity,
  SourceDocument,
  SourceLocation,
  TestReference,
  TestResult,
  TestStatus,
} from './core/types.js';
export { NODE_KINDS, isNodeKind } from './core/types.js';
export { SpectraceError, SchemaError, ConfigError } from './core/errors.js';
export { ValidationResult } from './core/diagnostics.js';
export { computeContentHash } from './core/hash.js';

export type { Identifier, IdentifierConfig, IdentifierParseResult, ParseFailure } from './ids/grammar.js';
export {
  DEFAULT_IDENTIFIER_CONFIG,
  parseIdentifier,
  formatIdentifier,
  expandIdentifier,
  resolveTargets,
} from './ids/grammar.js';

export type { ParseOptions, DocumentParseResult } from './parser/document.js';
export { parseDocument } from './parser/document.js';
export type { CorpusParseResult } from './parser/corpus.js';
export { parseCorpus } from './parser/corpus.js';

export type {
  Direction,
  GraphSchema,
  LevelConstraint,
  RelationshipSchema,
  RootDeclaration,
  SchemaOverrides,
  ValidationChecks,
} from './graph/schema.js';
export { DEFAULT_SCHEMA, validateSchema, mergeSchema } from './graph/schema.js';
export type { Edge, NodePayload, RollupMetrics } from './graph/model.js';
export { GraphNode, TraceGraph, GraphError } from './graph/model.js';
export type { TraversalOrder, WalkOptions } from './graph/traverse.js';
export { walk, ancestors, findNodes } from './graph/traverse.js';
export type { BuildInput, BuildOptions, BuildResult } from './graph/builder.js';
export { buildGraph } from './graph/builder.js';
export type { HashPolicy } from './graph/validate.js';
export { computeMetrics, graphTotals } from './graph/metrics.js';

export type { ProjectConfig } from './storage/config.js';
export { loadProjectConfig } from './storage/config.js';
export { findProjectRoot, loadDocuments, loadRecords } from './storage/files.js';
export { buildProject } from './storage/project.js';
