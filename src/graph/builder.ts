/**
 * Assemble a trace graph from parsed requirements and external records.
 *
 * The builder interprets the schema table: each relationship row names
 * the payload field that lists its targets, and the builder resolves
 * those targets through the identifier index. Input problems become
 * diagnostics; only an inconsistent schema throws.
 */

import type {
  CodeReference,
  Diagnostic,
  Journey,
  NodeKind,
  Requirement,
  SourceLocation,
  TestReference,
  TestResult,
} from '../core/types.js';
import { ValidationResult } from '../core/diagnostics.js';
import { debug, debugTimed } from '../core/debug.js';
import type { IdentifierConfig } from '../ids/grammar.js';
import {
  DEFAULT_IDENTIFIER_CONFIG,
  assertionKey,
  isAssertionScoped,
  parseIdentifier,
  requirementKey,
  resolveTargets,
} from '../ids/grammar.js';
import { GraphNode, TraceGraph } from './model.js';
import type { GraphSchema, RelationshipSchema } from './schema.js';
import { DEFAULT_SCHEMA, requiredParents, validateSchema } from './schema.js';
import { runValidation, type HashPolicy } from './validate.js';
import { computeMetrics } from './metrics.js';

export interface BuildInput {
  requirements: readonly Requirement[];
  code?: readonly CodeReference[];
  tests?: readonly TestReference[];
  results?: readonly TestResult[];
  journeys?: readonly Journey[];
  /** Parse diagnostics to carry into the result ahead of build diagnostics. */
  diagnostics?: readonly Diagnostic[];
}

export interface BuildOptions {
  identifiers?: IdentifierConfig;
  hashPolicy?: HashPolicy;
}

export interface BuildResult {
  graph: TraceGraph;
  validation: ValidationResult;
}

/**
 * A target id listed in a node's payload, with the line it came from.
 */
interface FieldTarget {
  raw: string;
  line?: number;
}

/**
 * Default node id for a test without an explicit one.
 */
export function testNodeId(test: TestReference): string {
  if (test.id) return test.id;
  const suite = test.suite ? `${test.suite}::` : '';
  return `test:${test.file}::${suite}${test.name}`;
}

export function codeNodeId(code: CodeReference): string {
  return `code:${code.file}:${code.line}`;
}

/**
 * Target ids a node lists under a schema source field.
 */
export function readField(node: GraphNode, field: string): FieldTarget[] {
  const payload = node.payload;
  switch (payload.kind) {
    case 'requirement': {
      const req = payload.requirement;
      if (field === 'assertions') {
        return req.assertions.map((a) => ({ raw: assertionKey(req.id, a.label), line: a.line }));
      }
      return req.references
        .filter((ref) => ref.relation === field)
        .map((ref) => ({ raw: ref.target, line: ref.line }));
    }
    case 'code':
      return field === 'validates'
        ? payload.code.validates.map((raw) => ({ raw, line: payload.code.line }))
        : [];
    case 'test':
      if (field === 'validates') {
        return payload.test.validates.map((raw) => ({ raw, line: payload.test.line }));
      }
      return field === 'results' ? payload.results.map((raw) => ({ raw })) : [];
    case 'journey':
      return field === 'addresses'
        ? payload.journey.addresses.map((raw) => ({ raw, line: payload.journey.location?.line }))
        : [];
    case 'assertion':
    case 'test_result':
      return [];
  }
}

class GraphBuilder {
  readonly graph: TraceGraph;
  readonly diagnostics: Diagnostic[] = [];
  private readonly identifiers: IdentifierConfig;

  constructor(
    private readonly schema: GraphSchema,
    options: BuildOptions
  ) {
    this.identifiers = options.identifiers ?? DEFAULT_IDENTIFIER_CONFIG;
    this.graph = new TraceGraph(requiredParents(schema));
  }

  private report(diagnostic: Diagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  addRequirements(requirements: readonly Requirement[]): void {
    for (const requirement of requirements) {
      const existing = this.graph.findById(requirement.id);
      if (existing) {
        const conflict: Requirement = { ...requirement, conflict: true };
        this.graph.addConflict(
          new GraphNode(
            requirement.id,
            { kind: 'requirement', requirement: conflict },
            requirement.title,
            requirement.location
          )
        );
        if (this.schema.checks.duplicateId) {
          const first = existing.source ? ` (first defined at ${formatLocation(existing.source)})` : '';
          this.report({
            severity: 'error',
            check: 'duplicate-id',
            message: `Duplicate identifier ${requirement.id}${first}`,
            nodeId: requirement.id,
            location: requirement.location,
          });
        }
        continue;
      }

      this.graph.addNode(
        new GraphNode(
          requirement.id,
          { kind: 'requirement', requirement },
          requirement.title,
          requirement.location
        )
      );
      for (const assertion of requirement.assertions) {
        this.graph.addNode(
          new GraphNode(
            assertionKey(requirement.id, assertion.label),
            { kind: 'assertion', assertion },
            assertion.text,
            { path: requirement.location.path, line: assertion.line }
          )
        );
      }
    }
  }

  /**
   * Index an external node, or warn and skip it when the id is taken.
   */
  private addExternal(node: GraphNode): GraphNode | undefined {
    if (this.graph.findById(node.id)) {
      this.report({
        severity: 'warning',
        check: 'duplicate-id',
        message: `Duplicate ${node.kind} record '${node.id}' ignored`,
        nodeId: node.id,
        location: node.source,
      });
      return undefined;
    }
    return this.graph.addNode(node);
  }

  addJourneys(journeys: readonly Journey[]): void {
    for (const journey of journeys) {
      this.addExternal(new GraphNode(journey.id, { kind: 'journey', journey }, journey.title, journey.location));
    }
  }

  addCode(code: readonly CodeReference[]): void {
    for (const ref of code) {
      this.addExternal(
        new GraphNode(codeNodeId(ref), { kind: 'code', code: ref }, ref.symbol ?? `${ref.file}:${ref.line}`, {
          path: ref.file,
          line: ref.line,
        })
      );
    }
  }

  addTests(tests: readonly TestReference[]): void {
    for (const test of tests) {
      this.addExternal(
        new GraphNode(testNodeId(test), { kind: 'test', test, results: [] }, test.name, {
          path: test.file,
          line: test.line,
        })
      );
    }
  }

  /**
   * Results are attached to their test's payload so that the `results`
   * field can be linked like any other.
   */
  addResults(results: readonly TestResult[]): void {
    const seen = new Map<string, number>();
    for (const result of results) {
      const count = (seen.get(result.testId) ?? 0) + 1;
      seen.set(result.testId, count);
      const id = count === 1 ? `result:${result.testId}` : `result:${result.testId}#${count}`;

      const node = this.addExternal(
        new GraphNode(id, { kind: 'test_result', result }, `${result.testId}: ${result.status}`, result.location)
      );
      if (!node) continue;

      const owner = this.graph.findById(result.testId);
      if (owner?.payload.kind === 'test') {
        owner.payload.results.push(id);
      } else if (this.schema.checks.brokenLink) {
        this.report({
          severity: 'error',
          check: 'broken-link',
          message: `Test result '${id}' refers to unknown test '${result.testId}'`,
          nodeId: id,
          location: result.location,
        });
      }
    }
  }

  /**
   * Create the edges of every schema relationship.
   */
  linkAll(): void {
    const sources = this.graph.nodeList();
    for (const rel of this.schema.relationships) {
      let created = 0;
      for (const source of sources) {
        if (!rel.from.includes(source.kind)) continue;
        for (const target of readField(source, rel.sourceField)) {
          created += this.linkTarget(rel, source, target);
        }
      }
      debug('build', `Linked ${rel.name}`, { edges: created });
    }
  }

  private linkTarget(rel: RelationshipSchema, source: GraphNode, target: FieldTarget): number {
    let created = 0;
    for (const key of resolveTargets(target.raw, this.identifiers)) {
      const node = this.graph.findById(key);
      if (!node) {
        this.brokenLink(source, target, this.describeMissing(target.raw, key));
        continue;
      }
      if (!rel.to.includes(node.kind)) {
        this.brokenLink(
          source,
          target,
          `'${key}' is a ${node.kind}; ${rel.name} accepts ${rel.to.join(', ')}`
        );
        continue;
      }
      const edge =
        rel.direction === 'up'
          ? this.graph.link(node, source, rel.name)
          : this.graph.link(source, node, rel.name);
      if (edge) created++;
    }
    return created;
  }

  private describeMissing(raw: string, key: string): string {
    const parsed = parseIdentifier(raw, this.identifiers);
    if (parsed.ok && isAssertionScoped(parsed.identifier)) {
      const reqId = requirementKey(parsed.identifier);
      if (this.graph.findById(reqId)) {
        const label = key.slice(reqId.length + 1);
        return `${reqId} has no assertion '${label}'`;
      }
    }
    return `'${key}' does not exist`;
  }

  private brokenLink(source: GraphNode, target: FieldTarget, reason: string): void {
    if (!this.schema.checks.brokenLink) return;
    const line = target.line ?? source.source?.line;
    const where = line !== undefined ? ` (line ${line})` : '';
    const diagnostic: Diagnostic = {
      severity: 'error',
      check: 'broken-link',
      message: `Broken link from ${source.id} to '${target.raw}'${where}: ${reason}`,
      nodeId: source.id,
    };
    const location = locationFor(source.source, line);
    if (location) diagnostic.location = location;
    this.report(diagnostic);
  }
}

function formatLocation(location: SourceLocation): string {
  return `${location.path}:${location.line}`;
}

function locationFor(source: SourceLocation | undefined, line: number | undefined): SourceLocation | undefined {
  if (!source) return undefined;
  return { path: source.path, line: line ?? source.line };
}

/**
 * Count nodes per kind, for debug output.
 */
function kindCounts(graph: TraceGraph): Partial<Record<NodeKind, number>> {
  const counts: Partial<Record<NodeKind, number>> = {};
  for (const node of graph.nodeList()) {
    counts[node.kind] = (counts[node.kind] ?? 0) + 1;
  }
  return counts;
}

/**
 * Build, validate and roll up one graph. The returned graph is sealed.
 *
 * @throws SchemaError when the schema is inconsistent
 */
export function buildGraph(
  input: BuildInput,
  schema: GraphSchema = DEFAULT_SCHEMA,
  options: BuildOptions = {}
): BuildResult {
  validateSchema(schema);

  const builder = new GraphBuilder(schema, options);
  const { graph } = builder;

  debugTimed('build', 'Create nodes', () => {
    builder.addRequirements(input.requirements);
    builder.addJourneys(input.journeys ?? []);
    builder.addCode(input.code ?? []);
    builder.addTests(input.tests ?? []);
    builder.addResults(input.results ?? []);
  });
  debug('build', 'Nodes created', kindCounts(graph));

  debugTimed('build', 'Link relationships', () => builder.linkAll());

  const validation = new ValidationResult(input.diagnostics ?? []);
  validation.addAll(builder.diagnostics);
  debugTimed('validate', 'Run checks', () => {
    validation.addAll(runValidation(graph, schema, { hashPolicy: options.hashPolicy ?? 'informational' }));
  });

  debugTimed('metrics', 'Roll up metrics', () => computeMetrics(graph, schema));

  graph.validation = validation;
  graph.seal();
  debug('build', 'Graph complete', {
    nodes: graph.nodeCount(),
    edges: graph.edges().length,
    errors: validation.errors.length,
    warnings: validation.warnings.length,
  });

  return { graph, validation };
}
