/**
 * Trace graph nodes, edges and the owning container.
 *
 * A node may have several parents: the graph is a DAG, not a tree.
 * Nodes refer to each other directly; the graph owns the only index.
 */

import type {
  Assertion,
  CodeReference,
  Journey,
  NodeKind,
  Requirement,
  SourceLocation,
  TestReference,
  TestResult,
} from '../core/types.js';
import { SpectraceError } from '../core/errors.js';
import { ValidationResult } from '../core/diagnostics.js';
import { walk, type TraversalOrder } from './traverse.js';

/**
 * Kind-specific content; exactly one variant per node.
 */
export type NodePayload =
  | { kind: 'requirement'; requirement: Requirement }
  | { kind: 'assertion'; assertion: Assertion }
  | { kind: 'code'; code: CodeReference }
  | { kind: 'test'; test: TestReference; results: string[] }
  | { kind: 'test_result'; result: TestResult }
  | { kind: 'journey'; journey: Journey };

export interface Edge {
  parent: GraphNode;
  child: GraphNode;
  relation: string;
}

/**
 * Counts over a node and its distinct rollup descendants.
 */
export interface RollupMetrics {
  totalRequirements: number;
  totalAssertions: number;
  coveredAssertions: number;
  /** Ids of uncovered assertions, in traversal order. */
  uncoveredAssertions: string[];
  /** Assertions covered by a test or code reference. */
  directCovered: number;
  /** Assertions a requirement implements by label. */
  explicitCovered: number;
  /**
   * Assertions whose requirement another requirement implements as a
   * whole. Not counted in `coveredAssertions`.
   */
  inferredCovered: number;
  /** Assertions with a covering test whose status is passed. */
  validatedAssertions: number;
  totalTests: number;
  passedTests: number;
  failedTests: number;
  skippedTests: number;
  unknownTests: number;
  totalCodeRefs: number;
  hasFailures: boolean;
  /** 0–100; 0 when there are no assertions. */
  coveragePct: number;
  /** 0–100; 0 when there are no tests. */
  passRatePct: number;
}

export class GraphError extends SpectraceError {}

export class GraphNode {
  readonly parents: GraphNode[] = [];
  readonly children: GraphNode[] = [];
  /** Edges in which this node is the child. */
  readonly incoming: Edge[] = [];
  /** Edges in which this node is the parent. */
  readonly outgoing: Edge[] = [];
  metrics?: RollupMetrics;

  constructor(
    readonly id: string,
    readonly payload: NodePayload,
    readonly label: string,
    readonly source?: SourceLocation
  ) {}

  get kind(): NodeKind {
    return this.payload.kind;
  }

  /**
   * Distinct children reached through the given relationships.
   */
  childrenVia(relations: ReadonlySet<string>): GraphNode[] {
    return distinct(this.outgoing.filter((e) => relations.has(e.relation)).map((e) => e.child));
  }

  /**
   * Distinct parents reached through the given relationships.
   */
  parentsVia(relations: ReadonlySet<string>): GraphNode[] {
    return distinct(this.incoming.filter((e) => relations.has(e.relation)).map((e) => e.parent));
  }
}

function distinct(nodes: GraphNode[]): GraphNode[] {
  return [...new Set(nodes)];
}

function edgeKey(parent: GraphNode, child: GraphNode, relation: string): string {
  return `${parent.id}\u0000${child.id}\u0000${relation}`;
}

/**
 * Owning container for one build. Mutable until `seal()`, read-only after.
 */
export class TraceGraph {
  private readonly nodes: GraphNode[] = [];
  private readonly index = new Map<string, GraphNode>();
  private readonly edgeList: Edge[] = [];
  private readonly edgeKeys = new Set<string>();
  private readonly conflicting: GraphNode[] = [];
  private sealed = false;

  validation = new ValidationResult();

  /**
   * @param rootRelations - per kind, the relationships that give a node
   *   a mandatory parent; a node with none of those parents is a root
   */
  constructor(private readonly rootRelations: ReadonlyMap<NodeKind, ReadonlySet<string>> = new Map()) {}

  private assertMutable(): void {
    if (this.sealed) {
      throw new GraphError('Trace graph is sealed; rebuild instead of mutating it');
    }
  }

  /**
   * Insert and index a node. Ids must be unique.
   */
  addNode(node: GraphNode): GraphNode {
    this.assertMutable();
    if (this.index.has(node.id)) {
      throw new GraphError(`Node '${node.id}' is already in the graph`);
    }
    this.nodes.push(node);
    this.index.set(node.id, node);
    return node;
  }

  /**
   * Keep a node that lost an identifier conflict. It is not indexed,
   * linked or traversed.
   */
  addConflict(node: GraphNode): void {
    this.assertMutable();
    this.conflicting.push(node);
  }

  /**
   * Connect parent → child. Linking the same pair under the same
   * relationship again is a no-op and returns null.
   */
  link(parent: GraphNode, child: GraphNode, relation: string): Edge | null {
    this.assertMutable();
    const key = edgeKey(parent, child, relation);
    if (this.edgeKeys.has(key)) return null;
    this.edgeKeys.add(key);

    const edge: Edge = { parent, child, relation };
    this.edgeList.push(edge);
    parent.outgoing.push(edge);
    child.incoming.push(edge);
    if (!parent.children.includes(child)) parent.children.push(child);
    if (!child.parents.includes(parent)) child.parents.push(parent);
    return edge;
  }

  /** Forbid further structural changes. */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  findById(id: string): GraphNode | undefined {
    return this.index.get(id);
  }

  nodesByKind(kind: NodeKind): GraphNode[] {
    return this.nodes.filter((n) => n.kind === kind);
  }

  /**
   * Nodes without a mandatory parent, in insertion order. Kinds with no
   * mandatory relationship are roots when they have no parents at all.
   */
  roots(): GraphNode[] {
    return this.nodes.filter((n) => {
      const relations = this.rootRelations.get(n.kind);
      return relations ? n.parentsVia(relations).length === 0 : n.parents.length === 0;
    });
  }

  /** Indexed nodes in insertion order. */
  nodeList(): readonly GraphNode[] {
    return this.nodes;
  }

  edges(): readonly Edge[] {
    return this.edgeList;
  }

  /** Later claimants of duplicated identifiers. */
  conflicts(): readonly GraphNode[] {
    return this.conflicting;
  }

  nodeCount(): number {
    return this.nodes.length;
  }

  /**
   * Every indexed node once, walking from the roots first. Nodes only
   * reachable through a cycle come after, in insertion order.
   */
  allNodes(order: TraversalOrder = 'pre'): Iterable<GraphNode> {
    return walk([...this.roots(), ...this.nodes], order);
  }
}
