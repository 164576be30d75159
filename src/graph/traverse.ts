/**
 * Graph traversal.
 *
 * Every traversal is lazy and restartable: iterating the returned value
 * twice walks the graph twice. Each node is visited at most once per
 * walk, so shared descendants and cycles are safe.
 */

import type { GraphNode } from './model.js';
import { Queue } from './queue.js';

export type TraversalOrder = 'pre' | 'post' | 'level';

export interface WalkOptions {
  /** Follow only edges of these relationships. All edges when absent. */
  relations?: ReadonlySet<string>;
}

function restartable<T>(factory: () => Generator<T>): Iterable<T> {
  return { [Symbol.iterator]: factory };
}

function isNodeList(value: GraphNode | readonly GraphNode[]): value is readonly GraphNode[] {
  return Array.isArray(value);
}

function childrenOf(node: GraphNode, relations?: ReadonlySet<string>): GraphNode[] {
  return relations ? node.childrenVia(relations) : node.children;
}

/** Nodes not yet in `visited`, which are then marked. */
function unseen(nodes: GraphNode[], visited: Set<GraphNode>): GraphNode[] {
  const fresh = nodes.filter((n) => !visited.has(n));
  for (const n of fresh) visited.add(n);
  return fresh;
}

function* preOrder(starts: GraphNode[], relations?: ReadonlySet<string>): Generator<GraphNode> {
  const visited = new Set<GraphNode>();
  for (const start of starts) {
    const stack: GraphNode[] = [start];
    while (stack.length > 0) {
      const node = stack.pop();
      if (node === undefined || visited.has(node)) continue;
      visited.add(node);
      yield node;
      const children = childrenOf(node, relations);
      for (let i = children.length - 1; i >= 0; i--) {
        const child = children[i];
        if (child !== undefined && !visited.has(child)) stack.push(child);
      }
    }
  }
}

interface Frame {
  node: GraphNode;
  children: GraphNode[];
  next: number;
}

function* postOrder(starts: GraphNode[], relations?: ReadonlySet<string>): Generator<GraphNode> {
  const visited = new Set<GraphNode>();
  for (const start of starts) {
    if (visited.has(start)) continue;
    visited.add(start);
    const stack: Frame[] = [{ node: start, children: childrenOf(start, relations), next: 0 }];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      if (frame === undefined) break;
      const child = frame.children[frame.next];
      if (child === undefined) {
        stack.pop();
        yield frame.node;
        continue;
      }
      frame.next++;
      if (visited.has(child)) continue;
      visited.add(child);
      stack.push({ node: child, children: childrenOf(child, relations), next: 0 });
    }
  }
}

function* levelOrder(starts: GraphNode[], relations?: ReadonlySet<string>): Generator<GraphNode> {
  const visited = new Set<GraphNode>();
  const queue = new Queue<GraphNode>();
  for (const start of starts) {
    if (visited.has(start)) continue;
    visited.add(start);
    queue.enqueue(start);

    for (let node = queue.dequeue(); node !== undefined; node = queue.dequeue()) {
      yield node;
      queue.enqueueAll(unseen(childrenOf(node, relations), visited));
    }
  }
}

/**
 * Walk downward from one node, or from several sharing one visited set.
 */
export function walk(
  start: GraphNode | readonly GraphNode[],
  order: TraversalOrder = 'pre',
  options: WalkOptions = {}
): Iterable<GraphNode> {
  const starts = isNodeList(start) ? [...start] : [start];
  const { relations } = options;
  switch (order) {
    case 'pre':
      return restartable(() => preOrder(starts, relations));
    case 'post':
      return restartable(() => postOrder(starts, relations));
    case 'level':
      return restartable(() => levelOrder(starts, relations));
  }
}

/**
 * Every node reachable upward from `node`, nearest first. The node
 * itself is excluded even when a cycle leads back to it.
 */
export function ancestors(node: GraphNode, options: WalkOptions = {}): Iterable<GraphNode> {
  const { relations } = options;
  return restartable(function* () {
    const visited = new Set<GraphNode>([node]);
    const queue = new Queue<GraphNode>([node]);
    for (let current = queue.dequeue(); current !== undefined; current = queue.dequeue()) {
      const parents = unseen(relations ? current.parentsVia(relations) : current.parents, visited);
      yield* parents;
      queue.enqueueAll(parents);
    }
  });
}

/**
 * Lazily filter the nodes reachable from `start`.
 */
export function findNodes(
  start: GraphNode | readonly GraphNode[],
  predicate: (node: GraphNode) => boolean,
  order: TraversalOrder = 'pre'
): Iterable<GraphNode> {
  const source = walk(start, order);
  return restartable(function* () {
    for (const node of source) {
      if (predicate(node)) yield node;
    }
  });
}
