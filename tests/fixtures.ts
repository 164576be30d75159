/**
 * Builders for requirement documents used across tests.
 */

import type { Journey, SourceDocument } from '../src/core/types.js';
import { GraphNode } from '../src/graph/model.js';

export interface BlockOptions {
  id: string;
  title: string;
  level: string;
  implements?: string;
  assertions?: string[];
  hash?: string;
}

/**
 * A requirement block. Line layout (1-based, relative to the block):
 * header 1, metadata 3, body 5, `## Assertions` 7, assertion N at 8 + N.
 */
export function requirementBlock(options: BlockOptions): string {
  const lines = [
    `# ${options.id}: ${options.title}`,
    '',
    `**Level**: ${options.level} | **Status**: Active | **Implements**: ${options.implements ?? '-'}`,
    '',
    `${options.title} body.`,
    '',
  ];
  const assertions = options.assertions ?? [];
  if (assertions.length > 0) {
    lines.push('## Assertions', '');
    assertions.forEach((text, i) => lines.push(`${String.fromCharCode(65 + i)}. ${text}`));
    lines.push('');
  }
  lines.push(options.hash ? `*End* *${options.title}* | **Hash**: ${options.hash}` : `*End* *${options.title}*`);
  lines.push('');
  return lines.join('\n');
}

export function doc(path: string, ...blocks: BlockOptions[]): SourceDocument {
  return { path, text: blocks.map(requirementBlock).join('\n') };
}

/**
 * A bare node for exercising the graph container and traversals.
 */
export function journeyNode(id: string): GraphNode {
  const journey: Journey = { id, title: id, steps: [], addresses: [] };
  return new GraphNode(id, { kind: 'journey', journey }, id);
}
