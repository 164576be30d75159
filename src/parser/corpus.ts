/**
 * Parse a whole document corpus.
 */

import type { Diagnostic, Journey, Requirement, SourceDocument } from '../core/types.js';
import { debug } from '../core/debug.js';
import { parseDocument, type ParseOptions } from './document.js';

export interface CorpusParseResult {
  requirements: Requirement[];
  journeys: Journey[];
  diagnostics: Diagnostic[];
}

/**
 * Parse each document independently and concatenate the results in
 * corpus order. Duplicate identifiers are left for the graph builder,
 * which needs the global view to decide the first claimant.
 */
export function parseCorpus(
  documents: readonly SourceDocument[],
  options: ParseOptions = {}
): CorpusParseResult {
  const result: CorpusParseResult = { requirements: [], journeys: [], diagnostics: [] };

  for (const document of documents) {
    const parsed = parseDocument(document.text, document.path, options);
    result.requirements.push(...parsed.requirements);
    result.journeys.push(...parsed.journeys);
    result.diagnostics.push(...parsed.diagnostics);
    debug('parse', `Parsed ${document.path}`, {
      requirements: parsed.requirements.length,
      journeys: parsed.journeys.length,
      diagnostics: parsed.diagnostics.length,
    });
  }

  return result;
}
