/**
 * Read a project from disk and build its graph.
 */

import { debug } from '../core/debug.js';
import { parseCorpus } from '../parser/corpus.js';
import { buildGraph, type BuildResult } from '../graph/builder.js';
import type { HashPolicy } from '../graph/validate.js';
import type { ProjectConfig } from './config.js';
import { loadDocuments, loadRecords, mergeRecords } from './files.js';

export interface ProjectBuildOptions {
  /** Record files (YAML or JSON) holding code, tests, results and journeys. */
  recordFiles?: readonly string[];
  /** Overrides the configured policy. */
  hashPolicy?: HashPolicy;
}

export function buildProject(config: ProjectConfig, options: ProjectBuildOptions = {}): BuildResult {
  const documents = loadDocuments(config.specDir);
  debug('project', `Loaded ${documents.length} documents`, { specDir: config.specDir });

  const parsed = parseCorpus(documents, { identifiers: config.identifiers });
  const records = mergeRecords((options.recordFiles ?? []).map((file) => loadRecords(file)));

  return buildGraph(
    {
      requirements: parsed.requirements,
      journeys: [...parsed.journeys, ...records.journeys],
      code: records.code,
      tests: records.tests,
      results: records.results,
      diagnostics: parsed.diagnostics,
    },
    config.schema,
    {
      identifiers: config.identifiers,
      hashPolicy: options.hashPolicy ?? config.hashPolicy,
    }
  );
}
