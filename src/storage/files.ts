/**
 * File access: project root discovery, the document corpus, and
 * external record files.
 */

import { existsSync, readFileSync, readdirSync } from 'fs';
import { dirname, join, relative, sep } from 'path';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import type { ExternalRecords, SourceDocument } from '../core/types.js';
import { CONFIG_FILE, formatIssues, readYamlFile } from './config.js';

/**
 * Find the project root by walking up from `startDir` to the first
 * directory holding a config file.
 */
export function findProjectRoot(startDir: string = process.cwd()): string | null {
  let dir = startDir;
  for (;;) {
    if (existsSync(join(dir, CONFIG_FILE))) return dir;
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

function toPosix(path: string): string {
  return path.split(sep).join('/');
}

/**
 * Read every Markdown document under `dir`. Paths are relative to `dir`,
 * use `/` separators, and are sorted so corpus order is stable.
 */
export function loadDocuments(dir: string): SourceDocument[] {
  const files: string[] = [];

  function walkDir(currentDir: string) {
    const entries = readdirSync(currentDir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = join(currentDir, entry.name);
      if (entry.isDirectory()) {
        if (!entry.name.startsWith('.')) walkDir(fullPath);
      } else if (entry.name.endsWith('.md')) {
        files.push(fullPath);
      }
    }
  }

  if (existsSync(dir)) {
    walkDir(dir);
  }

  return files
    .map((file) => ({ path: toPosix(relative(dir, file)), file }))
    .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0))
    .map(({ path, file }) => ({ path, text: readFileSync(file, 'utf-8') }));
}

const TargetsSchema = z.array(z.string().min(1));

const CodeRecordSchema = z.object({
  file: z.string().min(1),
  line: z.number().int().positive(),
  symbol: z.string().optional(),
  validates: TargetsSchema,
});

const TestRecordSchema = z.object({
  id: z.string().min(1).optional(),
  file: z.string().min(1),
  line: z.number().int().positive(),
  name: z.string().min(1),
  suite: z.string().optional(),
  validates: TargetsSchema,
});

const ResultRecordSchema = z.object({
  testId: z.string().min(1),
  status: z.enum(['passed', 'failed', 'skipped', 'unknown']),
  durationMs: z.number().nonnegative().optional(),
  message: z.string().optional(),
  file: z.string().optional(),
  line: z.number().int().positive().optional(),
});

const JourneyRecordSchema = z.object({
  id: z.string().regex(/^JNY-[A-Za-z0-9]+(?:-[A-Za-z0-9]+)*$/, 'must look like JNY-Name-01'),
  title: z.string().min(1),
  actor: z.string().optional(),
  goal: z.string().optional(),
  steps: z.array(z.string()).default([]),
  addresses: TargetsSchema.default([]),
});

export const RecordFileSchema = z
  .object({
    code: z.array(CodeRecordSchema).default([]),
    tests: z.array(TestRecordSchema).default([]),
    results: z.array(ResultRecordSchema).default([]),
    journeys: z.array(JourneyRecordSchema).default([]),
  })
  .strict();

export function emptyRecords(): ExternalRecords {
  return { code: [], tests: [], results: [], journeys: [] };
}

/**
 * Validate one record file's content.
 */
export function parseRecords(raw: unknown, file: string): ExternalRecords {
  const result = RecordFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(file, formatIssues(result.error));
  }
  const data = result.data;

  return {
    code: data.code,
    tests: data.tests,
    results: data.results.map(({ file: resultFile, line, ...rest }) =>
      resultFile !== undefined ? { ...rest, location: { path: resultFile, line: line ?? 1 } } : rest
    ),
    journeys: data.journeys,
  };
}

/**
 * Load a YAML or JSON record file (JSON is read as YAML).
 *
 * @throws ConfigError when the file is unreadable as YAML or fails validation
 */
export function loadRecords(file: string): ExternalRecords {
  return parseRecords(readYamlFile(file), file);
}

/**
 * Concatenate record sets in order.
 */
export function mergeRecords(sets: readonly ExternalRecords[]): ExternalRecords {
  const merged = emptyRecords();
  for (const set of sets) {
    merged.code.push(...set.code);
    merged.tests.push(...set.tests);
    merged.results.push(...set.results);
    merged.journeys.push(...set.journeys);
  }
  return merged;
}
