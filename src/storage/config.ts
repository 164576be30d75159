/**
 * Project configuration (`.spectrace.yaml`).
 *
 * Every key is optional; absent keys fall back to the defaults.
 *
 *   specDir: spec
 *   hashPolicy: strict
 *   identifiers:
 *     prefix: REQ
 *   schema:
 *     format:
 *       requireRationale: true
 *     checks:
 *       orphan: false
 *       format: true
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import type { IdentifierConfig } from '../ids/grammar.js';
import { DEFAULT_IDENTIFIER_CONFIG } from '../ids/grammar.js';
import type { GraphSchema } from '../graph/schema.js';
import { DEFAULT_SCHEMA, mergeSchema } from '../graph/schema.js';
import type { HashPolicy } from '../graph/validate.js';

export const CONFIG_FILE = '.spectrace.yaml';

const LevelSchema = z.enum(['product', 'operational', 'development']);

const NodeKindSchema = z.enum(['requirement', 'assertion', 'code', 'test', 'test_result', 'journey']);

const RelationshipRowSchema = z.object({
  name: z.string().min(1),
  from: z.array(NodeKindSchema).min(1),
  to: z.array(NodeKindSchema).min(1),
  direction: z.enum(['up', 'down']),
  sourceField: z.string().min(1),
  rollup: z.boolean().default(false),
  requiredForNonRoot: z.boolean().default(false),
});

const LevelConstraintSchema = z.object({
  relation: z.string().min(1),
  allowed: z.object({
    product: z.array(LevelSchema).default([]),
    operational: z.array(LevelSchema).default([]),
    development: z.array(LevelSchema).default([]),
  }),
});

const SchemaOverridesSchema = z.object({
  relationships: z.array(RelationshipRowSchema).optional(),
  roots: z
    .object({
      kinds: z.array(NodeKindSchema).optional(),
      levels: z.array(LevelSchema).optional(),
    })
    .optional(),
  levelConstraints: z.array(LevelConstraintSchema).optional(),
  format: z
    .object({
      requireHash: z.boolean(),
      requireRationale: z.boolean(),
      requireAssertions: z.boolean(),
    })
    .partial()
    .optional(),
  checks: z
    .object({
      duplicateId: z.boolean(),
      cycle: z.boolean(),
      orphan: z.boolean(),
      brokenLink: z.boolean(),
      levelConstraint: z.boolean(),
      assertionCoverage: z.boolean(),
      hash: z.boolean(),
      format: z.boolean(),
    })
    .partial()
    .optional(),
});

export const ConfigFileSchema = z
  .object({
    specDir: z.string().min(1).default('spec'),
    hashPolicy: z.enum(['informational', 'strict']).default('informational'),
    identifiers: z
      .object({
        prefix: z.string().regex(/^[A-Za-z][A-Za-z0-9]*$/, 'must be alphanumeric'),
        digits: z.number().int().min(1).max(12),
        namespaceLength: z.number().int().min(1).max(8),
        levels: z.record(z.string().regex(/^[a-z]$/, 'level codes are single lowercase letters'), LevelSchema),
      })
      .partial()
      .optional(),
    schema: SchemaOverridesSchema.optional(),
  })
  .strict();

export interface ProjectConfig {
  /** Directory holding `.spectrace.yaml`. */
  root: string;
  /** Absolute path of the document corpus. */
  specDir: string;
  hashPolicy: HashPolicy;
  identifiers: IdentifierConfig;
  schema: GraphSchema;
}

/**
 * zod issues as `path: message` lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Read a YAML file, turning syntax errors into ConfigError.
 */
export function readYamlFile(file: string): unknown {
  const content = readFileSync(file, 'utf-8');
  try {
    return parse(content);
  } catch (error) {
    throw new ConfigError(file, [error instanceof Error ? error.message : String(error)]);
  }
}

/**
 * Validate raw configuration and fill in defaults.
 */
export function resolveConfig(raw: unknown, root: string, file = CONFIG_FILE): ProjectConfig {
  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(file, formatIssues(result.error));
  }
  const config = result.data;

  const identifiers: IdentifierConfig = {
    ...DEFAULT_IDENTIFIER_CONFIG,
    ...config.identifiers,
  };

  return {
    root,
    specDir: join(root, config.specDir),
    hashPolicy: config.hashPolicy,
    identifiers,
    schema: mergeSchema(DEFAULT_SCHEMA, config.schema ?? {}),
  };
}

/**
 * Load `.spectrace.yaml` from `root`. A missing file yields defaults.
 *
 * @throws ConfigError when the file is not valid YAML or fails validation
 */
export function loadProjectConfig(root: string): ProjectConfig {
  const file = join(root, CONFIG_FILE);
  const raw = existsSync(file) ? readYamlFile(file) : {};
  return resolveConfig(raw, root, file);
}
