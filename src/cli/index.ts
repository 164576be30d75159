#!/usr/bin/env node
/**
 * spectrace CLI - build the trace graph of a project and report on it.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { SpectraceError } from '../core/errors.js';
import { NODE_KINDS, isNodeKind } from '../core/types.js';
import { findProjectRoot } from '../storage/files.js';
import { loadProjectConfig, type ProjectConfig } from '../storage/config.js';
import { buildProject } from '../storage/project.js';
import { graphTotals } from '../graph/metrics.js';
import { formatDiagnostics, formatNode, formatSummary } from '../export/diagnostics.js';

const program = new Command();

program
  .name('spectrace')
  .description('Requirement traceability: parse spec documents, build the trace graph, report gaps')
  .version('0.1.0')
  .option('-C, --root <dir>', 'Project root (default: nearest directory with .spectrace.yaml)');

function fail(message: string): never {
  console.error(chalk.red(message));
  process.exit(1);
}

function projectConfig(): ProjectConfig {
  const { root } = program.opts<{ root?: string }>();
  const projectRoot = root ?? findProjectRoot() ?? process.cwd();
  return loadProjectConfig(projectRoot);
}

/**
 * Run a command body, reporting configuration and schema errors in red.
 */
function guarded(fn: () => void): void {
  try {
    fn();
  } catch (error) {
    if (error instanceof SpectraceError) fail(error.message);
    throw error;
  }
}

// Check command
program
  .command('check')
  .description('Build the graph and print diagnostics and a coverage summary')
  .option('-r, --records <files...>', 'Record files (YAML or JSON) with code, tests, results, journeys')
  .option('--strict-hash', 'Treat hash mismatches as errors')
  .option('-q, --quiet', 'Only print errors')
  .action((options: { records?: string[]; strictHash?: boolean; quiet?: boolean }) =>
    guarded(() => {
      const config = projectConfig();
      const { graph, validation } = buildProject(config, {
        recordFiles: options.records,
        hashPolicy: options.strictHash ? 'strict' : undefined,
      });

      const shown = options.quiet ? validation.errors : validation.diagnostics;
      if (shown.length > 0) {
        console.log(formatDiagnostics(shown));
        console.log();
      }
      console.log(formatSummary(graph, graphTotals(graph, config.schema), validation));

      if (!validation.isValid) {
        process.exit(1);
      }
    })
  );

// Show command
program
  .command('show <id>')
  .description('Show one node with its parents, children and metrics')
  .option('-r, --records <files...>', 'Record files (YAML or JSON)')
  .action((id: string, options: { records?: string[] }) =>
    guarded(() => {
      const { graph } = buildProject(projectConfig(), { recordFiles: options.records });
      const node = graph.findById(id);
      if (!node) fail(`Node not found: ${id}`);
      console.log(formatNode(node));
    })
  );

// List command
program
  .command('list [kind]')
  .description(`List node ids, optionally of one kind (${NODE_KINDS.join(', ')})`)
  .option('-r, --records <files...>', 'Record files (YAML or JSON)')
  .action((kind: string | undefined, options: { records?: string[] }) =>
    guarded(() => {
      if (kind !== undefined && !isNodeKind(kind)) {
        fail(`Unknown kind: ${kind}. Must be one of: ${NODE_KINDS.join(', ')}`);
      }
      const { graph } = buildProject(projectConfig(), { recordFiles: options.records });
      const nodes = kind ? graph.nodesByKind(kind) : [...graph.allNodes('pre')];
      for (const node of nodes) {
        console.log(`${chalk.cyan(node.id)} - ${node.label}`);
      }
    })
  );

program.parse();
