import { Command } from 'commander';
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import { TreeScanner } from '../../core/scanner/index.js';
import { logger as log } from '../../utils/logger.js';
import {
  applyVerbosity,
  buildTitle,
  emitGraph,
  resolveFormat,
  type CommonGraphOptions,
  type GraphRunResult,
} from './graph-helpers.js';

/**
 * Create the folder command.
 */
export function createFolderCommand(): Command {
  return new Command('folder')
    .description('Graph every playbook of a repository, its includes and role dependencies')
    .argument('<repo-path>', 'Repository root')
    .option('-c, --config <path>', 'Path to config file, relative to the repository root')
    .option('-f, --format <format>', 'Output format (dot, mermaid, json)')
    .option('-o, --output <file>', 'Write the diagram to a file instead of stdout')
    .option('-v, --verbose', 'Report skipped and empty files')
    .option('-q, --quiet', 'Only report errors')
    .action(async (repoPath: string, options: CommonGraphOptions) => {
      try {
        await runFolder(repoPath, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

export async function runFolder(repoPath: string, options: CommonGraphOptions = {}): Promise<GraphRunResult> {
  applyVerbosity(options);

  const repoRoot = path.resolve(repoPath);
  const config = loadConfig(repoRoot, options.config);
  const format = resolveFormat(options.format, config);

  const scanner = new TreeScanner(repoRoot, config);
  const graph = scanner.scan({ label: buildTitle(repoRoot) });

  return emitGraph(graph, scanner.diagnostics, format, options.output);
}
