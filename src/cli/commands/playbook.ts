import { Command } from 'commander';
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import { PlaybookWalker } from '../../core/walker/index.js';
import { getRepositoryRoot } from '../../utils/git.js';
import { logger as log } from '../../utils/logger.js';
import {
  applyVerbosity,
  buildTitle,
  emitGraph,
  resolveFormat,
  type CommonGraphOptions,
  type GraphRunResult,
} from './graph-helpers.js';

export interface PlaybookCommandOptions extends CommonGraphOptions {
  root?: string;
  roles?: boolean;
  roleDeps?: boolean;
}

/**
 * Create the playbook command.
 */
export function createPlaybookCommand(): Command {
  return new Command('playbook')
    .description('Graph the control flow of one playbook, following its includes and roles')
    .argument('<playbook-path>', 'Entry playbook')
    .option('--root <path>', 'Repository root (default: git top-level, else the playbook folder)')
    .option('-c, --config <path>', 'Path to config file, relative to the repository root')
    .option('-f, --format <format>', 'Output format (dot, mermaid, json)')
    .option('-o, --output <file>', 'Write the diagram to a file instead of stdout')
    .option('--role-deps', 'Expand role dependencies from meta/main.yml')
    .option('--no-roles', 'Hide role sections')
    .option('-v, --verbose', 'Report skipped and empty files')
    .option('-q, --quiet', 'Only report errors')
    .action(async (playbookPath: string, options: PlaybookCommandOptions) => {
      try {
        await runPlaybook(playbookPath, options);
      } catch (error) {
        log.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

export async function runPlaybook(
  playbookPath: string,
  options: PlaybookCommandOptions = {}
): Promise<GraphRunResult> {
  applyVerbosity(options);

  const playbook = path.resolve(playbookPath);
  const playbookDir = path.dirname(playbook);
  const repoRoot = options.root ? path.resolve(options.root) : getRepositoryRoot(playbookDir) ?? playbookDir;

  const loaded = loadConfig(repoRoot, options.config);
  const config = {
    ...loaded,
    walk: {
      ...loaded.walk,
      display_roles: options.roles === false ? false : loaded.walk.display_roles,
      display_role_dependencies: options.roleDeps ?? loaded.walk.display_role_dependencies,
    },
  };
  const format = resolveFormat(options.format, config);

  const walker = new PlaybookWalker(repoRoot, config);
  const graph = walker.walk(playbook, { label: buildTitle(repoRoot) });

  return emitGraph(graph, walker.diagnostics, format, options.output);
}
