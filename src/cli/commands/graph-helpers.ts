/**
 * Output handling shared by the folder and playbook commands.
 */
import * as path from 'node:path';
import chalk from 'chalk';
import { OutputFormatSchema, type Config, type OutputFormat } from '../../core/config/schema.js';
import { GraphFormatter } from '../../core/graph/formatter.js';
import type { RepoGraph } from '../../core/graph/graph.js';
import type { Diagnostics } from '../../core/records/diagnostics.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { writeFile } from '../../utils/file-system.js';
import { getCommitLabel } from '../../utils/git.js';
import { logger as log } from '../../utils/logger.js';

export interface CommonGraphOptions {
  config?: string;
  format?: string;
  output?: string;
  verbose?: boolean;
  quiet?: boolean;
}

export interface GraphRunResult {
  graph: RepoGraph;
  diagnostics: Diagnostics;
  /** The formatted diagram */
  content: string;
  /** Absolute path written to, when --output was given */
  outputPath?: string;
}

export function applyVerbosity(options: CommonGraphOptions): void {
  if (options.verbose) {
    log.setLevel('debug');
  } else if (options.quiet) {
    log.setLevel('error');
  }
}

/**
 * Pick the output format from the command line, falling back to the config.
 */
export function resolveFormat(requested: string | undefined, config: Config): OutputFormat {
  if (requested === undefined) {
    return config.output.format;
  }
  const parsed = OutputFormatSchema.safeParse(requested);
  if (!parsed.success) {
    throw new ConfigError(
      ErrorCodes.INVALID_FORMAT,
      `Invalid format: ${requested}. Use: ${OutputFormatSchema.options.join(', ')}`
    );
  }
  return parsed.data;
}

/**
 * Diagram title: the repository name, with the checked-out revision when git knows it.
 */
export function buildTitle(repoRoot: string): string {
  const name = path.basename(path.resolve(repoRoot));
  const revision = getCommitLabel(repoRoot);
  return revision ? `${name} (${revision})` : name;
}

/**
 * Format the graph and write it to the output file or stdout.
 * The summary goes to stderr so stdout stays a valid diagram.
 */
export async function emitGraph(
  graph: RepoGraph,
  diagnostics: Diagnostics,
  format: OutputFormat,
  output?: string
): Promise<GraphRunResult> {
  const content = new GraphFormatter().format(graph, format);
  const result: GraphRunResult = { graph, diagnostics, content };

  if (output) {
    result.outputPath = path.resolve(output);
    await writeFile(result.outputPath, content);
    log.success(`Generated: ${result.outputPath}`);
  } else {
    console.log(content);
  }

  if (log.getLevel() !== 'silent' && log.getLevel() !== 'error') {
    console.error(chalk.dim('─'.repeat(50)));
    console.error(
      chalk.dim(
        `Nodes: ${graph.nodeCount}, Edges: ${graph.edgeCount}, Subgraphs: ${graph.allSubgraphs().length}`
      )
    );
    const problems = diagnostics.count('error') + diagnostics.count('warning');
    if (problems > 0) {
      console.error(chalk.yellow(`${problems} file problem(s) reported above`));
    }
  }

  return result;
}
