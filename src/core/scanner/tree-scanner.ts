/**
 * Whole-repository overview: one node per playbook file, one cluster per
 * directory, then include edges, the role cluster and role links.
 */
import * as path from 'node:path';
import type { Config } from '../config/schema.js';
import { resolveScanPolicy, type ScanPolicy } from '../config/loader.js';
import { RepoGraph, type GraphScope } from '../graph/graph.js';
import { subgraphName } from '../graph/naming.js';
import { Diagnostics } from '../records/diagnostics.js';
import { findInclude } from '../records/include-target.js';
import { RecordReader } from '../records/reader.js';
import { parseRoleRefs } from '../records/role-ref.js';
import { isRecord, type PlaybookRecord } from '../records/types.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import {
  globFilesSync,
  isDirectorySync,
  isFileSync,
  listDirectorySync,
  realPathSync,
  toRepoPath,
  type DirectoryEntry,
} from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';

/** Play keys whose task lists may hold includes */
const PLAY_SECTIONS = ['pre_tasks', 'tasks', 'post_tasks'] as const;

/** Role metadata files, relative to the roles directory */
const ROLE_META_PATTERNS = ['*/meta/main.yml', '*/meta/main.yaml'];

export interface TreeScannerOptions {
  diagnostics?: Diagnostics;
}

export interface ScanOptions {
  /** Diagram title */
  label?: string;
}

/**
 * Scans a repository tree into a RepoGraph.
 */
export class TreeScanner {
  readonly diagnostics: Diagnostics;
  private readonly repoRoot: string;
  private readonly policy: ScanPolicy;
  private readonly reader: RecordReader;
  private readonly records = new Map<string, PlaybookRecord[]>();

  constructor(repoRoot: string, private readonly config: Config, options: TreeScannerOptions = {}) {
    this.repoRoot = path.resolve(repoRoot);
    this.policy = resolveScanPolicy(config);
    this.diagnostics = options.diagnostics ?? new Diagnostics();
    this.reader = new RecordReader(this.repoRoot, this.policy.skipFiles, this.diagnostics);
  }

  /**
   * Run every pass over the configured playbooks and roles directories.
   *
   * @throws ConfigError when the repository root is not a directory
   */
  scan(options: ScanOptions = {}): RepoGraph {
    if (!isDirectorySync(this.repoRoot)) {
      throw new ConfigError(ErrorCodes.ROOT_NOT_FOUND, `Repository root is not a directory: ${this.repoRoot}`, {
        path: this.repoRoot,
      });
    }

    const graph = new RepoGraph({ label: options.label, direction: 'LR' });

    let playbooksDir = path.resolve(this.repoRoot, this.config.layout.playbooks_dir);
    if (!isDirectorySync(playbooksDir)) {
      logger.warn(`No ${this.config.layout.playbooks_dir}/ directory, scanning the repository root`);
      playbooksDir = this.repoRoot;
    }

    this.scanFolder(graph, playbooksDir);
    this.scanEdges(graph, playbooksDir);

    const rolesDir = path.resolve(this.repoRoot, this.config.layout.roles_dir);
    if (isDirectorySync(rolesDir)) {
      this.buildRoleCluster(graph, rolesDir);
    } else {
      logger.debug(`No ${this.config.layout.roles_dir}/ directory, skipping the role cluster`);
    }

    this.scanRoleLinks(graph, playbooksDir);
    return graph;
  }

  /**
   * Add a node for every eligible file and a cluster for every directory below `directory`.
   *
   * @param ancestry - real paths of `directory` and the directories enclosing it in this walk;
   *   a symlinked directory resolving to one of them is reported and not entered
   */
  scanFolder(
    scope: GraphScope,
    directory: string,
    ancestry: ReadonlySet<string> = new Set([realPathSync(directory)])
  ): void {
    for (const entry of this.list(directory)) {
      if (entry.isFile && this.isEligibleFile(entry.name)) {
        scope.addNode(this.key(entry.path), { label: entry.name, style: 'file' });
      } else if (entry.isDirectory && !this.policy.skipFolders.has(entry.name)) {
        const real = realPathSync(entry.path);
        if (ancestry.has(real)) {
          this.diagnostics.report({
            file: this.key(entry.path),
            code: ErrorCodes.DIRECTORY_LOOP,
            message: 'Directory links back to an enclosing directory, not scanned',
            severity: 'warning',
          });
          continue;
        }
        const { name } = subgraphName(this.key(entry.path));
        const subgraph = this.policy.unsupported.has(entry.name)
          ? scope.addSubgraph(name, `${entry.name} (unsupported)`, 'unsupported')
          : scope.addSubgraph(name, entry.name);
        this.scanFolder(subgraph, entry.path, new Set([...ancestry, real]));
      }
    }
  }

  /**
   * Add an include edge for every include found at the top level of a file
   * or inside a play's task lists. Targets without a node get a stub.
   */
  scanEdges(graph: RepoGraph, directory: string): void {
    for (const filePath of this.eligibleFiles(directory)) {
      const source = this.key(filePath);
      for (const record of this.readRecords(filePath)) {
        this.linkInclude(graph, filePath, source, record);

        for (const section of PLAY_SECTIONS) {
          const tasks = record[section];
          if (!Array.isArray(tasks)) continue;
          for (const task of tasks) {
            if (isRecord(task)) {
              this.linkInclude(graph, filePath, source, task);
            }
          }
        }
      }
    }
  }

  /**
   * Link every file to the roles its plays list under `roles:`.
   * Role nodes are not checked for existence.
   */
  scanRoleLinks(graph: RepoGraph, directory: string): void {
    const rolesDir = path.resolve(this.repoRoot, this.config.layout.roles_dir);

    for (const filePath of this.eligibleFiles(directory)) {
      const source = this.key(filePath);
      for (const record of this.readRecords(filePath)) {
        if (!('roles' in record)) continue;
        const refs = parseRoleRefs(record['roles'], (entry) => this.reader.reportInvalidRole(filePath, entry));
        for (const ref of refs) {
          graph.addEdge(source, this.key(path.join(rolesDir, ref.name)), { kind: 'role' });
        }
      }
    }
  }

  /**
   * Add a cluster holding one node per role, linked by the dependencies
   * each role declares in `meta/main.yml` (or `.yaml`).
   */
  buildRoleCluster(graph: RepoGraph, rolesDirectory: string): void {
    const rolesKey = this.key(rolesDirectory);
    const { name } = subgraphName(rolesKey);
    const cluster = graph.addSubgraph(name, path.basename(rolesDirectory), 'roles');

    for (const entry of this.list(rolesDirectory)) {
      if (entry.isDirectory && !this.policy.skipFolders.has(entry.name)) {
        cluster.addNode(this.key(entry.path), { label: entry.name, style: 'role' });
      }
    }

    for (const [role, metaPath] of this.findRoleMetaFiles(rolesDirectory)) {
      const dependent = this.key(path.join(rolesDirectory, role));
      for (const dependency of this.reader.readDependencies(metaPath)) {
        graph.addEdge(dependent, this.key(path.join(rolesDirectory, dependency.name)), {
          kind: 'role-dependency',
        });
      }
    }
  }

  /**
   * Meta file per role name, preferring `main.yml` over `main.yaml`.
   */
  private findRoleMetaFiles(rolesDirectory: string): Map<string, string> {
    const metaByRole = new Map<string, string>();
    for (const metaPath of globFilesSync(ROLE_META_PATTERNS, { cwd: rolesDirectory })) {
      const [role] = path.relative(rolesDirectory, metaPath).split(path.sep);
      if (!role || this.policy.skipFolders.has(role)) continue;
      const current = metaByRole.get(role);
      if (!current || path.extname(metaPath) === '.yml') {
        metaByRole.set(role, metaPath);
      }
    }
    return metaByRole;
  }

  private linkInclude(graph: RepoGraph, filePath: string, source: string, record: PlaybookRecord): void {
    const directive = findInclude(record, this.config.walk.include_keys);
    if (!directive) return;

    const { target } = directive;
    if (target.kind === 'template') {
      this.diagnostics.report({
        file: this.key(filePath),
        code: ErrorCodes.INVALID_INCLUDE,
        message: `Skipping templated ${directive.keyword}: ${target.raw}`,
        severity: 'info',
      });
      return;
    }
    if (target.kind === 'invalid') {
      this.diagnostics.report({
        file: this.key(filePath),
        code: ErrorCodes.INVALID_INCLUDE,
        message: `${directive.keyword} does not name a file: ${JSON.stringify(target.raw)}`,
        severity: 'warning',
      });
      return;
    }

    const resolved = path.resolve(path.dirname(filePath), target.path);
    const targetKey = this.key(resolved);
    if (!graph.hasNode(targetKey)) {
      graph.addNode(targetKey, { label: `Non-existent: ${targetKey}`, style: 'missing' });
      this.diagnostics.report({
        file: source,
        code: ErrorCodes.DANGLING_INCLUDE,
        message: isFileSync(resolved)
          ? `Includes a file outside the scanned tree: ${targetKey}`
          : `Includes non-existent playbook: ${targetKey}`,
        severity: 'warning',
      });
    }
    graph.addEdge(source, targetKey, { kind: 'include' });
  }

  /**
   * Eligible files below `directory`, skipping the same folders and directory loops as scanFolder.
   */
  private *eligibleFiles(
    directory: string,
    ancestry: ReadonlySet<string> = new Set([realPathSync(directory)])
  ): Generator<string> {
    for (const entry of this.list(directory)) {
      if (entry.isFile && this.isEligibleFile(entry.name)) {
        yield entry.path;
      } else if (entry.isDirectory && !this.policy.skipFolders.has(entry.name)) {
        const real = realPathSync(entry.path);
        if (!ancestry.has(real)) {
          yield* this.eligibleFiles(entry.path, new Set([...ancestry, real]));
        }
      }
    }
  }

  private isEligibleFile(name: string): boolean {
    return this.policy.extensions.has(path.extname(name).toLowerCase()) && !this.policy.skipFiles.has(name);
  }

  /**
   * Records of a file, parsed once and shared by the edge and role passes.
   */
  private readRecords(filePath: string): PlaybookRecord[] {
    const cached = this.records.get(filePath);
    if (cached) {
      return cached;
    }
    const records = this.reader.read(filePath);
    this.records.set(filePath, records);
    return records;
  }

  private list(directory: string): DirectoryEntry[] {
    try {
      return listDirectorySync(directory);
    } catch (error) {
      this.diagnostics.report({
        file: this.key(directory),
        code: ErrorCodes.READ_ERROR,
        message: `Cannot list directory: ${error instanceof Error ? error.message : String(error)}`,
        severity: 'error',
      });
      return [];
    }
  }

  private key(filePath: string): string {
    return toRepoPath(this.repoRoot, filePath);
  }
}
