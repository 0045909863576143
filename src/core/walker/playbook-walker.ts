/**
 * Follows one playbook's control flow: a subgraph per file, a chain of
 * plays, task sections and tasks inside it, and includes expanded in place.
 *
 * A file is expanded at most once. Every later include of it links to the
 * first node of its existing subgraph, which is also what stops include cycles.
 */
import { randomUUID } from 'node:crypto';
import * as path from 'node:path';
import type { Config } from '../config/schema.js';
import { RepoGraph, type Subgraph } from '../graph/graph.js';
import { subgraphName } from '../graph/naming.js';
import type { EdgeKind } from '../graph/types.js';
import { Diagnostics } from '../records/diagnostics.js';
import { describeIncludeTarget, findInclude } from '../records/include-target.js';
import { RecordReader } from '../records/reader.js';
import { parseRoleRef, parseRoleRefs } from '../records/role-ref.js';
import { isRecord, type IncludeDirective, type PlaybookRecord } from '../records/types.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { isFileSync } from '../../utils/file-system.js';
import { RoleExpander } from './role-expander.js';

/** Play sections expanded below the play node, in execution order */
const PLAY_SECTIONS = ['pre_tasks', 'roles', 'tasks', 'post_tasks'] as const;

export interface PlaybookWalkerOptions {
  diagnostics?: Diagnostics;
  /** Key generator for task, play and marker nodes */
  createId?: () => string;
}

export interface WalkOptions {
  /** Diagram title */
  label?: string;
}

/**
 * Builds the control-flow graph of a single playbook.
 */
export class PlaybookWalker {
  readonly diagnostics: Diagnostics;
  private readonly repoRoot: string;
  private readonly reader: RecordReader;
  private readonly roles: RoleExpander;
  private readonly createId: () => string;

  constructor(repoRoot: string, private readonly config: Config, options: PlaybookWalkerOptions = {}) {
    this.repoRoot = path.resolve(repoRoot);
    this.diagnostics = options.diagnostics ?? new Diagnostics();
    this.createId = options.createId ?? randomUUID;
    this.reader = new RecordReader(this.repoRoot, new Set(config.scan.skip_files), this.diagnostics);
    this.roles = new RoleExpander({
      rolesDir: path.resolve(this.repoRoot, config.layout.roles_dir),
      showDependencies: config.walk.display_role_dependencies,
      reader: this.reader,
      diagnostics: this.diagnostics,
      createId: this.createId,
    });
  }

  /**
   * Walk from an entry playbook.
   *
   * @throws ConfigError when the entry playbook does not exist
   */
  walk(entryPlaybook: string, options: WalkOptions = {}): RepoGraph {
    const entry = path.resolve(entryPlaybook);
    if (!isFileSync(entry)) {
      throw new ConfigError(ErrorCodes.ROOT_NOT_FOUND, `Playbook not found: ${entry}`, { path: entry });
    }

    const graph = new RepoGraph({ label: options.label, direction: 'TB' });
    this.addPlaybook(graph, entry, null);
    return graph;
  }

  /**
   * Expand a playbook file into its own subgraph, linking its first statement
   * from `parentNode` (the include marker in the calling file).
   */
  addPlaybook(graph: RepoGraph, playbookPath: string, parentNode: string | null): void {
    const { name, label } = subgraphName(this.reader.relative(playbookPath));

    const existing = graph.getSubgraph(name);
    if (existing) {
      this.linkToExpanded(graph, existing, parentNode);
      return;
    }

    // The entry playbook is the first subgraph of the walk
    const style = graph.allSubgraphs().length === 0 ? 'entry' : 'default';
    const subgraph = graph.addSubgraph(name, label, style);

    let previous: string | null = null;
    const link = (node: string): void => {
      if (previous !== null) {
        subgraph.addEdge(previous, node, { kind: 'sequential' });
      } else if (parentNode !== null) {
        graph.addEdge(parentNode, node, { kind: 'include' });
      }
      previous = node;
    };

    for (const record of this.reader.read(playbookPath)) {
      const directive = findInclude(record, this.config.walk.include_keys);
      if (directive) {
        const marker = this.addIncludeMarker(subgraph, directive);
        link(marker);
        this.expandPlaybookInclude(graph, directive, marker, playbookPath);
      }

      if ('hosts' in record) {
        link(this.addPlay(graph, subgraph, record, playbookPath));
      }
    }
  }

  /**
   * Chain a list of tasks from `anchor`, expanding blocks, role includes
   * and task file includes.
   *
   * @param anchorKind - kind of the edge from `anchor` to the first task
   */
  addTasks(
    graph: RepoGraph,
    tasks: unknown[],
    subgraph: Subgraph,
    anchor: string,
    currentFile: string,
    anchorKind: EdgeKind = 'sequential'
  ): void {
    let previous = anchor;
    const link = (node: string): void => {
      subgraph.addEdge(previous, node, { kind: previous === anchor ? anchorKind : 'sequential' });
      previous = node;
    };

    for (const task of tasks) {
      if (!isRecord(task)) continue;

      if ('block' in task) {
        const name = labelText(task['name']);
        const marker = this.createId();
        subgraph.addNode(marker, { label: name ? `block: ${name}` : 'block:', style: 'task' });
        link(marker);
        const nested = task['block'];
        if (Array.isArray(nested)) {
          this.addTasks(graph, nested, subgraph, marker, currentFile);
        }
        continue;
      }

      const roleKeyword = this.config.walk.include_role_keys.find((keyword) => keyword in task);
      if (roleKeyword) {
        const marker = this.createId();
        const name = labelText(task['name']) ?? '(Unnamed)';
        subgraph.addNode(marker, { label: `${roleKeyword}: ${name}`, style: 'task' });
        link(marker);
        const role = parseRoleRef(task[roleKeyword]);
        if (role) {
          this.roles.addRoles(subgraph, marker, [role]);
        } else {
          this.reader.reportInvalidRole(currentFile, task[roleKeyword]);
        }
        continue;
      }

      const directive = findInclude(task, this.config.walk.include_keys);
      if (directive) {
        const marker = this.addIncludeMarker(subgraph, directive);
        link(marker);
        this.expandTaskInclude(graph, directive, marker, currentFile);
        continue;
      }

      const node = this.createId();
      const name = labelText(task['name']) ?? `(Unnamed) ${Object.keys(task)[0] ?? ''}`.trimEnd();
      subgraph.addNode(node, { label: `task: ${name}`, style: 'task' });
      link(node);
    }
  }

  /**
   * Add a play node followed by one summary node per non-empty section,
   * each with its detailed expansion hanging below it.
   *
   * @returns the play node
   */
  private addPlay(graph: RepoGraph, subgraph: Subgraph, play: PlaybookRecord, playbookPath: string): string {
    const playNode = this.createId();
    const name = labelText(play['name']) ?? '(Unnamed)';
    subgraph.addNode(playNode, { label: `Play: ${name}\n(${formatHosts(play['hosts'])})`, style: 'play' });

    const { display_roles, display_role_dependencies } = this.config.walk;
    let previous = playNode;
    for (const section of PLAY_SECTIONS) {
      const entries = play[section];
      if (!Array.isArray(entries) || entries.length === 0) continue;
      if (section === 'roles' && !display_roles && !display_role_dependencies) continue;

      const summary = this.createId();
      subgraph.addNode(summary, { label: `${section}: ${entries.length}`, style: 'summary' });
      subgraph.addEdge(previous, summary, { kind: 'sequential' });

      if (section === 'roles') {
        const roles = parseRoleRefs(entries, (entry) => this.reader.reportInvalidRole(playbookPath, entry));
        this.roles.addRoles(subgraph, summary, roles);
      } else {
        this.addTasks(graph, entries, subgraph, summary, playbookPath);
      }
      previous = summary;
    }

    return playNode;
  }

  /**
   * Recurse into a playbook named by a top-level include.
   */
  private expandPlaybookInclude(
    graph: RepoGraph,
    directive: IncludeDirective,
    marker: string,
    currentFile: string
  ): void {
    const included = this.resolveInclude(directive, currentFile);
    if (!included) return;

    if (!isFileSync(included)) {
      this.addMissing(graph, marker, included, currentFile);
      return;
    }
    this.addPlaybook(graph, included, marker);
  }

  /**
   * Expand a task file named by a task-level include into its own subgraph,
   * or link to it when it was expanded already.
   */
  private expandTaskInclude(
    graph: RepoGraph,
    directive: IncludeDirective,
    marker: string,
    currentFile: string
  ): void {
    const included = this.resolveInclude(directive, currentFile);
    if (!included) return;

    const { name, label } = subgraphName(this.reader.relative(included));
    const existing = graph.getSubgraph(name);
    if (existing) {
      this.linkToExpanded(graph, existing, marker);
      return;
    }
    if (!isFileSync(included)) {
      this.addMissing(graph, marker, included, currentFile);
      return;
    }

    const subgraph = graph.addSubgraph(name, label);
    this.addTasks(graph, this.reader.read(included), subgraph, marker, included, 'include');
  }

  /**
   * Absolute path of a literal include, or null when it cannot be followed.
   */
  private resolveInclude(directive: IncludeDirective, currentFile: string): string | null {
    const { target } = directive;
    switch (target.kind) {
      case 'path':
        return path.resolve(path.dirname(currentFile), target.path);
      case 'template':
        // Resolved at run time; the marker is as far as the graph goes
        return null;
      case 'invalid':
        this.diagnostics.report({
          file: this.reader.relative(currentFile),
          code: ErrorCodes.INVALID_INCLUDE,
          message: `${directive.keyword} does not name a file: ${JSON.stringify(target.raw)}`,
          severity: 'warning',
        });
        return null;
    }
  }

  private linkToExpanded(graph: RepoGraph, subgraph: Subgraph, parentNode: string | null): void {
    const first = subgraph.firstNode();
    if (parentNode !== null && first !== null) {
      graph.addEdge(parentNode, first, { kind: 'include' });
    }
  }

  private addIncludeMarker(subgraph: Subgraph, directive: IncludeDirective): string {
    const marker = this.createId();
    subgraph.addNode(marker, {
      label: `${directive.keyword}: ${describeIncludeTarget(directive.target)}`,
      style: 'include',
    });
    return marker;
  }

  private addMissing(graph: RepoGraph, marker: string, missingPath: string, currentFile: string): void {
    const key = this.reader.relative(missingPath);
    graph.addNode(key, { label: `Non-existent: ${key}`, style: 'missing' });
    graph.addEdge(marker, key, { kind: 'include' });
    this.diagnostics.report({
      file: this.reader.relative(currentFile),
      code: ErrorCodes.DANGLING_INCLUDE,
      message: `Includes non-existent file: ${key}`,
      severity: 'warning',
    });
  }
}

/**
 * Display text for a scalar YAML value, null when there is none.
 */
function labelText(value: unknown): string | null {
  if (typeof value === 'string') {
    return value.trim() || null;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return null;
}

function formatHosts(hosts: unknown): string {
  if (Array.isArray(hosts)) {
    return hosts.map(String).join(', ');
  }
  return labelText(hosts) ?? '';
}
