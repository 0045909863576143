import * as path from 'node:path';
import type { Subgraph } from '../graph/graph.js';
import type { Diagnostics } from '../records/diagnostics.js';
import type { RecordReader } from '../records/reader.js';
import type { RoleRef } from '../records/types.js';
import { ErrorCodes } from '../../utils/errors.js';
import { isFileSync } from '../../utils/file-system.js';

const META_FILES = ['main.yml', 'main.yaml'];

export interface RoleExpanderOptions {
  /** Absolute path of the directory holding one folder per role */
  rolesDir: string;
  /** Expand each role's declared dependencies */
  showDependencies: boolean;
  reader: RecordReader;
  diagnostics: Diagnostics;
  createId: () => string;
}

/**
 * Adds role chains, and optionally their dependency chains, to a playbook's subgraph.
 */
export class RoleExpander {
  constructor(private readonly options: RoleExpanderOptions) {}

  /**
   * Chain one node per role starting from `anchor`.
   */
  addRoles(subgraph: Subgraph, anchor: string, roles: RoleRef[]): void {
    let previous = anchor;
    for (const role of roles) {
      const roleNode = this.options.createId();
      subgraph.addNode(roleNode, { label: `role: ${role.name}`, style: 'role' });
      subgraph.addEdge(previous, roleNode, { kind: 'role' });

      if (this.options.showDependencies) {
        this.addRoleDependency(subgraph, roleNode, role.name, 0, true, new Set([role.name]));
      }
      previous = roleNode;
    }
  }

  /**
   * Chain the dependencies declared in `<roles>/<name>/meta/main.yml` from `anchor`,
   * recursing into each one. A dependency already on `ancestry` gets its node
   * but is not expanded again.
   *
   * @param depth - dependency depth of `roleName`; its dependencies are labelled depth + 1
   * @param isPrimaryPath - false below the first dependency chain
   */
  addRoleDependency(
    subgraph: Subgraph,
    anchor: string,
    roleName: string,
    depth: number,
    isPrimaryPath: boolean,
    ancestry: ReadonlySet<string>
  ): void {
    const metaPath = this.findMetaFile(roleName);
    if (!metaPath) {
      return;
    }

    const level = depth + 1;
    let previous = anchor;
    for (const dependency of this.options.reader.readDependencies(metaPath)) {
      const dependencyNode = this.options.createId();
      subgraph.addNode(dependencyNode, {
        label: `role_dep(${level}): ${dependency.name}`,
        style: 'role-dependency',
      });
      subgraph.addEdge(previous, dependencyNode, {
        kind: 'role-dependency',
        emphasis: isPrimaryPath ? 'primary' : 'secondary',
      });

      if (ancestry.has(dependency.name)) {
        this.options.diagnostics.report({
          file: this.options.reader.relative(metaPath),
          code: ErrorCodes.ROLE_DEPENDENCY_CYCLE,
          message: `Role dependency cycle: ${[...ancestry, dependency.name].join(' -> ')}`,
          severity: 'warning',
        });
      } else {
        this.addRoleDependency(
          subgraph,
          dependencyNode,
          dependency.name,
          level,
          false,
          new Set([...ancestry, dependency.name])
        );
      }
      previous = dependencyNode;
    }
  }

  private findMetaFile(roleName: string): string | null {
    for (const fileName of META_FILES) {
      const candidate = path.join(this.options.rolesDir, roleName, 'meta', fileName);
      if (isFileSync(candidate)) {
        return candidate;
      }
    }
    return null;
  }
}
