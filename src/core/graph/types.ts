/**
 * Semantic category of a node. Formatters map these to colours and shapes.
 */
export type NodeStyle =
  | 'file'
  | 'missing'
  | 'play'
  | 'include'
  | 'task'
  | 'summary'
  | 'role'
  | 'role-dependency';

/**
 * Node in the repository graph.
 */
export interface GraphNode {
  /** Unique key: repo-relative path, role path, or generated id */
  id: string;
  /** Display label */
  label: string;
  style: NodeStyle;
  /** Name of the innermost subgraph holding the node, null for the root */
  subgraph: string | null;
}

/**
 * Relationship an edge stands for.
 * - sequential: one statement follows another within a file
 * - include: one file references another
 * - role: a play or task invokes a role
 * - role-dependency: a role's metadata depends on another role
 */
export type EdgeKind = 'sequential' | 'include' | 'role' | 'role-dependency';

/**
 * Edge in the repository graph.
 */
export interface GraphEdge {
  /** Source node ID */
  from: string;
  /** Target node ID */
  to: string;
  kind: EdgeKind;
  /** Role dependencies on the first chain are primary, deeper chains secondary */
  emphasis?: 'primary' | 'secondary';
}

export type SubgraphStyle = 'default' | 'entry' | 'unsupported' | 'roles';

export interface NodeInit {
  label?: string;
  style?: NodeStyle;
}

export interface EdgeInit {
  kind?: EdgeKind;
  emphasis?: 'primary' | 'secondary';
}

/**
 * Layout direction written into the diagram.
 */
export type GraphDirection = 'LR' | 'TB';

/**
 * Graph output format.
 */
export type GraphFormat = 'dot' | 'mermaid' | 'json';
