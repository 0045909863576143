/**
 * Strict directed graph with nested subgraphs.
 *
 * Nodes and edges live in the root registry so that a node is unique across
 * every subgraph; each scope only remembers which nodes it holds directly.
 * Adding a node or an edge that already exists is a no-op returning the
 * existing element.
 */
import type {
  EdgeInit,
  GraphDirection,
  GraphEdge,
  GraphNode,
  NodeInit,
  SubgraphStyle,
} from './types.js';

function edgeKey(from: string, to: string): string {
  return `${from}\u0000${to}`;
}

/**
 * Shared behaviour of the root graph and its subgraphs.
 */
export abstract class GraphScope {
  protected readonly nodeIds: string[] = [];
  protected readonly children: Subgraph[] = [];

  protected abstract get root(): RepoGraph;

  /** Subgraph name, null for the root graph */
  abstract get scopeName(): string | null;

  /**
   * Add a node held by this scope. Returns the existing node when the key is taken.
   */
  addNode(id: string, init: NodeInit = {}): GraphNode {
    const existing = this.root.getNode(id);
    if (existing) {
      return existing;
    }
    const node: GraphNode = {
      id,
      label: init.label ?? id,
      style: init.style ?? 'file',
      subgraph: this.scopeName,
    };
    this.root.registerNode(node);
    this.nodeIds.push(id);
    return node;
  }

  /**
   * Add a directed edge. Missing endpoints are created in this scope with their key as label.
   */
  addEdge(from: string, to: string, init: EdgeInit = {}): GraphEdge {
    const existing = this.root.getEdge(from, to);
    if (existing) {
      return existing;
    }
    this.addNode(from);
    this.addNode(to);
    const edge: GraphEdge = { from, to, kind: init.kind ?? 'sequential' };
    if (init.emphasis) {
      edge.emphasis = init.emphasis;
    }
    this.root.registerEdge(edge);
    return edge;
  }

  /**
   * Whether a node with this key exists anywhere in the graph.
   */
  hasNode(id: string): boolean {
    return this.root.getNode(id) !== undefined;
  }

  /**
   * Create a subgraph under this scope, or return the one already registered under `name`.
   */
  addSubgraph(name: string, label: string, style: SubgraphStyle = 'default'): Subgraph {
    const existing = this.root.getSubgraph(name);
    if (existing) {
      return existing;
    }
    const subgraph = new Subgraph(this.root, this, name, label, style);
    this.root.registerSubgraph(subgraph);
    this.children.push(subgraph);
    return subgraph;
  }

  /**
   * Look up a subgraph by name anywhere in the graph.
   */
  getSubgraph(name: string): Subgraph | undefined {
    return this.root.getSubgraph(name);
  }

  /** Nodes held directly by this scope, in insertion order */
  nodes(): GraphNode[] {
    const result: GraphNode[] = [];
    for (const id of this.nodeIds) {
      const node = this.root.getNode(id);
      if (node) {
        result.push(node);
      }
    }
    return result;
  }

  /** Direct child subgraphs, in creation order */
  subgraphs(): Subgraph[] {
    return [...this.children];
  }

  /** Key of the first node added to this scope */
  firstNode(): string | null {
    return this.nodeIds[0] ?? null;
  }
}

/**
 * A named, labelled grouping of nodes (one directory or one file).
 */
export class Subgraph extends GraphScope {
  constructor(
    private readonly owner: RepoGraph,
    public readonly parent: GraphScope,
    public readonly name: string,
    public label: string,
    public style: SubgraphStyle
  ) {
    super();
  }

  protected get root(): RepoGraph {
    return this.owner;
  }

  get scopeName(): string {
    return this.name;
  }
}

export interface RepoGraphOptions {
  /** Diagram title */
  label?: string;
  direction?: GraphDirection;
}

/**
 * Root of the graph: owns every node, edge and subgraph.
 */
export class RepoGraph extends GraphScope {
  readonly label: string;
  readonly direction: GraphDirection;

  private readonly nodeMap = new Map<string, GraphNode>();
  private readonly edgeMap = new Map<string, GraphEdge>();
  private readonly subgraphMap = new Map<string, Subgraph>();

  constructor(options: RepoGraphOptions = {}) {
    super();
    this.label = options.label ?? '';
    this.direction = options.direction ?? 'TB';
  }

  protected get root(): RepoGraph {
    return this;
  }

  get scopeName(): null {
    return null;
  }

  getNode(id: string): GraphNode | undefined {
    return this.nodeMap.get(id);
  }

  getEdge(from: string, to: string): GraphEdge | undefined {
    return this.edgeMap.get(edgeKey(from, to));
  }

  hasEdge(from: string, to: string): boolean {
    return this.edgeMap.has(edgeKey(from, to));
  }

  override getSubgraph(name: string): Subgraph | undefined {
    return this.subgraphMap.get(name);
  }

  /** @internal Called by scopes when a new node is created. */
  registerNode(node: GraphNode): void {
    this.nodeMap.set(node.id, node);
  }

  /** @internal Called by scopes when a new edge is created. */
  registerEdge(edge: GraphEdge): void {
    this.edgeMap.set(edgeKey(edge.from, edge.to), edge);
  }

  /** @internal Called by scopes when a new subgraph is created. */
  registerSubgraph(subgraph: Subgraph): void {
    this.subgraphMap.set(subgraph.name, subgraph);
  }

  /** Every node in the graph, in creation order */
  allNodes(): GraphNode[] {
    return [...this.nodeMap.values()];
  }

  /** Every edge in the graph, in creation order */
  allEdges(): GraphEdge[] {
    return [...this.edgeMap.values()];
  }

  /** Every subgraph at any depth, in creation order */
  allSubgraphs(): Subgraph[] {
    return [...this.subgraphMap.values()];
  }

  get nodeCount(): number {
    return this.nodeMap.size;
  }

  get edgeCount(): number {
    return this.edgeMap.size;
  }
}
