export { RepoGraph, Subgraph, GraphScope } from './graph.js';
export type { RepoGraphOptions } from './graph.js';
export { GraphFormatter } from './formatter.js';
export type { SerializedGraph } from './formatter.js';
export { subgraphName, CLUSTER_PREFIX } from './naming.js';
export type { SubgraphName } from './naming.js';
export type {
  GraphNode,
  GraphEdge,
  EdgeKind,
  NodeStyle,
  SubgraphStyle,
  NodeInit,
  EdgeInit,
  GraphDirection,
  GraphFormat,
} from './types.js';
