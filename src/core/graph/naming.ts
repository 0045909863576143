/**
 * Stable identifier/label pairs for subgraphs.
 */

/** Prefix that makes Graphviz draw a subgraph as a boxed cluster. */
export const CLUSTER_PREFIX = 'cluster_';

export interface SubgraphName {
  /** Identity used for lookups, unique across the whole graph */
  name: string;
  /** Display label */
  label: string;
}

/**
 * Name a subgraph after a repo-relative path or logical name.
 * The label defaults to the key itself; directory clusters pass their base name.
 */
export function subgraphName(key: string, label?: string): SubgraphName {
  const normalized = normalizeKey(key);
  return {
    name: `${CLUSTER_PREFIX}${normalized}`,
    label: label ?? normalized,
  };
}

/**
 * Collapse separators so `./playbooks//common/` and `playbooks/common` name the same subgraph.
 */
function normalizeKey(key: string): string {
  return key
    .replace(/\\/g, '/')
    .split('/')
    .filter((segment) => segment !== '' && segment !== '.')
    .join('/');
}
