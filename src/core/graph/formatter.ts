/**
 * Text renderings of a populated RepoGraph: Graphviz DOT, Mermaid and JSON.
 */
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import type { GraphScope, RepoGraph } from './graph.js';
import type { GraphEdge, GraphFormat, GraphNode, NodeStyle, SubgraphStyle } from './types.js';

const SUBGRAPH_ATTRS: Record<SubgraphStyle, Record<string, string>> = {
  default: { fontname: 'bold', color: 'black', style: 'filled', fillcolor: 'lightgrey', labeljust: 'l' },
  entry: { fontname: 'bold', color: 'black', style: 'filled', fillcolor: 'green', labeljust: 'l' },
  unsupported: { fontname: 'bold', color: 'red', style: 'filled, dashed', fillcolor: 'lightgrey', labeljust: 'l' },
  roles: { fontname: 'bold', color: 'blue', style: 'filled', fillcolor: 'lightgrey', labeljust: 'l' },
};

const NODE_COLORS: Partial<Record<NodeStyle, string>> = {
  missing: 'red',
  play: 'green',
  include: 'orange',
  task: 'orange',
  role: 'blue',
  'role-dependency': 'red',
};

const MERMAID_CLASSES: Partial<Record<NodeStyle, string>> = {
  missing: 'fill:#ffebee,stroke:#c62828',
  play: 'fill:#e8f5e9,stroke:#2e7d32',
  include: 'fill:#fff3e0,stroke:#ef6c00',
  task: 'fill:#fff3e0,stroke:#ef6c00',
  role: 'fill:#e3f2fd,stroke:#1565c0',
  'role-dependency': 'fill:#ffebee,stroke:#c62828',
};

const MERMAID_SUBGRAPH_STYLES: Record<SubgraphStyle, string> = {
  default: 'fill:#eeeeee,stroke:#000000',
  entry: 'fill:#c8e6c9,stroke:#000000',
  unsupported: 'fill:#eeeeee,stroke:#c62828,stroke-dasharray:5 5',
  roles: 'fill:#eeeeee,stroke:#1565c0',
};

export interface SerializedGraph {
  label: string;
  direction: string;
  nodes: GraphNode[];
  edges: GraphEdge[];
  subgraphs: Array<{
    name: string;
    label: string;
    style: SubgraphStyle;
    parent: string | null;
    nodes: string[];
  }>;
}

/**
 * Formats repository graphs for the rendering tools.
 */
export class GraphFormatter {
  /**
   * Format graph as string output.
   */
  format(graph: RepoGraph, format: GraphFormat): string {
    switch (format) {
      case 'dot':
        return this.formatDot(graph);
      case 'mermaid':
        return this.formatMermaid(graph);
      case 'json':
        return JSON.stringify(this.serialize(graph), null, 2);
      default:
        throw new ConfigError(ErrorCodes.INVALID_FORMAT, `Unknown format: ${String(format)}`);
    }
  }

  /**
   * Plain-object view of the graph, subgraphs flattened with parent references.
   */
  serialize(graph: RepoGraph): SerializedGraph {
    return {
      label: graph.label,
      direction: graph.direction,
      nodes: graph.allNodes(),
      edges: graph.allEdges(),
      subgraphs: graph.allSubgraphs().map((subgraph) => ({
        name: subgraph.name,
        label: subgraph.label,
        style: subgraph.style,
        parent: subgraph.parent.scopeName,
        nodes: subgraph.nodes().map((node) => node.id),
      })),
    };
  }

  /**
   * Format graph as strict Graphviz DOT.
   */
  private formatDot(graph: RepoGraph): string {
    const lines: string[] = [
      `strict digraph ${quote(graph.label || 'playbooks')} {`,
      `    rankdir=${graph.direction};`,
      `    label=${quote(graph.label)};`,
      '    labelloc=t;',
      '    fontname=bold;',
      '    node [shape=box, style="rounded, filled", color=black, fillcolor=white];',
      '',
    ];

    this.writeDotScope(graph, lines, '    ');

    lines.push('');
    for (const edge of graph.allEdges()) {
      const color = this.edgeColor(edge, graph.getNode(edge.to));
      const attrs = color ? ` [color=${color}]` : '';
      lines.push(`    ${quote(edge.from)} -> ${quote(edge.to)}${attrs};`);
    }

    lines.push('}');
    return lines.join('\n');
  }

  private writeDotScope(scope: GraphScope, lines: string[], indent: string): void {
    for (const node of scope.nodes()) {
      const color = NODE_COLORS[node.style];
      const colorAttr = color ? `, color=${color}` : '';
      lines.push(`${indent}${quote(node.id)} [label=${quote(node.label)}${colorAttr}];`);
    }

    for (const subgraph of scope.subgraphs()) {
      lines.push(`${indent}subgraph ${quote(subgraph.name)} {`);
      lines.push(`${indent}    label=${quote(subgraph.label)};`);
      for (const [key, value] of Object.entries(SUBGRAPH_ATTRS[subgraph.style])) {
        lines.push(`${indent}    ${key}=${quote(value)};`);
      }
      this.writeDotScope(subgraph, lines, `${indent}    `);
      lines.push(`${indent}}`);
    }
  }

  /**
   * Format graph as a Mermaid flowchart. Node keys are replaced by n0, n1, ...
   * since paths and UUIDs are not valid Mermaid identifiers.
   */
  private formatMermaid(graph: RepoGraph): string {
    const ids = new Map<string, string>();
    graph.allNodes().forEach((node, index) => ids.set(node.id, `n${index}`));
    const subgraphIds = new Map<string, string>();
    graph.allSubgraphs().forEach((subgraph, index) => subgraphIds.set(subgraph.name, `s${index}`));

    const lines: string[] = [`flowchart ${graph.direction}`];
    if (graph.label) {
      lines.push(`    %% ${graph.label}`);
    }

    this.writeMermaidScope(graph, lines, '    ', ids, subgraphIds);

    for (const edge of graph.allEdges()) {
      const arrow = edge.kind === 'role-dependency' ? '-.->' : '-->';
      lines.push(`    ${ids.get(edge.from)} ${arrow} ${ids.get(edge.to)}`);
    }

    lines.push('');
    const byStyle = new Map<NodeStyle, string[]>();
    for (const node of graph.allNodes()) {
      if (!MERMAID_CLASSES[node.style]) continue;
      const list = byStyle.get(node.style) ?? [];
      list.push(ids.get(node.id) ?? node.id);
      byStyle.set(node.style, list);
    }
    for (const [style, nodeIds] of byStyle) {
      const className = style.replace(/-/g, '_');
      lines.push(`    classDef ${className} ${MERMAID_CLASSES[style]}`);
      lines.push(`    class ${nodeIds.join(',')} ${className}`);
    }
    for (const subgraph of graph.allSubgraphs()) {
      lines.push(`    style ${subgraphIds.get(subgraph.name)} ${MERMAID_SUBGRAPH_STYLES[subgraph.style]}`);
    }

    return lines.join('\n');
  }

  private writeMermaidScope(
    scope: GraphScope,
    lines: string[],
    indent: string,
    ids: Map<string, string>,
    subgraphIds: Map<string, string>
  ): void {
    for (const node of scope.nodes()) {
      lines.push(`${indent}${ids.get(node.id)}["${mermaidText(node.label)}"]`);
    }
    for (const subgraph of scope.subgraphs()) {
      lines.push(`${indent}subgraph ${subgraphIds.get(subgraph.name)} ["${mermaidText(subgraph.label)}"]`);
      this.writeMermaidScope(subgraph, lines, `${indent}    `, ids, subgraphIds);
      lines.push(`${indent}end`);
    }
  }

  private edgeColor(edge: GraphEdge, target: GraphNode | undefined): string | undefined {
    switch (edge.kind) {
      case 'role':
        return 'blue';
      case 'role-dependency':
        return edge.emphasis === 'primary' ? 'blue' : 'red';
      case 'include':
        return undefined;
      case 'sequential':
        return target && (target.style === 'task' || target.style === 'include') ? 'orange' : undefined;
    }
  }
}

/**
 * Quote a DOT identifier or attribute value.
 */
function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n')}"`;
}

function mermaidText(value: string): string {
  return value.replace(/"/g, '#quot;').replace(/\n/g, '<br/>');
}
