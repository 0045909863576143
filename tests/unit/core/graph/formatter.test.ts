import { describe, it, expect, beforeEach } from 'vitest';
import { RepoGraph } from '../../../../src/core/graph/graph.js';
import { GraphFormatter } from '../../../../src/core/graph/formatter.js';

describe('GraphFormatter', () => {
  let graph: RepoGraph;
  let formatter: GraphFormatter;

  beforeEach(() => {
    graph = new RepoGraph({ label: 'demo', direction: 'LR' });
    const aws = graph.addSubgraph('cluster_playbooks/aws', 'aws (unsupported)', 'unsupported');
    aws.addNode('playbooks/aws/site.yml', { label: 'site.yml' });
    graph.addNode('missing.yml', { label: 'Non-existent: missing.yml', style: 'missing' });
    graph.addEdge('playbooks/aws/site.yml', 'missing.yml', { kind: 'include' });
    graph.addEdge('playbooks/aws/site.yml', 'roles/common', { kind: 'role' });
    formatter = new GraphFormatter();
  });

  describe('dot', () => {
    it('writes a strict digraph with title and direction', () => {
      const lines = formatter.format(graph, 'dot').split('\n');

      expect(lines[0]).toBe('strict digraph "demo" {');
      expect(lines).toContain('    rankdir=LR;');
      expect(lines).toContain('    label="demo";');
      expect(lines[lines.length - 1]).toBe('}');
    });

    it('writes nodes with their labels and style colours', () => {
      const lines = formatter.format(graph, 'dot').split('\n');

      expect(lines).toContain('    "missing.yml" [label="Non-existent: missing.yml", color=red];');
      expect(lines).toContain('    "roles/common" [label="roles/common"];');
    });

    it('nests subgraph nodes inside the cluster block', () => {
      const lines = formatter.format(graph, 'dot').split('\n');
      const start = lines.indexOf('    subgraph "cluster_playbooks/aws" {');

      expect(start).toBeGreaterThan(0);
      expect(lines[start + 1]).toBe('        label="aws (unsupported)";');
      expect(lines).toContain('        color="red";');
      expect(lines).toContain('        style="filled, dashed";');
      expect(lines).toContain('        "playbooks/aws/site.yml" [label="site.yml"];');
    });

    it('colours edges by kind', () => {
      const lines = formatter.format(graph, 'dot').split('\n');

      expect(lines).toContain('    "playbooks/aws/site.yml" -> "missing.yml";');
      expect(lines).toContain('    "playbooks/aws/site.yml" -> "roles/common" [color=blue];');
    });

    it('colours secondary role dependencies red and primary ones blue', () => {
      graph.addEdge('r1', 'r2', { kind: 'role-dependency', emphasis: 'primary' });
      graph.addEdge('r2', 'r3', { kind: 'role-dependency', emphasis: 'secondary' });
      const lines = formatter.format(graph, 'dot').split('\n');

      expect(lines).toContain('    "r1" -> "r2" [color=blue];');
      expect(lines).toContain('    "r2" -> "r3" [color=red];');
    });

    it('escapes quotes and newlines in labels', () => {
      graph.addNode('play', { label: 'Play: "x"\n(all)', style: 'play' });
      const lines = formatter.format(graph, 'dot').split('\n');

      expect(lines).toContain('    "play" [label="Play: \\"x\\"\\n(all)", color=green];');
    });
  });

  describe('mermaid', () => {
    it('numbers nodes and subgraphs in creation order', () => {
      const lines = formatter.format(graph, 'mermaid').split('\n');

      expect(lines[0]).toBe('flowchart LR');
      expect(lines[1]).toBe('    %% demo');
      expect(lines).toContain('    subgraph s0 ["aws (unsupported)"]');
      expect(lines).toContain('        n0["site.yml"]');
      expect(lines).toContain('    n1["Non-existent: missing.yml"]');
      expect(lines).toContain('    n0 --> n1');
      expect(lines).toContain('    n0 --> n2');
    });

    it('applies style classes and subgraph styles', () => {
      const lines = formatter.format(graph, 'mermaid').split('\n');

      expect(lines).toContain('    classDef missing fill:#ffebee,stroke:#c62828');
      expect(lines).toContain('    class n1 missing');
      expect(lines).toContain('    style s0 fill:#eeeeee,stroke:#c62828,stroke-dasharray:5 5');
    });

    it('draws role dependencies dotted', () => {
      graph.addEdge('roles/common', 'roles/base', { kind: 'role-dependency' });
      const lines = formatter.format(graph, 'mermaid').split('\n');

      expect(lines).toContain('    n2 -.-> n3');
    });
  });

  describe('json', () => {
    it('serializes nodes, edges and flattened subgraphs', () => {
      const parsed = JSON.parse(formatter.format(graph, 'json'));

      expect(parsed.label).toBe('demo');
      expect(parsed.direction).toBe('LR');
      expect(parsed.nodes).toHaveLength(3);
      expect(parsed.edges).toEqual([
        { from: 'playbooks/aws/site.yml', to: 'missing.yml', kind: 'include' },
        { from: 'playbooks/aws/site.yml', to: 'roles/common', kind: 'role' },
      ]);
      expect(parsed.subgraphs).toEqual([
        {
          name: 'cluster_playbooks/aws',
          label: 'aws (unsupported)',
          style: 'unsupported',
          parent: null,
          nodes: ['playbooks/aws/site.yml'],
        },
      ]);
    });
  });
});
