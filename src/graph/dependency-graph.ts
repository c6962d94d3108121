import Graph from 'graphology';
import { z } from 'zod';

import type { FileRecord } from '../analysis/types.js';
import { GraphOptions } from '../config/schema.js';
import { extractImports } from './imports.js';

export interface GraphTransfer {
  nodes: string[];
  /** Importing file → files it imports; only files with outgoing edges appear. */
  edges: Record<string, string[]>;
}

// Edges parse as entry pairs so an own `__proto__` key is kept.
export const GraphTransferSchema = z.object({
  nodes: z.array(z.string()),
  edges: z.preprocess(
    (value) => (typeof value === 'object' && value !== null && !Array.isArray(value) ? Object.entries(value) : value),
    z.array(z.tuple([z.string(), z.array(z.string())]))
  )
});

/**
 * File-level import graph. Edges point from the importing file to the file it imports.
 * Self-loops are never stored and adding an existing edge is a no-op.
 */
export class DependencyGraph {
  private graph: Graph;

  constructor() {
    this.graph = new Graph({ type: 'directed', multi: false, allowSelfLoops: false });
  }

  addNode(node: string): void {
    this.graph.mergeNode(node);
  }

  /** Returns false when the edge was rejected as a self-loop. */
  addEdge(from: string, to: string): boolean {
    if (from === to) return false;
    this.graph.mergeEdge(from, to);
    return true;
  }

  hasNode(node: string): boolean {
    return this.graph.hasNode(node);
  }

  hasEdge(from: string, to: string): boolean {
    return this.graph.hasNode(from) && this.graph.hasNode(to) && this.graph.hasDirectedEdge(from, to);
  }

  /** Files this node imports. */
  upstream(node: string): string[] {
    if (!this.graph.hasNode(node)) return [];
    return this.graph.outNeighbors(node).sort();
  }

  /** Files that import this node. */
  downstream(node: string): string[] {
    if (!this.graph.hasNode(node)) return [];
    return this.graph.inNeighbors(node).sort();
  }

  nodes(): string[] {
    return this.graph.nodes().sort();
  }

  get nodeCount(): number {
    return this.graph.order;
  }

  get edgeCount(): number {
    return this.graph.size;
  }

  toTransferObject(): GraphTransfer {
    const nodes = this.nodes();
    const edges = Object.fromEntries(
      nodes.filter((node) => this.graph.outDegree(node) > 0).map((node): [string, string[]] => [node, this.upstream(node)])
    );
    return { nodes, edges };
  }

  static fromTransferObject(input: unknown): DependencyGraph {
    const data = GraphTransferSchema.parse(input);
    const graph = new DependencyGraph();
    for (const node of data.nodes) graph.addNode(node);
    for (const [from, targets] of data.edges) {
      graph.addNode(from);
      for (const to of targets) graph.addEdge(from, to);
    }
    return graph;
  }
}

/** `src/app/main.py` → `src.app.main` */
export function normalizeModulePath(path: string): string {
  const dot = path.lastIndexOf('.');
  const stem = dot === -1 ? path : path.slice(0, dot);
  return stem.replaceAll('/', '.');
}

export class ModuleResolver {
  private readonly paths: Set<string>;
  private readonly normalized = new Map<string, string>();

  constructor(
    paths: readonly string[],
    private readonly options: GraphOptions
  ) {
    this.paths = new Set(paths);
    for (const p of paths) this.normalized.set(normalizeModulePath(p), p);
  }

  /**
   * Exact path, then exact normalized module name, then (when enabled) the first
   * normalized path that contains the identifier. The last step is deliberately loose
   * and can link short names such as `os` to unrelated files.
   */
  resolve(identifier: string): string | null {
    if (this.paths.has(identifier)) return identifier;
    const exact = this.normalized.get(identifier);
    if (exact !== undefined) return exact;
    if (!this.options.partialMatch) return null;
    for (const [norm, original] of this.normalized) {
      if (norm.includes(identifier) || norm.endsWith(identifier)) return original;
    }
    return null;
  }
}

export function buildDependencyGraph(
  files: readonly FileRecord[],
  options: Partial<GraphOptions> = {}
): DependencyGraph {
  const opts = GraphOptions.parse(options);
  const graph = new DependencyGraph();
  const resolver = new ModuleResolver(
    files.map((f) => f.path),
    opts
  );

  for (const file of files) {
    if (!file.path || !file.content) continue;
    graph.addNode(file.path);

    for (const identifier of extractImports(file.path, file.content)) {
      const target = resolver.resolve(identifier);
      if (target !== null) graph.addEdge(file.path, target);
    }
  }

  return graph;
}
