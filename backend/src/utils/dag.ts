/** Directed graph container -- insertion-ordered nodes, adjacency sets, self-loops allowed. */

import type { Edge, EdgeTuple } from '../models/graph.js';

export class DirectedGraph {
  private succ: Map<string, Set<string>> = new Map();
  private pred: Map<string, Set<string>> = new Map();

  static fromEdges(edges: Iterable<EdgeTuple>, nodes: Iterable<string> = []): DirectedGraph {
    const graph = new DirectedGraph();
    for (const node of nodes) graph.addNode(node);
    for (const [src, dst] of edges) graph.addEdge(src, dst);
    return graph;
  }

  /** Node-and-edge union of two graphs; nodes of `a` come first. */
  static union(a: DirectedGraph, b: DirectedGraph): DirectedGraph {
    const merged = a.clone();
    for (const node of b.nodes()) merged.addNode(node);
    for (const { src, dst } of b.edges()) merged.addEdge(src, dst);
    return merged;
  }

  addNode(node: string): void {
    if (this.succ.has(node)) return;
    this.succ.set(node, new Set());
    this.pred.set(node, new Set());
  }

  hasNode(node: string): boolean {
    return this.succ.has(node);
  }

  /** Remove a node and every edge touching it. */
  removeNode(node: string): boolean {
    const out = this.succ.get(node);
    const inc = this.pred.get(node);
    if (!out || !inc) return false;
    for (const dst of out) this.pred.get(dst)?.delete(node);
    for (const src of inc) this.succ.get(src)?.delete(node);
    this.succ.delete(node);
    this.pred.delete(node);
    return true;
  }

  /** Relabel a node in place, keeping its position in the node order. */
  renameNode(oldName: string, newName: string): boolean {
    if (!this.succ.has(oldName) || this.succ.has(newName)) return false;
    const relabel = (name: string) => (name === oldName ? newName : name);
    const rebuild = (adjacency: Map<string, Set<string>>) => {
      const next = new Map<string, Set<string>>();
      for (const [node, neighbors] of adjacency) {
        next.set(relabel(node), new Set([...neighbors].map(relabel)));
      }
      return next;
    };
    this.succ = rebuild(this.succ);
    this.pred = rebuild(this.pred);
    return true;
  }

  /** Add an edge, creating missing endpoints. */
  addEdge(src: string, dst: string): void {
    this.addNode(src);
    this.addNode(dst);
    this.succ.get(src)?.add(dst);
    this.pred.get(dst)?.add(src);
  }

  hasEdge(src: string, dst: string): boolean {
    return this.succ.get(src)?.has(dst) ?? false;
  }

  removeEdge(src: string, dst: string): boolean {
    const out = this.succ.get(src);
    if (!out || !out.has(dst)) return false;
    out.delete(dst);
    this.pred.get(dst)?.delete(src);
    return true;
  }

  nodes(): string[] {
    return [...this.succ.keys()];
  }

  /** Edges grouped by source, sources in node order. */
  edges(): Edge[] {
    const result: Edge[] = [];
    for (const [src, out] of this.succ) {
      for (const dst of out) result.push({ src, dst });
    }
    return result;
  }

  successors(node: string): string[] {
    return [...(this.succ.get(node) ?? [])];
  }

  predecessors(node: string): string[] {
    return [...(this.pred.get(node) ?? [])];
  }

  inDegree(node: string): number {
    return this.pred.get(node)?.size ?? 0;
  }

  outDegree(node: string): number {
    return this.succ.get(node)?.size ?? 0;
  }

  /** In-degree plus out-degree; a self-loop counts twice. */
  degree(node: string): number {
    return this.inDegree(node) + this.outDegree(node);
  }

  hasSelfLoop(node: string): boolean {
    return this.hasEdge(node, node);
  }

  get nodeCount(): number {
    return this.succ.size;
  }

  get edgeCount(): number {
    let count = 0;
    for (const out of this.succ.values()) count += out.size;
    return count;
  }

  clone(): DirectedGraph {
    return this.subgraph(this.nodes());
  }

  /** Induced subgraph on `nodes`, keeping this graph's node order. */
  subgraph(nodes: Iterable<string>): DirectedGraph {
    const keep = new Set(nodes);
    const sub = new DirectedGraph();
    for (const node of this.succ.keys()) {
      if (keep.has(node)) sub.addNode(node);
    }
    for (const { src, dst } of this.edges()) {
      if (keep.has(src) && keep.has(dst)) sub.addEdge(src, dst);
    }
    return sub;
  }
}
