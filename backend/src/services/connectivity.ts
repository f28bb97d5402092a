/** Reachability queries over a single directed graph. */

import type { DirectedGraph } from '../utils/dag.js';

function walk(start: string, next: (node: string) => string[]): Set<string> {
  const seen = new Set<string>();
  const queue = [start];
  while (queue.length > 0) {
    const node = queue.shift();
    if (node === undefined) break;
    for (const neighbor of next(node)) {
      if (!seen.has(neighbor)) {
        seen.add(neighbor);
        queue.push(neighbor);
      }
    }
  }
  return seen;
}

/** Nodes with a directed path into `node`. Excludes `node` unless it lies on a cycle. */
export function ancestors(graph: DirectedGraph, node: string): Set<string> {
  return walk(node, (n) => graph.predecessors(n));
}

/** Nodes reachable from `node` along directed edges. Excludes `node` unless it lies on a cycle. */
export function descendants(graph: DirectedGraph, node: string): Set<string> {
  return walk(node, (n) => graph.successors(n));
}

function neighbors(graph: DirectedGraph, node: string): string[] {
  return [...graph.successors(node), ...graph.predecessors(node)];
}

/** True if `a` and `b` are joined by a path that ignores edge direction. */
export function nodesConnected(graph: DirectedGraph, a: string, b: string): boolean {
  if (!graph.hasNode(a) || !graph.hasNode(b)) return false;
  if (a === b) return true;
  return walk(a, (n) => neighbors(graph, n)).has(b);
}

/**
 * Weakly connected components, each as a node list in the graph's node order.
 * Components are ordered by their first node.
 */
export function weaklyConnectedComponents(graph: DirectedGraph): string[][] {
  const assigned = new Set<string>();
  const components: string[][] = [];
  for (const node of graph.nodes()) {
    if (assigned.has(node)) continue;
    const members = walk(node, (n) => neighbors(graph, n));
    members.add(node);
    for (const member of members) assigned.add(member);
    components.push(graph.nodes().filter((n) => members.has(n)));
  }
  return components;
}
