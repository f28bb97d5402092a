/** Execution ordering: acyclicity test, topological order and cycle-edge detection. */

import type { Edge } from '../models/graph.js';
import type { DirectedGraph } from '../utils/dag.js';

export type OrderResult =
  | { ok: true; order: string[]; successors: Map<string, string[]> }
  | { ok: false; cycleEdges: Edge[] };

/** Nodes with in-degree 0, in node order. */
export function sourceNodes(graph: DirectedGraph): string[] {
  return graph.nodes().filter((node) => graph.inDegree(node) === 0);
}

/**
 * Kahn's algorithm with a FIFO queue seeded by the sources in node order.
 * Returns null when some node never reaches in-degree 0.
 */
function kahnOrder(graph: DirectedGraph): string[] | null {
  const remaining = new Map<string, number>();
  for (const node of graph.nodes()) remaining.set(node, graph.inDegree(node));

  const queue = sourceNodes(graph);
  const order: string[] = [];
  while (queue.length > 0) {
    const node = queue.shift();
    if (node === undefined) break;
    order.push(node);
    for (const next of graph.successors(node)) {
      const left = (remaining.get(next) ?? 1) - 1;
      remaining.set(next, left);
      if (left === 0) queue.push(next);
    }
  }
  return order.length === graph.nodeCount ? order : null;
}

/** A self-loop or any longer cycle makes the graph cyclic. The empty graph is acyclic. */
export function isDirectedAcyclic(graph: DirectedGraph): boolean {
  return kahnOrder(graph) !== null;
}

/**
 * Compute the order in which the graph's nodes must run. Every node appears
 * after all its predecessors; ties are broken breadth-first from the sources.
 * Never throws: a cyclic graph yields the edges that close its cycles.
 */
export function computeExecutionOrder(graph: DirectedGraph): OrderResult {
  const order = kahnOrder(graph);
  if (!order) {
    return { ok: false, cycleEdges: edgesCausingLoops(graph) };
  }
  const successors = new Map<string, string[]>();
  for (const node of order) successors.set(node, graph.successors(node));
  return { ok: true, order, successors };
}

/** Invert a successor map: node -> direct predecessors. Every key of `successors` gets an entry. */
export function invertSuccessors(successors: Map<string, string[]>): Map<string, string[]> {
  const predecessors = new Map<string, string[]>();
  for (const node of successors.keys()) predecessors.set(node, []);
  for (const [node, nexts] of successors) {
    for (const next of nexts) {
      const list = predecessors.get(next);
      if (list) {
        list.push(node);
      } else {
        predecessors.set(next, [node]);
      }
    }
  }
  return predecessors;
}

/** Strongly connected components (Tarjan), as node sets. */
function stronglyConnectedComponents(graph: DirectedGraph): Set<string>[] {
  const index = new Map<string, number>();
  const low = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const components: Set<string>[] = [];
  let counter = 0;

  // Iterative to stay clear of the call-stack limit on long chains.
  for (const root of graph.nodes()) {
    if (index.has(root)) continue;
    const frames: { node: string; next: string[]; i: number }[] = [];
    const enter = (node: string) => {
      index.set(node, counter);
      low.set(node, counter);
      counter += 1;
      stack.push(node);
      onStack.add(node);
      frames.push({ node, next: graph.successors(node), i: 0 });
    };
    enter(root);

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      if (frame.i < frame.next.length) {
        const w = frame.next[frame.i];
        frame.i += 1;
        if (!index.has(w)) {
          enter(w);
        } else if (onStack.has(w)) {
          low.set(frame.node, Math.min(low.get(frame.node) ?? 0, index.get(w) ?? 0));
        }
        continue;
      }

      frames.pop();
      const v = frame.node;
      const parent = frames[frames.length - 1];
      if (parent) {
        low.set(parent.node, Math.min(low.get(parent.node) ?? 0, low.get(v) ?? 0));
      }
      if (low.get(v) === index.get(v)) {
        const component = new Set<string>();
        let w: string | undefined;
        do {
          w = stack.pop();
          if (w === undefined) break;
          onStack.delete(w);
          component.add(w);
        } while (w !== v);
        components.push(component);
      }
    }
  }
  return components;
}

/**
 * Edges that take part in a cycle: every edge whose endpoints share a strongly
 * connected component of more than one node, plus every self-loop. Edge order
 * follows the graph's edge order. Empty for a DAG.
 */
export function edgesCausingLoops(graph: DirectedGraph): Edge[] {
  const componentOf = new Map<string, number>();
  stronglyConnectedComponents(graph).forEach((component, i) => {
    if (component.size > 1) {
      for (const node of component) componentOf.set(node, i);
    }
  });
  return graph.edges().filter(({ src, dst }) => {
    if (src === dst) return true;
    const c = componentOf.get(src);
    return c !== undefined && c === componentOf.get(dst);
  });
}
