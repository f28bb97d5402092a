/** GraphStore -- keeps project nodes partitioned into disjoint weakly connected graphs. */

import type { Edge, SerializedGraphs } from '../models/graph.js';
import { DirectedGraph } from '../utils/dag.js';
import { IntegrityError } from '../utils/errors.js';
import type { Logger } from '../utils/projectLogger.js';
import { weaklyConnectedComponents } from './connectivity.js';

/** Called after every structural change with the graphs that were created or modified. */
export type GraphChangeListener = (affected: DirectedGraph[]) => void;

export class GraphStore {
  private graphs: DirectedGraph[] = [];
  private listeners = new Set<GraphChangeListener>();

  constructor(private logger: Logger) {}

  /** Graphs in store order. The array is a copy; the graphs are live. */
  dags(): DirectedGraph[] {
    return [...this.graphs];
  }

  get size(): number {
    return this.graphs.length;
  }

  /** Every node across all graphs, graph by graph. */
  nodes(): string[] {
    return this.graphs.flatMap((g) => g.nodes());
  }

  edges(): Edge[] {
    return this.graphs.flatMap((g) => g.edges());
  }

  hasNode(name: string): boolean {
    return this.graphs.some((g) => g.hasNode(name));
  }

  hasEdge(src: string, dst: string): boolean {
    return this.graphs.some((g) => g.hasEdge(src, dst));
  }

  /** Register a change listener. Returns an unsubscribe function. */
  onChange(listener: GraphChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Add `name` as a new singleton graph. A duplicate name is logged and ignored. */
  addNode(name: string): boolean {
    if (this.hasNode(name)) {
      this.logger.error('Node already exists in a graph', { node: name });
      return false;
    }
    const graph = new DirectedGraph();
    graph.addNode(name);
    this.graphs.push(graph);
    this.notify([graph]);
    return true;
  }

  /**
   * Add a directed edge. Endpoints in different graphs merge those graphs into one.
   * Returns false if the edge already exists.
   */
  addEdge(src: string, dst: string): boolean {
    const srcGraph = this.require(src);
    const dstGraph = this.require(dst);
    if (srcGraph.hasEdge(src, dst)) {
      this.logger.warn('Edge already exists', { src, dst });
      return false;
    }
    if (srcGraph === dstGraph) {
      srcGraph.addEdge(src, dst);
      this.notify([srcGraph]);
      return true;
    }
    const merged = DirectedGraph.union(srcGraph, dstGraph);
    merged.addEdge(src, dst);
    this.replace([srcGraph, dstGraph], [merged]);
    this.logger.debug('Graphs merged', { src, dst, nodes: merged.nodeCount });
    return true;
  }

  /** Remove a directed edge, splitting its graph if that disconnects it. */
  removeEdge(src: string, dst: string): void {
    const graph = this.graphContainingEdge(src, dst);
    if (!graph) {
      throw new IntegrityError(`Edge ${src} -> ${dst} is not in any graph`);
    }
    graph.removeEdge(src, dst);
    if (src === dst) {
      this.notify([graph]);
      return;
    }
    this.split(graph);
  }

  /** Remove a node and every edge touching it. Leftover pieces become separate graphs. */
  removeNode(name: string): void {
    const graph = this.require(name);
    graph.removeNode(name);
    if (graph.nodeCount === 0) {
      this.replace([graph], []);
      return;
    }
    this.split(graph);
  }

  /** Relabel a node in place. Fails if `oldName` is missing or `newName` is taken. */
  renameNode(oldName: string, newName: string): boolean {
    const graph = this.graphContaining(oldName);
    if (!graph) return false;
    if (this.hasNode(newName)) {
      this.logger.error('Cannot rename node: name already in use', { oldName, newName });
      return false;
    }
    graph.renameNode(oldName, newName);
    this.notify([graph]);
    return true;
  }

  /** The graph holding `node`. Absence is an integrity problem: logged, returns null. */
  graphContaining(node: string): DirectedGraph | null {
    const graph = this.graphs.find((g) => g.hasNode(node));
    if (!graph) {
      this.logger.error('Graph containing node not found', { node });
      return null;
    }
    return graph;
  }

  /** The graph holding edge `src -> dst`. Absence is logged, returns null. */
  graphContainingEdge(src: string, dst: string): DirectedGraph | null {
    const graph = this.graphs.find((g) => g.hasEdge(src, dst));
    if (!graph) {
      this.logger.error('Graph containing edge not found', { src, dst });
      return null;
    }
    return graph;
  }

  /**
   * True if `node` has no edges. With `allowSelfLoop`, a node whose only edge
   * is its own self-loop also counts as isolated.
   */
  isIsolated(node: string, allowSelfLoop = false): boolean {
    const graph = this.graphs.find((g) => g.hasNode(node));
    if (!graph) return false;
    const degree = graph.degree(node);
    if (degree === 0) return true;
    return allowSelfLoop && degree === 2 && graph.hasSelfLoop(node);
  }

  toJSON(): SerializedGraphs {
    return {
      nodes: this.nodes(),
      edges: this.edges().map(({ src, dst }) => [src, dst]),
    };
  }

  private require(node: string): DirectedGraph {
    const graph = this.graphContaining(node);
    if (!graph) {
      throw new IntegrityError(`Node ${node} is not in any graph`);
    }
    return graph;
  }

  /** Replace `graph` with its weakly connected components. */
  private split(graph: DirectedGraph): void {
    const components = weaklyConnectedComponents(graph);
    if (components.length === 1) {
      this.notify([graph]);
      return;
    }
    const pieces = components.map((nodes) => graph.subgraph(nodes));
    this.logger.debug('Graph split', { pieces: pieces.map((p) => p.nodes()) });
    this.replace([graph], pieces);
  }

  /** Swap `removed` for `added` in one array update; `added` takes the first removed slot. */
  private replace(removed: DirectedGraph[], added: DirectedGraph[]): void {
    const drop = new Set(removed);
    const at = this.graphs.findIndex((g) => drop.has(g));
    const kept = this.graphs.filter((g) => !drop.has(g));
    const insertAt = at < 0 ? kept.length : Math.min(at, kept.length);
    this.graphs = [...kept.slice(0, insertAt), ...added, ...kept.slice(insertAt)];
    if (added.length > 0) this.notify(added);
  }

  private notify(affected: DirectedGraph[]): void {
    for (const listener of this.listeners) listener(affected);
  }
}
