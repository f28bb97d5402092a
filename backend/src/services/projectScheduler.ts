/** Runs a project's graphs one after another and keeps items informed of structural changes. */

import type { ProjectItem } from '../items/base.js';
import type {
  DagOutcome,
  ExecutionPermits,
  ExecutionState,
  MessageLevel,
  SendEvent,
} from '../models/execution.js';
import { noopSend } from '../models/execution.js';
import type { Edge } from '../models/graph.js';
import type { DirectedGraph } from '../utils/dag.js';
import type { Logger } from '../utils/projectLogger.js';
import { ExecutionDriver } from './executionDriver.js';
import type { GraphStore } from './graphStore.js';
import { computeExecutionOrder, invertSuccessors } from './ordering.js';

export interface DagRunOutcome {
  dagIndex: number;
  nodes: string[];
  state: DagOutcome;
  cycleEdges?: Edge[];
}

export interface ExecutionSummary {
  /** False when nothing was queued, or another run was in progress. */
  started: boolean;
  outcomes: DagRunOutcome[];
}

export interface ProjectSchedulerOptions {
  store: GraphStore;
  items: ReadonlyMap<string, ProjectItem>;
  logger: Logger;
  send?: SendEvent;
}

const OUTCOME_TEXT: Record<Exclude<ExecutionState, 'not_started' | 'running'>, string> = {
  completed: 'completed successfully',
  failed: 'failed',
  user_stopped: 'stopped by the user',
};

export function formatEdges(edges: Edge[]): string {
  return edges.map(({ src, dst }) => `${src} -> ${dst}`).join(', ');
}

export class ProjectScheduler {
  private store: GraphStore;
  private items: ReadonlyMap<string, ProjectItem>;
  private logger: Logger;
  private send: SendEvent;
  private driver: ExecutionDriver | null = null;
  private running = false;
  private stopRequested = false;

  constructor(options: ProjectSchedulerOptions) {
    this.store = options.store;
    this.items = options.items;
    this.logger = options.logger;
    this.send = options.send ?? noopSend;
  }

  /** Replace the event callback, e.g. when a client attaches. */
  setSend(send: SendEvent): void {
    this.send = send;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Run every graph with every node permitted. */
  async executeAll(): Promise<ExecutionSummary> {
    if (this.running) return this.rejectConcurrentRun();
    const dags = this.store.dags();
    if (dags.length === 0) {
      await this.message('warn', 'Project has no items to execute');
      return { started: false, outcomes: [] };
    }
    const permits = dags.map((dag) => Object.fromEntries(dag.nodes().map((n) => [n, true])));
    await this.message('info', 'Executing All Directed Acyclic Graphs');
    return this.executeDags(dags, permits);
  }

  /**
   * Run only the graphs touched by `names`, permitting just the named nodes.
   * Unselected nodes in those graphs are visited but skipped.
   */
  async executeSelected(names: string[]): Promise<ExecutionSummary> {
    if (this.running) return this.rejectConcurrentRun();
    if (this.store.size === 0) {
      await this.message('warn', 'Project has no items to execute');
      return { started: false, outcomes: [] };
    }
    if (names.length === 0) {
      await this.message('warn', 'Please select a project item and try again.');
      return { started: false, outcomes: [] };
    }

    const selected = new Set<string>();
    const touched = new Set<DirectedGraph>();
    for (const name of names) {
      const dag = this.store.graphContaining(name);
      if (!dag) {
        await this.message('error', `[BUG] Could not find a graph containing ${name}. Please reopen the project.`);
        continue;
      }
      selected.add(name);
      touched.add(dag);
    }
    const dags = this.store.dags().filter((dag) => touched.has(dag));
    if (dags.length === 0) return { started: false, outcomes: [] };

    const permits = dags.map((dag) => Object.fromEntries(dag.nodes().map((n) => [n, selected.has(n)])));
    await this.message('info', 'Executing Selected Directed Acyclic Graphs');
    return this.executeDags(dags, permits);
  }

  /**
   * Run `dags` strictly one at a time. A graph with cycles is reported and
   * skipped; a failed or stopped graph ends the whole run.
   */
  async executeDags(dags: DirectedGraph[], permitsList: ExecutionPermits[]): Promise<ExecutionSummary> {
    if (this.running) return this.rejectConcurrentRun();
    this.running = true;
    this.stopRequested = false;
    const outcomes: DagRunOutcome[] = [];

    try {
      for (const [i, dag] of dags.entries()) {
        if (this.stopRequested) break;
        const id = `${i + 1}/${dags.length}`;
        const nodes = dag.nodes();
        const result = computeExecutionOrder(dag);

        if (!result.ok) {
          await this.message('warn', `Graph ${id} is not a Directed Acyclic Graph`);
          await this.message('info', `Items in graph: ${nodes.join(', ')}`);
          await this.message(
            'info',
            `Please edit connections to execute it. Possible fix: remove connection(s) ${formatEdges(result.cycleEdges)}.`,
          );
          await this.send({ type: 'dag_invalid', dagIndex: i, nodes, cycleEdges: result.cycleEdges });
          outcomes.push({ dagIndex: i, nodes, state: 'not_a_dag', cycleEdges: result.cycleEdges });
          continue;
        }

        const driver = new ExecutionDriver({ graph: dag, items: this.items, logger: this.logger, send: this.send });
        await this.message('info', `Starting DAG ${id}`);
        await this.message('info', `Order: ${result.order.join(' -> ')}`);
        await this.send({ type: 'dag_execution_started', dagIndex: i, order: result.order });
        this.driver = driver;
        const state: ExecutionState = this.stopRequested
          ? 'user_stopped'
          : await driver.start(result.order, permitsList[i] ?? {});
        this.driver = null;

        await this.message(state === 'completed' ? 'info' : 'warn', `DAG ${id} ${describeOutcome(state)}`);
        await this.send({ type: 'dag_execution_finished', dagIndex: i, state });
        outcomes.push({ dagIndex: i, nodes, state });
        if (state !== 'completed') break;
      }
    } finally {
      this.driver = null;
      this.running = false;
    }

    await this.send({ type: 'project_execution_finished', outcomes: outcomes.map((o) => o.state) });
    return { started: true, outcomes };
  }

  /** Request a stop. Idle schedulers log a no-op and return false. */
  stop(): boolean {
    if (!this.running || this.stopRequested) {
      this.logger.info('No execution in progress');
      return false;
    }
    this.logger.info('Stopping...');
    this.stopRequested = true;
    this.driver?.stop();
    return true;
  }

  /**
   * Dry-run notification for one graph. Items of a cyclic graph are
   * invalidated with the offending edges; otherwise each item learns its rank
   * and the resources its direct predecessors would forward.
   */
  onStructuralChange(graph: DirectedGraph): void {
    const result = computeExecutionOrder(graph);
    if (!result.ok) {
      for (const node of graph.nodes()) {
        this.items.get(node)?.invalidateWorkflow(result.cycleEdges);
      }
      return;
    }
    const predecessors = invertSuccessors(result.successors);
    result.order.forEach((name, rank) => {
      const item = this.items.get(name);
      if (!item) {
        this.logger.error('No project item for graph node', { node: name });
        return;
      }
      const inputs = (predecessors.get(name) ?? []).flatMap(
        (parent) => this.items.get(parent)?.outputResourcesForward() ?? [],
      );
      item.handleDagChanged(rank, inputs);
    });
  }

  notifyChangesInAllDags(): void {
    for (const dag of this.store.dags()) this.onStructuralChange(dag);
  }

  private async rejectConcurrentRun(): Promise<ExecutionSummary> {
    await this.message('warn', 'Execution already in progress');
    return { started: false, outcomes: [] };
  }

  private async message(level: MessageLevel, text: string): Promise<void> {
    this.logger[level](text);
    await this.send({ type: 'message', level, text });
  }
}

function describeOutcome(state: ExecutionState): string {
  if (state === 'not_started' || state === 'running') return state;
  return OUTCOME_TEXT[state];
}
