/** Execution state machine values and the engine event stream. */

import type { Edge } from './graph.js';

export type ExecutionState = 'not_started' | 'running' | 'completed' | 'failed' | 'user_stopped';

export const ItemFinishState = {
  CONTINUE: 0,
  FAILED: -1,
  STOPPED: -2,
} as const;

export type ItemFinishState = (typeof ItemFinishState)[keyof typeof ItemFinishState];

/** Per-run map of node name -> whether the node really executes. */
export type ExecutionPermits = Record<string, boolean>;

/** Terminal state of one graph in a scheduler run. */
export type DagOutcome = ExecutionState | 'not_a_dag';

export type MessageLevel = 'info' | 'warn' | 'error';

export type EngineEvent =
  | { type: 'dag_execution_started'; dagIndex: number; order: string[] }
  | { type: 'dag_execution_finished'; dagIndex: number; state: ExecutionState }
  | { type: 'dag_invalid'; dagIndex: number; nodes: string[]; cycleEdges: Edge[] }
  | { type: 'item_started'; name: string }
  | { type: 'item_finished'; name: string; finishState: ItemFinishState }
  | { type: 'item_skipped'; name: string }
  | { type: 'project_execution_finished'; outcomes: DagOutcome[] }
  | { type: 'message'; level: MessageLevel; text: string };

export type SendEvent = (event: EngineEvent) => Promise<void>;

export const noopSend: SendEvent = async () => {};
