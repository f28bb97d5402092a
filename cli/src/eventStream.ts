import type { DagOutcome, EngineEvent } from '../../backend/src/models/execution.js';
import { ItemFinishState } from '../../backend/src/models/execution.js';

export function formatNdjsonLine(event: EngineEvent): string {
  return JSON.stringify(event) + '\n';
}

function finishLabel(state: ItemFinishState): string {
  switch (state) {
    case ItemFinishState.CONTINUE:
      return 'done';
    case ItemFinishState.FAILED:
      return 'failed';
    case ItemFinishState.STOPPED:
      return 'stopped';
  }
}

export function formatHumanReadable(event: EngineEvent): string {
  switch (event.type) {
    case 'dag_execution_started':
      return `Graph ${event.dagIndex}: ${event.order.join(' -> ')}`;
    case 'dag_execution_finished':
      return `Graph ${event.dagIndex} ${event.state}`;
    case 'dag_invalid':
      return `Graph ${event.dagIndex} skipped: cycle through ${event.cycleEdges.map((e) => `${e.src} -> ${e.dst}`).join(', ')}`;
    case 'item_started':
      return `Starting: ${event.name}`;
    case 'item_finished':
      return `Finished: ${event.name} (${finishLabel(event.finishState)})`;
    case 'item_skipped':
      return `Skipped: ${event.name}`;
    case 'project_execution_finished':
      return `Complete: ${event.outcomes.join(', ') || 'nothing ran'}`;
    case 'message':
      return event.level === 'info' ? event.text : `${event.level.toUpperCase()}: ${event.text}`;
  }
}

export interface RunSummary {
  itemsExecuted: number;
  itemsFailed: number;
  itemsSkipped: number;
  outcomes: DagOutcome[];
  events: EngineEvent[];
}

export function collectSummary() {
  const events: EngineEvent[] = [];
  let itemsExecuted = 0;
  let itemsFailed = 0;
  let itemsSkipped = 0;
  let outcomes: DagOutcome[] = [];

  return {
    push(event: EngineEvent) {
      events.push(event);
      if (event.type === 'item_finished') {
        itemsExecuted++;
        if (event.finishState === ItemFinishState.FAILED) itemsFailed++;
      }
      if (event.type === 'item_skipped') itemsSkipped++;
      if (event.type === 'project_execution_finished') outcomes = event.outcomes;
    },
    getSummary(): RunSummary {
      return { itemsExecuted, itemsFailed, itemsSkipped, outcomes, events };
    },
  };
}

/** True when every graph that was queued completed. */
export function isSuccessful(outcomes: DagOutcome[]): boolean {
  return outcomes.every((o) => o === 'completed');
}
