/**
 * Project item interface and base class. The engine only ever talks to items
 * through `ProjectItem`; concrete kinds live beside this file.
 */

import type { ItemFinishState } from '../models/execution.js';
import type { Edge } from '../models/graph.js';
import type { Resource } from '../models/resource.js';
import type { ResourceBroker } from '../services/resourceBroker.js';
import type { ItemConfig, ItemKind } from '../utils/projectValidator.js';
import type { Logger } from '../utils/projectLogger.js';

export interface ItemExecutionContext {
  /** Resources published by the item's direct predecessors in this run. */
  inputs: Resource[];
  /** The run's broker, for name and pattern lookups. */
  broker: ResourceBroker;
  publish: (resource: Resource) => void;
  abortSignal: AbortSignal;
  logger: Logger;
}

export interface ProjectItem {
  readonly kind: ItemKind;
  readonly name: string;
  rename(newName: string): void;
  /** Run the item. Must resolve to a finish state; internal faults become FAILED. */
  execute(context: ItemExecutionContext): Promise<ItemFinishState>;
  /** Cancel a running execution. */
  stopExecution(): void;
  /** Resources this item would publish, derived from its configuration and last known inputs. */
  outputResourcesForward(): Resource[];
  /** Dry-run notification after a structural change. */
  handleDagChanged(rank: number, inputs: Resource[]): void;
  /** The item's graph has cycles and cannot run. */
  invalidateWorkflow(edges: Edge[]): void;
  toJSON(): ItemConfig;
}

/** Last notification an item received from the scheduler. */
export type WorkflowStatus =
  | { state: 'unknown' }
  | { state: 'valid'; rank: number; inputs: Resource[] }
  | { state: 'invalid'; cycleEdges: Edge[] };

export abstract class BaseProjectItem implements ProjectItem {
  abstract readonly kind: ItemKind;
  protected status: WorkflowStatus = { state: 'unknown' };
  private _name: string;

  constructor(name: string, public description?: string) {
    this._name = name;
  }

  get name(): string {
    return this._name;
  }

  rename(newName: string): void {
    this._name = newName;
  }

  abstract execute(context: ItemExecutionContext): Promise<ItemFinishState>;
  abstract outputResourcesForward(): Resource[];
  abstract toJSON(): ItemConfig;

  /** Items cancel through the context's abort signal; override for extra cleanup. */
  stopExecution(): void {}

  handleDagChanged(rank: number, inputs: Resource[]): void {
    this.status = { state: 'valid', rank, inputs };
  }

  invalidateWorkflow(edges: Edge[]): void {
    this.status = { state: 'invalid', cycleEdges: edges };
  }

  workflowStatus(): WorkflowStatus {
    return this.status;
  }

  /** Inputs from the last dry run, or none before the first notification. */
  protected simulatedInputs(): Resource[] {
    return this.status.state === 'valid' ? this.status.inputs : [];
  }
}
