/** Runs one graph's items in order, one at a time, with cooperative cancellation. */

import type { ItemExecutionContext, ProjectItem } from '../items/base.js';
import {
  ItemFinishState,
  noopSend,
  type ExecutionPermits,
  type ExecutionState,
  type SendEvent,
} from '../models/execution.js';
import type { DirectedGraph } from '../utils/dag.js';
import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/projectLogger.js';
import { ResourceBroker } from './resourceBroker.js';

export interface ExecutionDriverOptions {
  graph: DirectedGraph;
  items: ReadonlyMap<string, ProjectItem>;
  logger: Logger;
  send?: SendEvent;
  broker?: ResourceBroker;
}

/**
 * Single-use driver for one run of one graph:
 * not_started -> running -> completed | failed | user_stopped.
 */
export class ExecutionDriver {
  readonly broker: ResourceBroker;
  private graph: DirectedGraph;
  private items: ReadonlyMap<string, ProjectItem>;
  private logger: Logger;
  private send: SendEvent;
  private _state: ExecutionState = 'not_started';
  private running: ProjectItem | null = null;
  private stopRequested = false;
  private controller = new AbortController();

  constructor(options: ExecutionDriverOptions) {
    this.graph = options.graph;
    this.items = options.items;
    this.logger = options.logger;
    this.send = options.send ?? noopSend;
    this.broker = options.broker ?? new ResourceBroker();
  }

  get state(): ExecutionState {
    return this._state;
  }

  /** Name of the item currently executing, if any. */
  get runningItem(): string | null {
    return this.running?.name ?? null;
  }

  /**
   * Visit `order` front to back. Permitted nodes execute; the others are
   * skipped but still forward resources so later nodes see a consistent view.
   * Resolves with the terminal state.
   */
  async start(order: string[], permits: ExecutionPermits): Promise<ExecutionState> {
    if (this._state !== 'not_started') {
      throw new Error(`ExecutionDriver already used (state: ${this._state})`);
    }
    this._state = 'running';

    for (const name of order) {
      if (this.stopRequested) return this.finish('user_stopped');

      const item = this.items.get(name);
      if (!item) {
        this.logger.error('No project item for graph node', { node: name });
        return this.finish('failed');
      }
      const inputs = this.broker.availableResources(this.graph.predecessors(name));

      if (permits[name] !== true) {
        this.broker.publishAll(name, item.outputResourcesForward());
        this.broker.publishAll(name, inputs);
        this.logger.debug('Item skipped', { item: name });
        await this.send({ type: 'item_skipped', name });
        continue;
      }

      const finishState = await this.runItem(item, inputs);
      if (this.stopRequested || finishState === ItemFinishState.STOPPED) {
        return this.finish('user_stopped');
      }
      if (finishState === ItemFinishState.FAILED) {
        return this.finish('failed');
      }
    }
    return this.finish('completed');
  }

  /**
   * Ask the running item to cancel. Outside a run this is a logged no-op
   * returning false. Between items, the next item never starts.
   */
  stop(): boolean {
    if (this._state !== 'running') {
      this.logger.info('No running item');
      return false;
    }
    if (this.stopRequested) return true;
    this.stopRequested = true;
    this.controller.abort();
    if (this.running) {
      this.logger.info('Stopping item', { item: this.running.name });
      this.running.stopExecution();
    }
    return true;
  }

  private async runItem(item: ProjectItem, inputs: ItemExecutionContext['inputs']): Promise<ItemFinishState> {
    const context: ItemExecutionContext = {
      inputs,
      broker: this.broker,
      publish: (resource) => this.broker.publish(item.name, resource),
      abortSignal: this.controller.signal,
      logger: this.logger,
    };

    this.running = item;
    await this.send({ type: 'item_started', name: item.name });
    if (this.stopRequested) {
      this.running = null;
      this.logger.info('Item not started: stop requested', { item: item.name });
      await this.send({ type: 'item_finished', name: item.name, finishState: ItemFinishState.STOPPED });
      return ItemFinishState.STOPPED;
    }
    const start = Date.now();
    let finishState: ItemFinishState;
    try {
      finishState = await item.execute(context);
    } catch (err: unknown) {
      this.logger.error('Item execution threw', { item: item.name, error: errorMessage(err) });
      finishState = ItemFinishState.FAILED;
    } finally {
      this.running = null;
    }
    this.logger.info('Item finished', { item: item.name, finishState, elapsedMs: Date.now() - start });
    await this.send({ type: 'item_finished', name: item.name, finishState });
    return finishState;
  }

  private finish(state: ExecutionState): ExecutionState {
    this._state = state;
    return state;
  }
}
