/** Test helpers: scripted items, event capture and fixture loading. */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { BaseProjectItem, type ItemExecutionContext } from '../items/base.js';
import { ItemFinishState, type EngineEvent } from '../models/execution.js';
import type { Edge } from '../models/graph.js';
import { makeResource, type Resource, type ResourceKind, type ResourceMetadata } from '../models/resource.js';
import type { ViewConfig } from '../utils/projectValidator.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// -- Fixture loading --

export function fixturePath(...parts: string[]): string {
  return path.join(__dirname, 'fixtures', ...parts);
}

export function loadFixture(name: string): unknown {
  return JSON.parse(fs.readFileSync(fixturePath('projects', `${name}.json`), 'utf-8'));
}

// -- Event capture --

export interface EventCapture {
  events: EngineEvent[];
  send: (event: EngineEvent) => Promise<void>;
  types: () => string[];
}

export function createEventCapture(): EventCapture {
  const events: EngineEvent[] = [];
  return {
    events,
    send: async (event) => {
      events.push(event);
    },
    types: () => events.map((e) => e.type),
  };
}

// -- Scripted item --

export interface FakeOutput {
  kind: ResourceKind;
  locator: string;
  metadata?: ResourceMetadata;
}

export interface FakeItemOptions {
  outputs?: FakeOutput[];
  result?: ItemFinishState;
  throws?: Error;
  /** Stay running until stopExecution() or the abort signal, then report STOPPED. */
  blockUntilStopped?: boolean;
}

/** Item whose behavior is scripted per test. Records every call it receives. */
export class FakeItem extends BaseProjectItem {
  readonly kind = 'view';
  readonly executions: Resource[][] = [];
  readonly dagChanges: { rank: number; inputs: Resource[] }[] = [];
  readonly invalidations: Edge[][] = [];
  stopCalls = 0;
  private release: (() => void) | null = null;
  private markStarted: () => void = () => {};
  /** Resolves when execute() is first entered. */
  readonly started = new Promise<void>((resolve) => {
    this.markStarted = resolve;
  });

  constructor(name: string, private options: FakeItemOptions = {}) {
    super(name);
  }

  async execute(context: ItemExecutionContext): Promise<ItemFinishState> {
    this.executions.push(context.inputs);
    this.markStarted();
    if (this.options.throws) throw this.options.throws;
    if (this.options.blockUntilStopped) {
      await new Promise<void>((resolve) => {
        this.release = resolve;
        context.abortSignal.addEventListener('abort', () => resolve(), { once: true });
      });
      return ItemFinishState.STOPPED;
    }
    for (const resource of this.outputResourcesForward()) context.publish(resource);
    return this.options.result ?? ItemFinishState.CONTINUE;
  }

  stopExecution(): void {
    this.stopCalls++;
    this.release?.();
  }

  outputResourcesForward(): Resource[] {
    return (this.options.outputs ?? []).map((o) => makeResource(this.name, o.kind, o.locator, o.metadata));
  }

  handleDagChanged(rank: number, inputs: Resource[]): void {
    this.dagChanges.push({ rank, inputs });
    super.handleDagChanged(rank, inputs);
  }

  invalidateWorkflow(edges: Edge[]): void {
    this.invalidations.push(edges);
    super.invalidateWorkflow(edges);
  }

  get executed(): boolean {
    return this.executions.length > 0;
  }

  toJSON(): ViewConfig {
    return { kind: 'view', name: this.name };
  }
}

export function itemMap(...items: FakeItem[]): Map<string, FakeItem> {
  return new Map(items.map((item) => [item.name, item]));
}

export function locators(resources: Resource[]): string[] {
  return resources.map((r) => r.locator);
}
