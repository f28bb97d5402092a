/** Project -- owns the items, the graph store and the scheduler for one workflow. */

import path from 'node:path';
import type { ProjectItem } from '../items/base.js';
import { createDefaultRegistry, type ItemRegistry } from '../items/registry.js';
import type { SendEvent } from '../models/execution.js';
import type { Edge, EdgeTuple } from '../models/graph.js';
import { PROJECT_FILE_VERSION } from '../utils/constants.js';
import { ProjectFileError } from '../utils/errors.js';
import { ProjectLogger, type Logger } from '../utils/projectLogger.js';
import { readProjectFile, writeProjectFile } from '../utils/projectPersistence.js';
import type { Connection, ItemConfig, ProjectFile } from '../utils/projectValidator.js';
import { exportToGraphML } from './graphml.js';
import { GraphStore } from './graphStore.js';
import { computeExecutionOrder } from './ordering.js';
import { ProjectScheduler, type ExecutionSummary } from './projectScheduler.js';

export interface ProjectOptions {
  name: string;
  description?: string;
  /** Directory holding project.json; also the default export target. */
  projectDir?: string;
  logger?: Logger;
  registry?: ItemRegistry;
  send?: SendEvent;
}

export interface GraphSnapshot {
  nodes: string[];
  edges: EdgeTuple[];
  /** Execution order, or null when the graph has cycles. */
  order: string[] | null;
  cycleEdges: Edge[];
}

export interface ProjectSnapshot {
  name: string;
  description?: string;
  items: ItemConfig[];
  graphs: GraphSnapshot[];
  running: boolean;
}

export interface GraphExportResult {
  index: number;
  path: string;
  exported: boolean;
}

export class Project {
  name: string;
  description?: string;
  readonly projectDir?: string;
  readonly logger: Logger;
  readonly store: GraphStore;
  readonly scheduler: ProjectScheduler;
  private registry: ItemRegistry;
  private items = new Map<string, ProjectItem>();

  constructor(options: ProjectOptions) {
    this.name = options.name;
    this.description = options.description;
    this.projectDir = options.projectDir;
    this.logger =
      options.logger ?? (options.projectDir ? ProjectLogger.forProject(options.projectDir) : new ProjectLogger());
    this.registry = options.registry ?? createDefaultRegistry();
    this.store = new GraphStore(this.logger);
    this.scheduler = new ProjectScheduler({
      store: this.store,
      items: this.items,
      logger: this.logger,
      send: options.send,
    });
    this.store.onChange((graphs) => {
      for (const graph of graphs) this.scheduler.onStructuralChange(graph);
    });
  }

  /** Build a project from a validated file: every item first, then every connection. */
  static fromFile(file: ProjectFile, options: Omit<ProjectOptions, 'name' | 'description'> = {}): Project {
    const project = new Project({ ...options, name: file.name, description: file.description });
    for (const config of file.items) {
      if (!project.createItem(config)) {
        throw new ProjectFileError(`Could not create item ${config.name} of kind ${config.kind}`);
      }
    }
    for (const { from, to } of file.connections) project.connect(from, to);
    return project;
  }

  static load(projectDir: string, options: Omit<ProjectOptions, 'name' | 'description' | 'projectDir'> = {}): Project {
    const file = readProjectFile(projectDir);
    const project = Project.fromFile(file, { ...options, projectDir });
    project.logger.info('Project loaded', { name: project.name, items: project.itemCount });
    return project;
  }

  save(projectDir = this.projectDir): void {
    if (!projectDir) throw new ProjectFileError('Project has no directory to save to');
    writeProjectFile(projectDir, this.toFile());
    this.logger.info('Project saved', { name: this.name, dir: projectDir });
  }

  toFile(): ProjectFile {
    return {
      version: PROJECT_FILE_VERSION,
      name: this.name,
      ...(this.description !== undefined ? { description: this.description } : {}),
      items: [...this.items.values()].map((item) => item.toJSON()),
      connections: this.connections(),
    };
  }

  get itemCount(): number {
    return this.items.size;
  }

  getItem(name: string): ProjectItem | undefined {
    return this.items.get(name);
  }

  itemNames(): string[] {
    return [...this.items.keys()];
  }

  connections(): Connection[] {
    return this.store.edges().map(({ src, dst }) => ({ from: src, to: dst }));
  }

  /** Instantiate an item from config and add it. Returns null if it could not be added. */
  createItem(config: ItemConfig): ProjectItem | null {
    const item = this.registry.create(config);
    if (!item) {
      this.logger.error('No factory registered for item kind', { kind: config.kind });
      return null;
    }
    return this.addItem(item) ? item : null;
  }

  /** Register an item and give it its own singleton graph. */
  addItem(item: ProjectItem): boolean {
    if (this.items.has(item.name)) {
      this.logger.error('Item already exists', { item: item.name });
      return false;
    }
    this.items.set(item.name, item);
    if (!this.store.addNode(item.name)) {
      this.items.delete(item.name);
      return false;
    }
    return true;
  }

  removeItem(name: string): boolean {
    if (!this.items.has(name)) {
      this.logger.warn('Item not found', { item: name });
      return false;
    }
    this.store.removeNode(name);
    this.items.delete(name);
    return true;
  }

  renameItem(oldName: string, newName: string): boolean {
    const item = this.items.get(oldName);
    if (!item) {
      this.logger.warn('Item not found', { item: oldName });
      return false;
    }
    if (this.items.has(newName)) {
      this.logger.error('Cannot rename item: name already in use', { oldName, newName });
      return false;
    }
    item.rename(newName);
    // Re-key in place; the scheduler holds this same map.
    const entries = [...this.items.entries()];
    this.items.clear();
    for (const [key, value] of entries) this.items.set(key === oldName ? newName : key, value);
    return this.store.renameNode(oldName, newName);
  }

  connect(from: string, to: string): boolean {
    for (const name of [from, to]) {
      if (!this.items.has(name)) {
        this.logger.warn('Cannot connect: item not found', { item: name });
        return false;
      }
    }
    return this.store.addEdge(from, to);
  }

  disconnect(from: string, to: string): boolean {
    if (!this.store.hasEdge(from, to)) {
      this.logger.warn('Connection not found', { from, to });
      return false;
    }
    this.store.removeEdge(from, to);
    return true;
  }

  executeAll(): Promise<ExecutionSummary> {
    return this.scheduler.executeAll();
  }

  executeSelected(names: string[]): Promise<ExecutionSummary> {
    return this.scheduler.executeSelected(names);
  }

  stop(): boolean {
    return this.scheduler.stop();
  }

  get isRunning(): boolean {
    return this.scheduler.isRunning;
  }

  setSend(send: SendEvent): void {
    this.scheduler.setSend(send);
  }

  notifyChangesInAllDags(): void {
    this.scheduler.notifyChangesInAllDags();
  }

  /** Write every acyclic graph to `<dir>/<index>.graphml`. */
  exportGraphs(dir = this.projectDir): GraphExportResult[] {
    if (!dir) throw new ProjectFileError('Project has no directory to export to');
    const dags = this.store.dags();
    if (dags.length === 0) {
      this.logger.warn('Project has no graphs to export');
      return [];
    }
    return dags.map((graph, index) => {
      const filePath = path.join(dir, `${index}.graphml`);
      const exported = exportToGraphML(graph, filePath);
      if (exported) {
        this.logger.info(`Graph nr. ${index} exported to ${filePath}`);
      } else {
        this.logger.warn(`Exporting graph nr. ${index} failed. Not a directed acyclic graph`);
      }
      return { index, path: filePath, exported };
    });
  }

  snapshot(): ProjectSnapshot {
    return {
      name: this.name,
      ...(this.description !== undefined ? { description: this.description } : {}),
      items: [...this.items.values()].map((item) => item.toJSON()),
      graphs: this.store.dags().map((graph) => {
        const result = computeExecutionOrder(graph);
        return {
          nodes: graph.nodes(),
          edges: graph.edges().map(({ src, dst }): EdgeTuple => [src, dst]),
          order: result.ok ? result.order : null,
          cycleEdges: result.ok ? [] : result.cycleEdges,
        };
      }),
      running: this.scheduler.isRunning,
    };
  }
}
