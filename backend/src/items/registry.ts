/** Item kind registry -- maps a validated config's `kind` to a factory. */

import type { ItemConfig, ItemKind } from '../utils/projectValidator.js';
import type { ProjectItem } from './base.js';
import { DataConnection } from './dataConnection.js';
import { DataStore } from './dataStore.js';
import { Tool } from './tool.js';
import { View } from './view.js';

export type ItemFactory<K extends ItemKind = ItemKind> = (config: Extract<ItemConfig, { kind: K }>) => ProjectItem;

function isKind<K extends ItemKind>(config: ItemConfig, kind: K): config is Extract<ItemConfig, { kind: K }> {
  return config.kind === kind;
}

export class ItemRegistry {
  private factories = new Map<ItemKind, (config: ItemConfig) => ProjectItem | null>();

  register<K extends ItemKind>(kind: K, factory: ItemFactory<K>): void {
    this.factories.set(kind, (config) => (isKind(config, kind) ? factory(config) : null));
  }

  has(kind: ItemKind): boolean {
    return this.factories.has(kind);
  }

  getAllKinds(): ItemKind[] {
    return Array.from(this.factories.keys());
  }

  /** Build an item from a validated config. Returns null for an unregistered kind. */
  create(config: ItemConfig): ProjectItem | null {
    return this.factories.get(config.kind)?.(config) ?? null;
  }
}

export function createDefaultRegistry(): ItemRegistry {
  const registry = new ItemRegistry();
  registry.register('data_store', (config) => new DataStore(config));
  registry.register('data_connection', (config) => new DataConnection(config));
  registry.register('tool', (config) => new Tool(config));
  registry.register('view', (config) => new View(config));
  return registry;
}
