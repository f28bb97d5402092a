/** Data connection item -- a list of file references handed to downstream items. */

import { ItemFinishState } from '../models/execution.js';
import { makeResource, type Resource } from '../models/resource.js';
import type { DataConnectionConfig } from '../utils/projectValidator.js';
import { BaseProjectItem, type ItemExecutionContext } from './base.js';

export class DataConnection extends BaseProjectItem {
  readonly kind = 'data_connection';
  references: string[];

  constructor(config: Omit<DataConnectionConfig, 'kind'>) {
    super(config.name, config.description);
    this.references = [...config.references];
  }

  async execute(context: ItemExecutionContext): Promise<ItemFinishState> {
    for (const resource of this.outputResourcesForward()) context.publish(resource);
    return ItemFinishState.CONTINUE;
  }

  outputResourcesForward(): Resource[] {
    return this.references.map((ref) => makeResource(this.name, 'file', ref));
  }

  toJSON(): DataConnectionConfig {
    return {
      kind: this.kind,
      name: this.name,
      ...(this.description !== undefined ? { description: this.description } : {}),
      references: [...this.references],
    };
  }
}
