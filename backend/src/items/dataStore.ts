/** Data store item -- exposes one database URL to downstream items. */

import { ItemFinishState } from '../models/execution.js';
import { makeResource, type Resource } from '../models/resource.js';
import type { DataStoreConfig } from '../utils/projectValidator.js';
import { BaseProjectItem, type ItemExecutionContext } from './base.js';

export class DataStore extends BaseProjectItem {
  readonly kind = 'data_store';
  url: string;

  constructor(config: Omit<DataStoreConfig, 'kind'>) {
    super(config.name, config.description);
    this.url = config.url;
  }

  async execute(context: ItemExecutionContext): Promise<ItemFinishState> {
    for (const resource of this.outputResourcesForward()) context.publish(resource);
    context.logger.debug('Data store published', { item: this.name, url: this.url });
    return ItemFinishState.CONTINUE;
  }

  outputResourcesForward(): Resource[] {
    return [makeResource(this.name, 'database', this.url)];
  }

  toJSON(): DataStoreConfig {
    return {
      kind: this.kind,
      name: this.name,
      ...(this.description !== undefined ? { description: this.description } : {}),
      url: this.url,
    };
  }
}
