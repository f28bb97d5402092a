/** View item -- collects databases and output files from its inputs for inspection. */

import { ItemFinishState } from '../models/execution.js';
import type { Resource } from '../models/resource.js';
import type { ViewConfig } from '../utils/projectValidator.js';
import { BaseProjectItem, type ItemExecutionContext } from './base.js';

function isViewable(resource: Resource): boolean {
  return resource.kind === 'database' || (resource.kind === 'file' && resource.metadata.is_output === true);
}

export class View extends BaseProjectItem {
  readonly kind = 'view';
  private collected: Resource[] = [];

  constructor(config: Omit<ViewConfig, 'kind'>) {
    super(config.name, config.description);
  }

  /** Locators gathered by the last run, or by the last dry run if the view never ran. */
  references(): string[] {
    const source = this.collected.length > 0 ? this.collected : this.simulatedInputs().filter(isViewable);
    return source.map((r) => r.locator);
  }

  async execute(context: ItemExecutionContext): Promise<ItemFinishState> {
    this.collected = context.inputs.filter(isViewable);
    context.logger.info('View collected references', { item: this.name, count: this.collected.length });
    return ItemFinishState.CONTINUE;
  }

  outputResourcesForward(): Resource[] {
    return [];
  }

  toJSON(): ViewConfig {
    return {
      kind: this.kind,
      name: this.name,
      ...(this.description !== undefined ? { description: this.description } : {}),
    };
  }
}
