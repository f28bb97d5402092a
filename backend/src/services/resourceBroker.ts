/** Per-run store of resources published by executed items. */

import type { Resource } from '../models/resource.js';
import { hasWildcards, globToRegExp } from '../utils/glob.js';

/** Final path segment, splitting on both separators. */
export function baseName(locator: string): string {
  const parts = locator.split(/[\\/]/);
  return parts[parts.length - 1] ?? locator;
}

export class ResourceBroker {
  private byProducer = new Map<string, Resource[]>();
  private ordered: Resource[] = [];
  private seen = new Set<Resource>();

  /**
   * Append a resource for `producer`. Republishing the same resource object
   * (pass-through) lists it under the new producer but keeps a single global entry.
   */
  publish(producer: string, resource: Resource): void {
    const list = this.byProducer.get(producer);
    if (list) {
      list.push(resource);
    } else {
      this.byProducer.set(producer, [resource]);
    }
    if (!this.seen.has(resource)) {
      this.seen.add(resource);
      this.ordered.push(resource);
    }
  }

  publishAll(producer: string, resources: Iterable<Resource>): void {
    for (const resource of resources) this.publish(producer, resource);
  }

  resourcesFrom(producer: string): Resource[] {
    return [...(this.byProducer.get(producer) ?? [])];
  }

  /** Resources published by the given predecessors, in predecessor order. */
  availableResources(predecessors: Iterable<string>): Resource[] {
    const result: Resource[] = [];
    for (const producer of predecessors) result.push(...this.resourcesFrom(producer));
    return result;
  }

  /** Every distinct resource in publish order. */
  all(): Resource[] {
    return [...this.ordered];
  }

  /** First resource, in publish order, whose locator ends in `name`. */
  findExact(name: string): Resource | null {
    return this.ordered.find((r) => baseName(r.locator) === name) ?? null;
  }

  /**
   * Resources whose whole locator matches a wildcard pattern. Without wildcards,
   * the result is the `findExact` hit, if any.
   */
  findPattern(pattern: string): Resource[] {
    if (!hasWildcards(pattern)) {
      const hit = this.findExact(pattern);
      return hit ? [hit] : [];
    }
    const regex = globToRegExp(pattern);
    return this.ordered.filter((r) => regex.test(r.locator));
  }
}
