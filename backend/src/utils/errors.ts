/** Engine error classes, distinguished with instanceof. */

import type { Edge } from '../models/graph.js';

/**
 * The graph partition invariant was broken: a node or edge the store must
 * hold is missing. Always a programming error, never a user error.
 */
export class IntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IntegrityError';
  }
}

/** A graph cannot be executed because it is not acyclic. */
export class StructuralError extends Error {
  readonly edges: Edge[];

  constructor(message: string, edges: Edge[]) {
    super(message);
    this.name = 'StructuralError';
    this.edges = edges;
  }
}

/** A project file could not be read or did not validate. */
export class ProjectFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProjectFileError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
