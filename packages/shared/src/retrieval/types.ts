import type { Example } from '../types';

export interface ScoredExample {
  example: Example;
  /** Cosine distance to the query, in [0, 2] */
  distance: number;
}

/** Restricts candidates to an inclusive example-id range */
export interface ExampleFilter {
  minId?: number;
  maxId?: number;
}

/**
 * Nearest-neighbor search over labeled examples.
 * Results are nearest first; equal distances are ordered by ascending example id.
 */
export interface ExampleIndex {
  nearest(embedding: number[], k: number, filter?: ExampleFilter): Promise<ScoredExample[]>;
}

export function matchesFilter(id: number, filter?: ExampleFilter): boolean {
  if (!filter) return true;
  if (filter.minId !== undefined && id < filter.minId) return false;
  if (filter.maxId !== undefined && id > filter.maxId) return false;
  return true;
}
