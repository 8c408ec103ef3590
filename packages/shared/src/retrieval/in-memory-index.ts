/**
 * Exact nearest-neighbor search over an in-memory example list.
 */

import type { Example } from '../types';
import { vectorSearchDurationHistogram } from '../metrics';
import { cosineDistance } from './cosine';
import { matchesFilter, type ExampleFilter, type ExampleIndex, type ScoredExample } from './types';

export function rankExamples(
  examples: readonly Example[],
  embedding: number[],
  k: number,
  filter?: ExampleFilter
): ScoredExample[] {
  if (k <= 0) {
    return [];
  }

  return examples
    .filter((example) => matchesFilter(example.id, filter))
    .map((example) => ({ example, distance: cosineDistance(embedding, example.embedding) }))
    .sort((a, b) => a.distance - b.distance || a.example.id - b.example.id)
    .slice(0, k);
}

export class InMemoryExampleIndex implements ExampleIndex {
  constructor(private readonly examples: readonly Example[]) {}

  async nearest(embedding: number[], k: number, filter?: ExampleFilter): Promise<ScoredExample[]> {
    const end = vectorSearchDurationHistogram.startTimer({ backend: 'memory' });
    try {
      return rankExamples(this.examples, embedding, k, filter);
    } finally {
      end();
    }
  }
}
