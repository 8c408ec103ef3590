/**
 * Vector Retrieval Tests
 *
 * Cosine distance conventions and exact nearest-neighbor ordering.
 */

import { boundedDistance, cosineDistance, InMemoryExampleIndex, MAX_COSINE_DISTANCE } from '@civic-appeals/shared';
import { makeExample } from './helpers';

describe('cosineDistance', () => {
  it('is zero for a vector compared with itself', () => {
    expect(cosineDistance([0.3, -1.2, 4.5], [0.3, -1.2, 4.5])).toBeCloseTo(0, 12);
  });

  it('is symmetric', () => {
    const a = [1, 2, 3];
    const b = [-2, 0.5, 1];
    expect(cosineDistance(a, b)).toBeCloseTo(cosineDistance(b, a), 12);
  });

  it('is 1 for orthogonal and 2 for opposite vectors', () => {
    expect(cosineDistance([1, 0], [0, 1])).toBe(1);
    expect(cosineDistance([1, 0], [-1, 0])).toBe(2);
  });

  it('treats zero-norm vectors as maximally distant', () => {
    expect(cosineDistance([0, 0, 0], [1, 0, 0])).toBe(MAX_COSINE_DISTANCE);
    expect(cosineDistance([1, 0, 0], [0, 0, 0])).toBe(MAX_COSINE_DISTANCE);
  });

  it('treats mismatched dimensions as maximally distant', () => {
    expect(cosineDistance([1, 0], [1, 0, 0])).toBe(MAX_COSINE_DISTANCE);
  });
});

describe('boundedDistance', () => {
  it('keeps distances already in range', () => {
    expect(boundedDistance(0)).toBe(0);
    expect(boundedDistance(0.25)).toBe(0.25);
    expect(boundedDistance(2)).toBe(2);
  });

  it('clamps float error outside [0, 2]', () => {
    expect(boundedDistance(-1e-9)).toBe(0);
    expect(boundedDistance(2.0000001)).toBe(MAX_COSINE_DISTANCE);
  });

  it('ranks NaN and NULL distances as farthest', () => {
    expect(boundedDistance(NaN)).toBe(MAX_COSINE_DISTANCE);
    expect(boundedDistance(null)).toBe(MAX_COSINE_DISTANCE);
  });
});

describe('InMemoryExampleIndex', () => {
  const examples = [
    makeExample(1, 'water_supply', [0, 1, 0]),
    makeExample(2, 'heating', [1, 0, 0]),
    makeExample(3, 'gas', [0, 0, 0]),
    makeExample(4, 'roads', [2, 0, 0]),
    makeExample(5, 'yard', [-1, 0, 0]),
  ];
  const index = new InMemoryExampleIndex(examples);

  it('returns at most k results ordered by non-decreasing distance', async () => {
    const results = await index.nearest([1, 0, 0], 3);

    expect(results).toHaveLength(3);
    for (let i = 1; i < results.length; i++) {
      expect(results[i].distance).toBeGreaterThanOrEqual(results[i - 1].distance);
    }
    for (const { distance } of results) {
      expect(distance).toBeGreaterThanOrEqual(0);
      expect(distance).toBeLessThanOrEqual(2);
    }
  });

  it('orders equal distances by ascending example id', async () => {
    const results = await index.nearest([1, 0, 0], 5);

    expect(results.map((r) => r.example.id)).toEqual([2, 4, 1, 3, 5]);
    expect(results.map((r) => r.distance)).toEqual([0, 0, 1, 2, 2]);
  });

  it('restricts candidates to the filtered id range', async () => {
    const results = await index.nearest([1, 0, 0], 5, { minId: 2, maxId: 3 });

    expect(results.map((r) => r.example.id)).toEqual([2, 3]);
  });

  it('returns nothing for k = 0 or an empty index', async () => {
    expect(await index.nearest([1, 0, 0], 0)).toEqual([]);
    expect(await new InMemoryExampleIndex([]).nearest([1, 0, 0], 5)).toEqual([]);
  });
});
