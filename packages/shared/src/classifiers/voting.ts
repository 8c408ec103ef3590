/**
 * Majority vote over nearest neighbors with a distance-aware confidence.
 */

import { MAX_COSINE_DISTANCE } from '../retrieval/cosine';
import type { ScoredExample } from '../retrieval/types';
import type { Example } from '../types';

const EPSILON = 1e-9;

export interface VoteResult<L> {
  winner: L;
  votes: number;
  total: number;
  /** 0.5 * vote share + 0.5 * separation from the closest rival, in [0, 1] */
  confidence: number;
}

/**
 * Vote on a label over neighbors ordered nearest first. Among tied labels the
 * one seen first wins. Returns null for an empty neighbor set.
 */
export function majorityVote<L>(
  neighbors: readonly ScoredExample[],
  labelOf: (example: Example) => L
): VoteResult<L> | null {
  if (neighbors.length === 0) {
    return null;
  }

  // Map iteration follows insertion order, i.e. nearest-first first sighting
  const counts = new Map<L, number>();
  for (const { example } of neighbors) {
    const label = labelOf(example);
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }

  let winner = labelOf(neighbors[0].example);
  let votes = 0;
  for (const [label, count] of counts) {
    if (count > votes) {
      winner = label;
      votes = count;
    }
  }

  let winnerDistance = Infinity;
  let rivalDistance = Infinity;
  for (const { example, distance } of neighbors) {
    if (labelOf(example) === winner) {
      winnerDistance = Math.min(winnerDistance, distance);
    } else {
      rivalDistance = Math.min(rivalDistance, distance);
    }
  }

  const voteComponent = votes / neighbors.length;
  const distanceComponent =
    rivalDistance === Infinity
      ? Math.max(0, 1 - winnerDistance / MAX_COSINE_DISTANCE)
      : Math.min(1, Math.max(0, rivalDistance - winnerDistance) / (rivalDistance + EPSILON));

  return {
    winner,
    votes,
    total: neighbors.length,
    confidence: Math.min(1, Math.max(0, 0.5 * voteComponent + 0.5 * distanceComponent)),
  };
}
