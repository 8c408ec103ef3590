/**
 * Nearest-Neighbor Voting Classifier
 *
 * Embeds the complaint, votes over the closest labeled examples for both the
 * category and the urgency flag. One embedding call, no generation.
 */

import type { ClassifierType } from '../config';
import type { EmbeddingClient } from '../llm/types';
import type { ExampleIndex } from '../retrieval/types';
import { OTHER_CATEGORY_ID } from '../types';
import { logger } from '../logger';
import { majorityVote } from './voting';
import type { ClassificationOutcome, ProblemClassifier } from './types';

export interface NearestNeighborOptions {
  topK: number;
  /** When set, urgency is voted only over examples with id <= this value */
  urgencyTrustedMaxId?: number | null;
}

export const NO_HISTORY_REASONING = '[KNN] No historical examples available for comparison.';

export class NearestNeighborClassifier implements ProblemClassifier {
  readonly strategy: ClassifierType = 'knn';
  readonly description = 'Majority vote over the nearest labeled historical complaints';

  constructor(
    private readonly embedder: EmbeddingClient,
    private readonly index: ExampleIndex,
    private readonly options: NearestNeighborOptions
  ) {}

  async classify(text: string): Promise<ClassificationOutcome> {
    const embedding = await this.embedder.embed(text);
    const neighbors = await this.index.nearest(embedding, this.options.topK);

    const category = majorityVote(neighbors, (example) => example.category_id);
    if (!category) {
      return {
        categoryId: OTHER_CATEGORY_ID,
        confidence: 0,
        reasoning: NO_HISTORY_REASONING,
        isUrgent: false,
        isRelevant: true,
        urgencyConfidence: 0,
      };
    }

    const trustedMaxId = this.options.urgencyTrustedMaxId;
    const urgencyNeighbors =
      trustedMaxId === undefined || trustedMaxId === null
        ? neighbors
        : await this.index.nearest(embedding, this.options.topK, { maxId: trustedMaxId });
    const urgency = majorityVote(urgencyNeighbors, (example) => example.is_urgent);

    const isUrgent = urgency?.winner ?? false;
    const urgencyConfidence = urgency?.confidence ?? 0;

    logger.debug('Nearest-neighbor vote', {
      category_id: category.winner,
      votes: category.votes,
      neighbors: category.total,
      confidence: category.confidence,
      is_urgent: isUrgent,
      urgency_confidence: urgencyConfidence,
    });

    const urgencyNote = urgency
      ? ` Urgency: ${urgency.votes}/${urgency.total} voted ${isUrgent ? 'urgent' : 'not urgent'}.`
      : ' Urgency: no trusted examples, assumed not urgent.';

    return {
      categoryId: category.winner,
      confidence: category.confidence,
      reasoning: `[KNN] ${category.votes}/${category.total} similar complaints were classified as '${category.winner}'.${urgencyNote}`,
      isUrgent,
      isRelevant: true,
      urgencyConfidence,
    };
  }
}
