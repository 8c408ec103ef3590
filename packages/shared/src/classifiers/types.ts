/**
 * Problem Classifier Types
 *
 * Every classification strategy satisfies ProblemClassifier and is selected by
 * configuration through createClassifier().
 */

import type { ClassifierType } from '../config';
import type { Category } from '../types';

/**
 * Result of one classification
 */
export interface ClassificationOutcome {
  /** Catalog category id, or "other" */
  categoryId: string;
  /** In [0, 1] */
  confidence: number;
  /** Human-readable explanation; every fallback path is labeled here */
  reasoning: string;
  isUrgent: boolean;
  /** False when the text is not a municipal complaint at all */
  isRelevant: boolean;
  /** Confidence of the urgency vote, when the strategy computes one */
  urgencyConfidence?: number;
}

export interface ProblemClassifier {
  /** The strategy this classifier implements */
  readonly strategy: ClassifierType;

  /** Human-readable description of what this classifier does */
  readonly description: string;

  classify(text: string): Promise<ClassificationOutcome>;
}

/**
 * Source of the category catalog offered to the generative strategy
 */
export interface CategoryCatalog {
  listCategories(): Promise<Category[]>;
}
