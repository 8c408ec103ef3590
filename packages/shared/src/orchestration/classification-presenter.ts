import type { ClassificationOutcome } from '../classifiers/types';
import { OTHER_CATEGORY_ID, type Category, type ClassificationResponse } from '../types';

export const UNCATEGORIZED_NAME = 'Uncategorized';
export const UNCATEGORIZED_DESCRIPTION = 'Could not determine specific category';

export type PresentationOutcome = 'classified' | 'other' | 'recovered';

/**
 * Enrich an outcome with catalog data. An id missing from the catalog is
 * recovered to "other".
 */
export function presentClassification(
  outcome: ClassificationOutcome,
  category: Category | null
): { response: ClassificationResponse; presentation: PresentationOutcome } {
  const base = {
    confidence: outcome.confidence,
    is_urgent: outcome.isUrgent,
    is_relevant: outcome.isRelevant,
  };

  if (outcome.categoryId === OTHER_CATEGORY_ID) {
    return {
      presentation: 'other',
      response: {
        ...base,
        category_id: OTHER_CATEGORY_ID,
        category_name: UNCATEGORIZED_NAME,
        category_description: UNCATEGORIZED_DESCRIPTION,
        reasoning: outcome.reasoning,
      },
    };
  }

  if (!category) {
    return {
      presentation: 'recovered',
      response: {
        ...base,
        category_id: OTHER_CATEGORY_ID,
        category_name: UNCATEGORIZED_NAME,
        category_description: UNCATEGORIZED_DESCRIPTION,
        reasoning: `${outcome.reasoning} [Category '${outcome.categoryId}' is missing from the catalog; recovered to '${OTHER_CATEGORY_ID}']`,
      },
    };
  }

  return {
    presentation: 'classified',
    response: {
      ...base,
      category_id: category.id,
      category_name: category.name,
      category_description: category.description,
      reasoning: outcome.reasoning,
    },
  };
}
