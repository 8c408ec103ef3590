/**
 * Generative Few-Shot Classifier
 *
 * Retrieves similar labeled complaints as few-shot context and asks the text
 * generator for a structured classification. Exactly one generation call per
 * complaint. Unusable completions degrade to "other"; failures of the
 * embedding or generation calls themselves propagate.
 */

import type { ClassifierType } from '../config';
import type { EmbeddingClient, TextGenerator } from '../llm/types';
import { parseJsonCompletion } from '../llm/completion-json';
import type { ExampleIndex, ScoredExample } from '../retrieval/types';
import { parseGenerativeClassification } from '../schemas';
import { sanitizePromptInput } from '../security';
import { CLASSIFICATION_PROMPT_TEMPLATE, NO_EXAMPLES_TEXT, fillTemplate } from '../templates';
import { OTHER_CATEGORY_ID, type Category } from '../types';
import { logger } from '../logger';
import type { CategoryCatalog, ClassificationOutcome, ProblemClassifier } from './types';

export interface GenerativeOptions {
  fewShotK: number;
  /** Defaults to 0 */
  temperature?: number;
}

/** Confidence reported for any degraded generative result */
export const GENERATIVE_FALLBACK_CONFIDENCE = 0.5;

function formatCatalog(categories: readonly Category[]): string {
  return categories.map((category) => `- ${category.id}: ${category.name} - ${category.description}`).join('\n');
}

function formatExamples(neighbors: readonly ScoredExample[]): string {
  if (neighbors.length === 0) {
    return NO_EXAMPLES_TEXT;
  }

  return neighbors
    .map(({ example }, i) =>
      [
        `Example ${i + 1}:`,
        `Text: "${example.text}"`,
        `Category: ${example.category_id}`,
        `Urgent: ${example.is_urgent ? 'yes' : 'no'}`,
      ].join('\n')
    )
    .join('\n\n');
}

export function buildClassificationPrompt(
  categories: readonly Category[],
  neighbors: readonly ScoredExample[],
  problemText: string
): string {
  return fillTemplate(CLASSIFICATION_PROMPT_TEMPLATE, {
    categories: formatCatalog(categories),
    examples: formatExamples(neighbors),
    problem_text: sanitizePromptInput(problemText),
  });
}

function fallback(reasoning: string): ClassificationOutcome {
  return {
    categoryId: OTHER_CATEGORY_ID,
    confidence: GENERATIVE_FALLBACK_CONFIDENCE,
    reasoning,
    isUrgent: false,
    isRelevant: true,
  };
}

/**
 * Turn a raw completion into an outcome, validating the category against the catalog.
 */
export function interpretCompletion(completion: string, categories: readonly Category[]): ClassificationOutcome {
  const parsed = parseJsonCompletion(completion);
  if (!parsed.ok) {
    return fallback(`[LLM] Response parsing error: ${parsed.error}`);
  }

  const validated = parseGenerativeClassification(parsed.value);
  if ('errors' in validated) {
    return fallback(`[LLM] Response validation error: ${validated.errors.join('; ')}`);
  }

  const { payload } = validated;
  const known =
    payload.category_id === OTHER_CATEGORY_ID ||
    categories.some((category) => category.id === payload.category_id);
  if (!known) {
    return fallback(`[LLM] Category '${payload.category_id}' not found in catalog`);
  }

  return {
    categoryId: payload.category_id,
    confidence: Math.min(1, Math.max(0, payload.confidence)),
    reasoning: `[LLM] ${payload.reasoning}`,
    isUrgent: payload.is_urgent,
    isRelevant: payload.is_relevant,
  };
}

export class GenerativeClassifier implements ProblemClassifier {
  readonly strategy: ClassifierType = 'llm';
  readonly description = 'Few-shot generative classification with similar complaints as context';

  constructor(
    private readonly embedder: EmbeddingClient,
    private readonly index: ExampleIndex,
    private readonly catalog: CategoryCatalog,
    private readonly generator: TextGenerator,
    private readonly options: GenerativeOptions
  ) {}

  async classify(text: string): Promise<ClassificationOutcome> {
    const embedding = await this.embedder.embed(text);
    const neighbors = await this.index.nearest(embedding, this.options.fewShotK);
    const categories = await this.catalog.listCategories();

    const prompt = buildClassificationPrompt(categories, neighbors, text);
    const completion = await this.generator.generate(prompt, this.options.temperature ?? 0);

    const outcome = interpretCompletion(completion, categories);
    logger.debug('Generative classification', {
      category_id: outcome.categoryId,
      confidence: outcome.confidence,
      few_shot_examples: neighbors.length,
    });
    return outcome;
  }
}
