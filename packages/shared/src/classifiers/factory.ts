/**
 * Classifier Factory
 *
 * Builds the configured strategy. Callers depend only on ProblemClassifier.
 */

import { config, type ClassifierType, type Config } from '../config';
import type { EmbeddingClient, TextGenerator } from '../llm/types';
import type { ExampleIndex } from '../retrieval/types';
import { logger } from '../logger';
import { GenerativeClassifier } from './generative';
import { HybridClassifier } from './hybrid';
import { NearestNeighborClassifier } from './nearest-neighbor';
import type { CategoryCatalog, ProblemClassifier } from './types';

export interface ClassifierDependencies {
  embedder: EmbeddingClient;
  index: ExampleIndex;
  catalog: CategoryCatalog;
  generator: TextGenerator;
}

export interface ClassifierSettings {
  topK: number;
  fewShotK: number;
  threshold: number;
  urgencyTrustedMaxId: number | null;
}

export function classifierSettingsFromConfig(cfg: Config = config): ClassifierSettings {
  return {
    topK: cfg.classifierTopK,
    fewShotK: cfg.classifierFewShotK,
    threshold: cfg.classifierThreshold,
    urgencyTrustedMaxId: cfg.urgencyTrustedMaxId,
  };
}

export function createClassifier(
  type: ClassifierType,
  deps: ClassifierDependencies,
  settings: ClassifierSettings = classifierSettingsFromConfig()
): ProblemClassifier {
  const nearestNeighbor = () =>
    new NearestNeighborClassifier(deps.embedder, deps.index, {
      topK: settings.topK,
      urgencyTrustedMaxId: settings.urgencyTrustedMaxId,
    });
  const generative = () =>
    new GenerativeClassifier(deps.embedder, deps.index, deps.catalog, deps.generator, {
      fewShotK: settings.fewShotK,
    });

  let classifier: ProblemClassifier;
  switch (type) {
    case 'llm':
      classifier = generative();
      break;
    case 'hybrid':
      classifier = new HybridClassifier(nearestNeighbor(), generative(), settings.threshold);
      break;
    default:
      classifier = nearestNeighbor();
      break;
  }

  logger.debug('Created classifier', {
    strategy: classifier.strategy,
    description: classifier.description,
  });
  return classifier;
}
