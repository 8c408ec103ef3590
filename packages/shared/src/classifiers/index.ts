export type { ClassificationOutcome, ProblemClassifier, CategoryCatalog } from './types';
export { majorityVote, type VoteResult } from './voting';
export { NearestNeighborClassifier, NO_HISTORY_REASONING, type NearestNeighborOptions } from './nearest-neighbor';
export {
  GenerativeClassifier,
  GENERATIVE_FALLBACK_CONFIDENCE,
  buildClassificationPrompt,
  interpretCompletion,
  type GenerativeOptions,
} from './generative';
export { HybridClassifier, FAST_PATH_MARKER, ESCALATED_MARKER } from './hybrid';
export {
  createClassifier,
  classifierSettingsFromConfig,
  type ClassifierDependencies,
  type ClassifierSettings,
} from './factory';
