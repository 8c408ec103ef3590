/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, parseClassifierType, type Config, type ClassifierType } from './config';

// Types
export * from './types';

// Errors
export {
  UpstreamCapabilityError,
  RequestValidationError,
  isUpstreamCapabilityError,
  type UpstreamCapability,
  type UpstreamFailureKind,
} from './errors';

// Resolution confidence by hierarchy level
export { RESOLUTION_CONFIDENCE, getResolutionConfidence } from './resolution-confidence';

// Metrics
export {
  register,
  classificationsCounter,
  classificationConfidenceHistogram,
  hybridEscalationsCounter,
  resolutionsCounter,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  embeddingRequestsCounter,
  vectorSearchDurationHistogram,
  dbQueryDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export {
  validateContract,
  parseContract,
  parseGenerativeClassification,
  type ContractName,
  type ContractTypes,
  type ValidationResult,
  type GenerativeClassificationPayload,
} from './schemas';

// Templates
export {
  CLASSIFICATION_PROMPT_TEMPLATE,
  NO_EXAMPLES_TEXT,
  GENERATIVE_CLASSIFICATION_SCHEMA,
  APPEAL_PROMPT_TEMPLATE,
  fillTemplate,
} from './templates';

// Prompt input sanitization
export { sanitizePromptInput, FILTERED_MARKER, DEFAULT_PROMPT_INPUT_MAX_LENGTH } from './security';

// LLM clients
export type { EmbeddingClient, TextGenerator } from './llm/types';
export { OpenAiEmbedder, OpenAiTextGenerator, createOpenAiClients, type OpenAiClients } from './llm/openai';
export { parseJsonCompletion, stripCodeFence, type JsonCompletionResult } from './llm/completion-json';

// Vector retrieval
export { cosineDistance, boundedDistance, MAX_COSINE_DISTANCE } from './retrieval/cosine';
export { matchesFilter, type ExampleFilter, type ExampleIndex, type ScoredExample } from './retrieval/types';
export { InMemoryExampleIndex, rankExamples } from './retrieval/in-memory-index';

// Reference data stores
export {
  compareAssignments,
  type AssignmentQuery,
  type AssignedService,
  type ReferenceStore,
  type ReferenceData,
} from './store/types';
export { InMemoryReferenceStore } from './store/in-memory-store';
export {
  SessionBoundStore,
  sharedStoreSession,
  type SessionStore,
  type StoreSession,
} from './store/session';
export { PgReferenceStore, withReadSession, pgStoreSession, toVectorLiteral } from './store/pg-store';

// Classification strategies
export * from './classifiers';

// Service resolution
export * from './resolution';

// Orchestration
export * from './orchestration';
