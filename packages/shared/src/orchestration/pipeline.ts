import { createClassifier, classifierSettingsFromConfig } from '../classifiers/factory';
import { config as defaultConfig, type Config } from '../config';
import type { EmbeddingClient, TextGenerator } from '../llm/types';
import { routingPolicyFromConfig, type RoutingPolicy } from '../resolution/policy';
import { SessionBoundStore, type StoreSession } from '../store/session';
import { ComplaintOrchestrator } from './complaint-orchestrator';

export interface PipelineDependencies {
  session: StoreSession;
  embedder: EmbeddingClient;
  generator: TextGenerator;
  config?: Config;
  policy?: RoutingPolicy;
}

/**
 * Wire the configured classifier and the orchestrator to a store session
 * runner. The classifier opens a session per read, between its model calls.
 */
export function createOrchestrator(deps: PipelineDependencies): ComplaintOrchestrator {
  const cfg = deps.config ?? defaultConfig;

  const store = new SessionBoundStore(deps.session);
  const classifier = createClassifier(
    cfg.classifierType,
    { embedder: deps.embedder, index: store, catalog: store, generator: deps.generator },
    classifierSettingsFromConfig(cfg)
  );

  return new ComplaintOrchestrator({
    classifier,
    session: deps.session,
    policy: deps.policy ?? routingPolicyFromConfig(cfg),
    generator: deps.generator,
    appealTemperature: cfg.appealTemperature,
  });
}
