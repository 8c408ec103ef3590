export { ComplaintOrchestrator, type OrchestratorDependencies } from './complaint-orchestrator';
export { parseAddress, type ParsedAddress } from './address-parser';
export { draftAppeal, buildAppealPrompt } from './appeal-writer';
export {
  presentClassification,
  UNCATEGORIZED_NAME,
  UNCATEGORIZED_DESCRIPTION,
  type PresentationOutcome,
} from './classification-presenter';
export { createOrchestrator, type PipelineDependencies } from './pipeline';
