/**
 * Complaint Orchestrator
 *
 * classify -> parse address -> resolve service -> draft appeal, plus each step
 * as a standalone operation. Reference reads run in short store sessions; no
 * session is open while a model call is in flight.
 */

import type { ProblemClassifier } from '../classifiers/types';
import { config } from '../config';
import type { TextGenerator } from '../llm/types';
import { logger } from '../logger';
import { classificationConfidenceHistogram, classificationsCounter } from '../metrics';
import type { RoutingPolicy } from '../resolution/policy';
import { ServiceResolver } from '../resolution/service-resolver';
import type { StoreSession } from '../store/session';
import type {
  AppealRequest,
  AppealResponse,
  ClassificationResponse,
  ResolveServiceRequest,
  ServiceResolution,
  SolveRequest,
  SolveResponse,
} from '../types';
import { parseAddress } from './address-parser';
import { draftAppeal } from './appeal-writer';
import { presentClassification } from './classification-presenter';

export interface OrchestratorDependencies {
  classifier: ProblemClassifier;
  session: StoreSession;
  policy: RoutingPolicy;
  generator: TextGenerator;
  appealTemperature?: number;
}

export class ComplaintOrchestrator {
  private readonly appealTemperature: number;

  constructor(private readonly deps: OrchestratorDependencies) {
    this.appealTemperature = deps.appealTemperature ?? config.appealTemperature;
  }

  async classify(problemText: string): Promise<ClassificationResponse> {
    const strategy = this.deps.classifier.strategy;
    const outcome = await this.deps.classifier.classify(problemText);
    const category = await this.deps.session((store) => store.getCategory(outcome.categoryId));
    const { response, presentation } = presentClassification(outcome, category);

    classificationsCounter.inc({ strategy, outcome: presentation });
    classificationConfidenceHistogram.observe({ strategy }, response.confidence);
    logger.info('Complaint classified', {
      category_id: response.category_id,
      confidence: response.confidence,
      is_urgent: response.is_urgent,
      presentation,
    });

    return response;
  }

  /** Every lookup of one resolution shares a single session */
  async resolveService(request: ResolveServiceRequest): Promise<ServiceResolution> {
    return this.deps.session((store) => new ServiceResolver(store, this.deps.policy).resolve(request));
  }

  async draftAppeal(request: AppealRequest): Promise<AppealResponse> {
    const letterText = await draftAppeal(this.deps.generator, request, this.appealTemperature);
    return { letter_text: letterText };
  }

  async solve(request: SolveRequest): Promise<SolveResponse> {
    const classification = await this.classify(request.problem_text);

    const address = parseAddress(request.user_info.address);
    logger.debug('Parsed citizen address', {
      street: address.street,
      building: address.building,
      apartment: address.apartment,
    });

    const service = await this.resolveService({
      category_id: classification.category_id,
      is_urgent: classification.is_urgent,
      street_name: address.street,
      house_number: address.building,
    });

    const apartment = address.apartment ?? request.user_info.apartment ?? undefined;
    const appeal = await this.draftAppeal({
      problem_text: request.problem_text,
      address: address.street,
      building: address.building,
      apartment,
    });

    return {
      user_info: request.user_info,
      classification,
      service,
      appeal_text: appeal.letter_text,
    };
  }
}
