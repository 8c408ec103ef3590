/**
 * Hybrid Classifier
 *
 * Nearest-neighbor first; escalates to the generative strategy only when the
 * vote is not confident enough. Returns one of the two results, never a blend.
 */

import type { ClassifierType } from '../config';
import { logger } from '../logger';
import { hybridEscalationsCounter } from '../metrics';
import type { ClassificationOutcome, ProblemClassifier } from './types';

export const FAST_PATH_MARKER = '[Hybrid-Fast]';
export const ESCALATED_MARKER = '[Hybrid-Deep]';

export class HybridClassifier implements ProblemClassifier {
  readonly strategy: ClassifierType = 'hybrid';
  readonly description = 'Nearest-neighbor vote with generative escalation below a confidence threshold';

  constructor(
    private readonly fast: ProblemClassifier,
    private readonly deep: ProblemClassifier,
    private readonly threshold: number
  ) {}

  async classify(text: string): Promise<ClassificationOutcome> {
    const fastResult = await this.fast.classify(text);

    if (fastResult.confidence >= this.threshold) {
      return { ...fastResult, reasoning: `${FAST_PATH_MARKER} ${fastResult.reasoning}` };
    }

    hybridEscalationsCounter.inc();
    logger.info('Hybrid escalation to generative classifier', {
      nn_confidence: fastResult.confidence,
      threshold: this.threshold,
    });

    const deepResult = await this.deep.classify(text);
    return {
      ...deepResult,
      reasoning:
        `${ESCALATED_MARKER} ${deepResult.reasoning} ` +
        `(escalated after nearest-neighbor confidence ${fastResult.confidence.toFixed(2)} < threshold ${this.threshold.toFixed(2)})`,
    };
  }
}
