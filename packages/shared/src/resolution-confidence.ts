/**
 * Confidence assigned to a service resolution by the level of the hierarchy
 * that produced it. More specific levels carry more confidence.
 */

import type { ResolutionLevel } from './types';

export const RESOLUTION_CONFIDENCE: Record<ResolutionLevel, number> = {
  emergency: 0.95,
  building: 0.9,
  district: 0.85,
  citywide: 0.7,
  hotline: 0.1,
  integrity_failure: 0.0,
};

/**
 * Get the confidence for a resolution level.
 */
export function getResolutionConfidence(level: ResolutionLevel): number {
  return RESOLUTION_CONFIDENCE[level];
}
