/**
 * Prometheus Metrics
 *
 * Metrics for classification quality, routing outcomes, upstream LLM calls
 * and HTTP traffic.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Classification Metrics
// ============================================================================

export const classificationsCounter = new promClient.Counter({
  name: 'civic_appeals_classifications_total',
  help: 'Total number of complaint classifications',
  labelNames: ['strategy', 'outcome'],
  registers: [register],
});

export const classificationConfidenceHistogram = new promClient.Histogram({
  name: 'civic_appeals_classification_confidence',
  help: 'Confidence of returned classifications',
  labelNames: ['strategy'],
  buckets: [0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8, 0.9, 1],
  registers: [register],
});

export const hybridEscalationsCounter = new promClient.Counter({
  name: 'civic_appeals_hybrid_escalations_total',
  help: 'Hybrid classifications that fell through to the generative strategy',
  registers: [register],
});

// ============================================================================
// Routing Metrics
// ============================================================================

export const resolutionsCounter = new promClient.Counter({
  name: 'civic_appeals_service_resolutions_total',
  help: 'Service resolutions by the hierarchy level that produced them',
  labelNames: ['level'],
  registers: [register],
});

// ============================================================================
// LLM Metrics
// ============================================================================

export const llmRequestsCounter = new promClient.Counter({
  name: 'civic_appeals_llm_requests_total',
  help: 'Total number of LLM requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'civic_appeals_llm_request_duration_seconds',
  help: 'Duration of LLM requests',
  labelNames: ['model'],
  buckets: [0.25, 0.5, 1, 2, 5, 10, 20, 30],
  registers: [register],
});

export const embeddingRequestsCounter = new promClient.Counter({
  name: 'civic_appeals_embedding_requests_total',
  help: 'Total number of embedding requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

// ============================================================================
// Storage Metrics
// ============================================================================

export const vectorSearchDurationHistogram = new promClient.Histogram({
  name: 'civic_appeals_vector_search_duration_seconds',
  help: 'Duration of nearest-neighbor example searches',
  labelNames: ['backend'],
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
  registers: [register],
});

export const dbQueryDurationHistogram = new promClient.Histogram({
  name: 'civic_appeals_db_query_duration_seconds',
  help: 'Duration of database queries',
  labelNames: ['operation'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'civic_appeals_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.05, 0.1, 0.5, 1, 2, 5, 10, 30],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'civic_appeals_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}
