/**
 * Prometheus Metrics
 *
 * Metrics for classification, extraction and consolidation stages.
 */

import * as promClient from 'prom-client';

// Create a Registry for metrics
export const register = new promClient.Registry();

/**
 * Add process-level default metrics (CPU, memory, event loop) to the registry.
 * Left to the host process, which owns the scrape endpoint.
 */
export function enableDefaultMetrics(): void {
  promClient.collectDefaultMetrics({ register });
}

// ============================================================================
// Classification Metrics
// ============================================================================

export const pagesClassifiedCounter = new promClient.Counter({
  name: 'finstatement_pages_classified_total',
  help: 'Pages scored by the classifier',
  labelNames: ['statement_type', 'outcome'],
  registers: [register],
});

// ============================================================================
// Extraction Metrics
// ============================================================================

export const extractionAttemptsCounter = new promClient.Counter({
  name: 'finstatement_extraction_attempts_total',
  help: 'Extraction service calls by outcome',
  labelNames: ['statement_type', 'outcome'],
  registers: [register],
});

export const rateLimitRetriesCounter = new promClient.Counter({
  name: 'finstatement_rate_limit_retries_total',
  help: 'Retries scheduled after a rate-limit response',
  registers: [register],
});

export const pageExtractionDurationHistogram = new promClient.Histogram({
  name: 'finstatement_page_extraction_duration_seconds',
  help: 'Duration of one page extraction including retries',
  labelNames: ['status'],
  buckets: [1, 2, 5, 10, 20, 30, 60, 120],
  registers: [register],
});

export const llmRequestsCounter = new promClient.Counter({
  name: 'finstatement_llm_requests_total',
  help: 'Total number of LLM requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'finstatement_llm_request_duration_seconds',
  help: 'Duration of LLM requests',
  labelNames: ['model'],
  buckets: [1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

// ============================================================================
// Consolidation & Pipeline Metrics
// ============================================================================

export const validationFailuresCounter = new promClient.Counter({
  name: 'finstatement_validation_failures_total',
  help: 'Cross-statement checks that failed to reconcile',
  labelNames: ['check'],
  registers: [register],
});

export const pipelineRunsCounter = new promClient.Counter({
  name: 'finstatement_pipeline_runs_total',
  help: 'Pipeline runs by outcome',
  labelNames: ['status'],
  registers: [register],
});

/**
 * Get Prometheus metrics payload
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
