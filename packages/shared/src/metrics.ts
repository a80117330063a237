/**
 * Prometheus Metrics
 *
 * Metrics for pipeline stages, fallbacks, generation requests and HTTP traffic.
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
// Pipeline Metrics
// ============================================================================

export const pipelineStageDurationHistogram = new promClient.Histogram({
  name: 'resume_parser_pipeline_stage_duration_seconds',
  help: 'Duration of each resume pipeline stage',
  labelNames: ['stage', 'outcome'],
  buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 5, 10, 30, 60],
  registers: [register],
});

export const pipelineRunsCounter = new promClient.Counter({
  name: 'resume_parser_pipeline_runs_total',
  help: 'Total number of resume pipeline runs by outcome',
  labelNames: ['outcome'],
  registers: [register],
});

export const fallbacksCounter = new promClient.Counter({
  name: 'resume_parser_fallbacks_total',
  help: 'Total number of runs that fell back to basic info',
  labelNames: ['reason'],
  registers: [register],
});

// ============================================================================
// Generation Service Metrics
// ============================================================================

export const llmRequestsCounter = new promClient.Counter({
  name: 'resume_parser_llm_requests_total',
  help: 'Total number of generation service requests',
  labelNames: ['provider', 'model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'resume_parser_llm_request_duration_seconds',
  help: 'Duration of generation service requests',
  labelNames: ['provider', 'model'],
  buckets: [1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'resume_parser_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5, 30, 60],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'resume_parser_http_requests_total',
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
