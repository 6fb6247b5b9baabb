/**
 * Prometheus Metrics
 *
 * Metrics for extraction throughput, dropped segments and HTTP traffic.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

/**
 * Default process metrics (CPU, memory, etc.). Called by long-running
 * services only; wrapped to avoid crashes on restricted environments.
 */
export function enableDefaultMetrics(): void {
  try {
    promClient.collectDefaultMetrics({ register });
  } catch (err) {
    logger.warn('Default Prometheus metrics collection skipped', {
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

// ============================================================================
// Extraction Metrics
// ============================================================================

export const segmentsProcessedCounter = new promClient.Counter({
  name: 'reportgrid_segments_processed_total',
  help: 'Total number of report segments processed, by outcome',
  labelNames: ['profile', 'outcome'],
  registers: [register],
});

export const rowsExtractedCounter = new promClient.Counter({
  name: 'reportgrid_rows_extracted_total',
  help: 'Total number of output rows produced',
  labelNames: ['profile'],
  registers: [register],
});

export const diagnosticsCounter = new promClient.Counter({
  name: 'reportgrid_diagnostics_total',
  help: 'Total number of extraction diagnostics, by kind',
  labelNames: ['profile', 'kind'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'reportgrid_extraction_duration_seconds',
  help: 'Duration of one document extraction pass',
  labelNames: ['profile'],
  buckets: [0.001, 0.01, 0.05, 0.1, 0.5, 1, 5],
  registers: [register],
});

// ============================================================================
// HTTP Request Metrics
// ============================================================================

export const httpRequestDurationHistogram = new promClient.Histogram({
  name: 'reportgrid_http_request_duration_seconds',
  help: 'Duration of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

export const httpRequestsCounter = new promClient.Counter({
  name: 'reportgrid_http_requests_total',
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
