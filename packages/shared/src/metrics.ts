/**
 * Prometheus Metrics
 *
 * Metrics for batch runs: documents by outcome, records by category and
 * extractor, filter drops and extractor fallbacks.
 */

import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Document Metrics
// ============================================================================

export const documentsProcessedCounter = new promClient.Counter({
  name: 'curriculo_documents_processed_total',
  help: 'Total number of documents processed by the batch',
  labelNames: ['status', 'reason'],
  registers: [register],
});

export const documentDurationHistogram = new promClient.Histogram({
  name: 'curriculo_document_duration_seconds',
  help: 'Duration of the full pipeline for one document',
  labelNames: ['status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2, 5],
  registers: [register],
});

// ============================================================================
// Record Metrics
// ============================================================================

export const recordsExtractedCounter = new promClient.Counter({
  name: 'curriculo_records_extracted_total',
  help: 'Total number of records extracted, before filtering',
  labelNames: ['category', 'extractor'],
  registers: [register],
});

export const filterDropsCounter = new promClient.Counter({
  name: 'curriculo_filter_drops_total',
  help: 'Records dropped by the year filter',
  labelNames: ['reason'],
  registers: [register],
});

export const extractorFallbacksCounter = new promClient.Counter({
  name: 'curriculo_extractor_fallbacks_total',
  help: 'Items whose extractor failed and fell back to generic extraction',
  labelNames: ['category'],
  registers: [register],
});

// ============================================================================
// Batch Metrics
// ============================================================================

export const batchDurationHistogram = new promClient.Histogram({
  name: 'curriculo_batch_duration_seconds',
  help: 'Duration of a batch run',
  buckets: [0.1, 0.5, 1, 5, 10, 30, 60, 300],
  registers: [register],
});

/**
 * Get Prometheus metrics in text exposition format
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

