/**
 * Prometheus Metrics
 *
 * Metrics for file throughput, outcomes and stage timings.
 */

import http from 'node:http';
import * as promClient from 'prom-client';
import { logger } from './logger';
import { errorMessage } from './errors';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: errorMessage(err),
  });
}

// ============================================================================
// File Processing Metrics
// ============================================================================

export const filesProcessedCounter = new promClient.Counter({
  name: 'poscan_files_processed_total',
  help: 'Total number of intake files processed, by outcome',
  labelNames: ['outcome'],
  registers: [register],
});

export const fileProcessingDurationHistogram = new promClient.Histogram({
  name: 'poscan_file_processing_duration_seconds',
  help: 'Duration from detection to outcome for a single file',
  labelNames: ['outcome'],
  buckets: [0.5, 1, 2, 5, 10, 30, 60, 120],
  registers: [register],
});

// ============================================================================
// Stage Metrics
// ============================================================================

export const readinessRetriesCounter = new promClient.Counter({
  name: 'poscan_readiness_retries_total',
  help: 'Readiness probes that failed and were retried',
  registers: [register],
});

export const decodeRetriesCounter = new promClient.Counter({
  name: 'poscan_decode_retries_total',
  help: 'Image decode attempts that failed and were retried',
  registers: [register],
});

export const ocrDurationHistogram = new promClient.Histogram({
  name: 'poscan_ocr_duration_seconds',
  help: 'Duration of OCR engine calls',
  labelNames: ['status'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
  registers: [register],
});

// ============================================================================
// Metrics Export
// ============================================================================

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * Expose /metrics on the given port
 */
export function serveMetrics(port: number): http.Server {
  const server = http.createServer(async (req, res) => {
    if (req.url === '/metrics' && req.method === 'GET') {
      res.setHeader('Content-Type', getMetricsContentType());
      res.end(await getMetrics());
    } else {
      res.statusCode = 404;
      res.end();
    }
  });
  server.listen(port, () => {
    logger.info('Metrics server listening', { port });
  });
  return server;
}
