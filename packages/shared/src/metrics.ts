/**
 * Prometheus Metrics
 *
 * Metrics for recognition quality, assist usage, case builds and worker
 * job processing.
 */

import http from 'node:http';
import type { Queue } from 'bullmq';
import * as promClient from 'prom-client';
import { logger } from './logger';
import { getQueueMetrics } from './queues';

// Create a Registry for metrics
export const register = new promClient.Registry();

// ============================================================================
// Queue Metrics
// ============================================================================

export const queueDepthGauge = new promClient.Gauge({
  name: 'tenantcase_queue_depth',
  help: 'Current queue depth (waiting + active jobs)',
  labelNames: ['queue'],
  registers: [register],
});

// ============================================================================
// Job Processing Metrics
// ============================================================================

export const jobDurationHistogram = new promClient.Histogram({
  name: 'tenantcase_job_duration_seconds',
  help: 'Duration of job processing in seconds',
  labelNames: ['queue', 'status'],
  buckets: [0.05, 0.1, 0.5, 1, 2, 5, 10, 30],
  registers: [register],
});

export const jobsProcessedCounter = new promClient.Counter({
  name: 'tenantcase_jobs_processed_total',
  help: 'Total number of jobs processed',
  labelNames: ['queue', 'status'],
  registers: [register],
});

// ============================================================================
// Recognition & Extraction Metrics
// ============================================================================

export const documentsRecognizedCounter = new promClient.Counter({
  name: 'tenantcase_documents_recognized_total',
  help: 'Total number of documents recognized',
  labelNames: ['category', 'document_type', 'mode'],
  registers: [register],
});

export const recognitionConfidenceHistogram = new promClient.Histogram({
  name: 'tenantcase_recognition_confidence',
  help: 'Confidence of the winning document type',
  labelNames: ['category'],
  buckets: [0.15, 0.3, 0.5, 0.7, 0.85, 1],
  registers: [register],
});

export const fieldsNeedingReviewHistogram = new promClient.Histogram({
  name: 'tenantcase_fields_needing_review',
  help: 'Number of form fields flagged for review per document',
  labelNames: ['document_type'],
  buckets: [0, 5, 10, 20, 30, 40],
  registers: [register],
});

export const assistRequestsCounter = new promClient.Counter({
  name: 'tenantcase_assist_requests_total',
  help: 'Total number of classification assist requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const assistFallbacksCounter = new promClient.Counter({
  name: 'tenantcase_assist_fallbacks_total',
  help: 'Documents processed rule-based after the assist failed or gave no usable guess',
  labelNames: ['reason'],
  registers: [register],
});

export const assistRequestDurationHistogram = new promClient.Histogram({
  name: 'tenantcase_assist_request_duration_seconds',
  help: 'Duration of classification assist requests',
  labelNames: ['model'],
  buckets: [0.5, 1, 2, 5, 10, 20, 30],
  registers: [register],
});

// ============================================================================
// Case Metrics
// ============================================================================

export const caseBuildsCounter = new promClient.Counter({
  name: 'tenantcase_case_builds_total',
  help: 'Total number of case snapshots rebuilt',
  labelNames: ['status'],
  registers: [register],
});

// ============================================================================
// Database Metrics
// ============================================================================

export const dbQueryDurationHistogram = new promClient.Histogram({
  name: 'tenantcase_db_query_duration_seconds',
  help: 'Duration of database queries',
  labelNames: ['operation'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 2],
  registers: [register],
});

/**
 * Report queue depth to Prometheus gauges.
 * Call before getMetrics() so scrapes include current queue state.
 */
export async function reportQueueMetrics(queues: Array<{ name: string; queue: Queue }>): Promise<void> {
  for (const { name, queue } of queues) {
    try {
      const m = await getQueueMetrics(queue);
      queueDepthGauge.set({ queue: name }, m.waiting + m.active);
    } catch (err) {
      logger.warn('Queue metrics unavailable', {
        queue: name,
        error: err instanceof Error ? err.message : String(err),
      });
      queueDepthGauge.set({ queue: name }, -1);
    }
  }
}

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

/**
 * Start a minimal HTTP server for /metrics (for worker processes).
 * Default process metrics are registered here, not at import, so library
 * users and tests carry no collectors.
 */
export function serveMetrics(port: number, onScrape?: () => Promise<void>): http.Server {
  try {
    promClient.collectDefaultMetrics({ register });
  } catch (err) {
    logger.warn('Default Prometheus metrics collection skipped', {
      error: err instanceof Error ? err.message : String(err),
    });
  }

  const server = http.createServer((req, res) => {
    if (req.url === '/metrics' && req.method === 'GET') {
      const scrape = async (): Promise<string> => {
        if (onScrape) {
          await onScrape();
        }
        return getMetrics();
      };
      scrape()
        .then((body) => {
          res.setHeader('Content-Type', getMetricsContentType());
          res.end(body);
        })
        .catch((err: unknown) => {
          logger.error('Metrics scrape failed', err);
          res.statusCode = 500;
          res.end();
        });
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
