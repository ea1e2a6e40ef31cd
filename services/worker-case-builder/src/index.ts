/**
 * Case Builder Worker
 *
 * Consumes document_text_ready jobs, runs recognition and field mapping,
 * and maintains each user's case snapshot in Postgres.
 */

import { Job } from 'bullmq';
import {
  logger,
  config,
  createQueue,
  createWorker,
  createAssistFromConfig,
  reportQueueMetrics,
  serveMetrics,
  DocumentProcessor,
  QUEUE_NAMES,
  type DocumentTextReadyJob,
} from '@tenantcase/shared';
import { createPool, PgCaseRepository } from './lib/db';
import { handleDocumentTextReady, type CaseBuildResult } from './lib/process-document';

const pool = createPool();
const repository = new PgCaseRepository(pool);
const processor = new DocumentProcessor({ assist: createAssistFromConfig() });

const queue = createQueue<DocumentTextReadyJob, CaseBuildResult>(QUEUE_NAMES.DOCUMENT_TEXT_READY);

// Expose /metrics for Prometheus
const metricsServer = serveMetrics(config.metricsPort, () =>
  reportQueueMetrics([{ name: QUEUE_NAMES.DOCUMENT_TEXT_READY, queue }])
);

// Create and start the worker
const worker = createWorker<DocumentTextReadyJob, CaseBuildResult>(
  QUEUE_NAMES.DOCUMENT_TEXT_READY,
  (job: Job<DocumentTextReadyJob, CaseBuildResult>) => handleDocumentTextReady(job.data, { processor, repository })
);

logger.info('Case builder worker started', { assist: processor.hasAssist });

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await queue.close();
  metricsServer.close();
  await pool.end();
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((err: unknown) => {
    logger.error('Shutdown failed', err);
    process.exit(1);
  });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));
