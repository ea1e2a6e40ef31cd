/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContextAsync,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Types
export * from './types';

// Calendar helpers
export { toIsoDay, addDays, daysBetween, isIsoDate } from './calendar';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type DocumentTextReadyJob,
  getRedisConnection,
  defaultJobOptions,
  createQueue,
  createWorker,
  getQueueMetrics,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  queueDepthGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  documentsRecognizedCounter,
  recognitionConfidenceHistogram,
  fieldsNeedingReviewHistogram,
  assistRequestsCounter,
  assistFallbacksCounter,
  assistRequestDurationHistogram,
  caseBuildsCounter,
  dbQueryDurationHistogram,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  CONTRACT_SCHEMAS,
  ContractValidationError,
  assertValid,
  validateFormFields,
  validateCaseData,
  validateAssistResponse,
  schemas,
  type AssistResponse,
  type ContractName,
  type ValidationResult,
} from './schemas';

// Pattern tables
export * from './patterns';

// Entity extraction
export * from './extractors';

// Recognition
export * from './recognition';

// Form fields
export * from './fields';

// Case aggregation
export * from './aggregation';

// Document pipeline
export * from './pipeline';
