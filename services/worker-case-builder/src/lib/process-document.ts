/**
 * document_text_ready handler
 *
 * Processes one document, stores it and rebuilds the user's case snapshot.
 * Kept free of BullMQ so it can run against in-memory dependencies.
 */

import {
  logger,
  runWithContextAsync,
  aggregate,
  assertValid,
  validateCaseData,
  validateFormFields,
  caseBuildsCounter,
  jobsProcessedCounter,
  jobDurationHistogram,
  QUEUE_NAMES,
  type CaseData,
  type CaseHub,
  type Clock,
  type DocumentProcessor,
  type DocumentTextReadyJob,
  type DocumentType,
} from '@tenantcase/shared';
import type { CaseRepository } from './db';

export interface CaseBuilderDeps {
  processor: DocumentProcessor;
  repository: CaseRepository;
  /** Cached case views to invalidate after each rebuild */
  hub?: CaseHub;
  /** Reference time for deadline arithmetic; defaults to now */
  clock?: Clock;
}

export interface CaseBuildResult {
  document_id: string;
  document_type: DocumentType;
  case_data: CaseData;
}

export async function handleDocumentTextReady(
  data: DocumentTextReadyJob,
  deps: CaseBuilderDeps
): Promise<CaseBuildResult> {
  const { correlation_id, user_id, document_id } = data;

  return runWithContextAsync({ correlationId: correlation_id, documentId: document_id, userId: user_id }, async () => {
    const startTime = Date.now();
    const clock = deps.clock ?? Date.now;

    logger.info('Processing document_text_ready', {
      document_id,
      filename: data.filename,
      text_length: data.text.length,
    });

    try {
      const document = await deps.processor.process({
        document_id,
        filename: data.filename,
        text: data.text,
        referenceDate: new Date(clock()),
      });
      assertValid('formFields', validateFormFields(document.fields));

      const caseData = await deps.repository.saveDocumentAndSnapshot(
        { user_id, uploaded_at: data.uploaded_at, correlation_id, document },
        (documents) => {
          const snapshot = aggregate(documents, { userId: user_id });
          assertValid('caseData', validateCaseData(snapshot));
          return snapshot;
        }
      );
      deps.hub?.invalidate(user_id);

      const duration = (Date.now() - startTime) / 1000;
      caseBuildsCounter.inc({ status: 'success' });
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.DOCUMENT_TEXT_READY, status: 'success' });
      jobDurationHistogram.observe({ queue: QUEUE_NAMES.DOCUMENT_TEXT_READY, status: 'success' }, duration);

      logger.info('Case snapshot rebuilt', {
        document_type: document.classification.type,
        document_count: caseData.document_count,
        urgency_level: caseData.urgency_level,
        duration_seconds: duration,
      });

      return { document_id, document_type: document.classification.type, case_data: caseData };
    } catch (error) {
      caseBuildsCounter.inc({ status: 'failed' });
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.DOCUMENT_TEXT_READY, status: 'failed' });
      jobDurationHistogram.observe(
        { queue: QUEUE_NAMES.DOCUMENT_TEXT_READY, status: 'failed' },
        (Date.now() - startTime) / 1000
      );
      logger.error('Case build failed', error, { document_id });
      throw error;
    }
  });
}
