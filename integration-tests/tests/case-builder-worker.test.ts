/**
 * Case Builder Worker Tests
 *
 * The document_text_ready handler run against an in-memory repository.
 */

import {
  CaseHub,
  DocumentProcessor,
  caseBuildsCounter,
  getContext,
  type DocumentTextReadyJob,
  type RequestContext,
} from '@tenantcase/shared';
import type { Counter } from 'prom-client';
import { handleDocumentTextReady } from '../../services/worker-case-builder/src/lib/process-document';
import { InMemoryCaseRepository, LEASE_TEXT, SUMMONS_TEXT, REFERENCE_TIME } from './helpers';

function job(overrides: Partial<DocumentTextReadyJob>): DocumentTextReadyJob {
  return {
    event_type: 'document.text_ready',
    correlation_id: 'corr-1',
    user_id: 'user-1',
    document_id: 'doc-1',
    filename: 'lease.pdf',
    text: LEASE_TEXT,
    uploaded_at: '2025-02-01T10:00:00.000Z',
    ...overrides,
  };
}

async function counterValue(counter: Counter<string>, status: string): Promise<number> {
  const metric = await counter.get();
  return metric.values.find((value) => value.labels.status === status)?.value ?? 0;
}

describe('handleDocumentTextReady', () => {
  let repository: InMemoryCaseRepository;
  let processor: DocumentProcessor;

  beforeEach(() => {
    repository = new InMemoryCaseRepository();
    processor = new DocumentProcessor();
  });

  const clock = (): number => REFERENCE_TIME;

  it('stores the document and returns the rebuilt case', async () => {
    const result = await handleDocumentTextReady(job({}), { processor, repository, clock });

    expect(result.document_id).toBe('doc-1');
    expect(result.document_type).toBe('lease');
    expect(result.case_data.user_id).toBe('user-1');
    expect(result.case_data.document_count).toBe(1);
    expect(result.case_data.tenant_name).toBe('Jordan Rivera');
    expect(await repository.getSnapshot('user-1')).toEqual(result.case_data);
  });

  it('aggregates in upload order regardless of arrival order', async () => {
    await handleDocumentTextReady(
      job({ document_id: 'doc-2', filename: 'summons.pdf', text: SUMMONS_TEXT, uploaded_at: '2025-02-15T09:00:00.000Z' }),
      { processor, repository, clock }
    );
    const result = await handleDocumentTextReady(job({}), { processor, repository, clock });

    expect(result.case_data.document_count).toBe(2);
    expect(result.case_data.tenant_name).toBe('Jordan Rivera');
    expect(result.case_data.primary_case_number).toBe('27-CV-25-3456');
    expect(result.case_data.documents_by_type).toEqual({ lease: 1, summons: 1 });
    expect((await repository.listDocuments('user-1')).map((document) => document.document_id)).toEqual([
      'doc-1',
      'doc-2',
    ]);
  });

  it('replaces a redelivered document instead of duplicating it', async () => {
    await handleDocumentTextReady(job({}), { processor, repository, clock });
    const result = await handleDocumentTextReady(job({}), { processor, repository, clock });

    expect(result.case_data.document_count).toBe(1);
    expect(repository.documentCount).toBe(1);
  });

  it('keeps each user separate', async () => {
    await handleDocumentTextReady(job({}), { processor, repository, clock });
    const result = await handleDocumentTextReady(
      job({ user_id: 'user-2', document_id: 'doc-9', filename: 'summons.pdf', text: SUMMONS_TEXT }),
      { processor, repository, clock }
    );

    expect(result.case_data.document_count).toBe(1);
    expect(result.case_data.tenant_name).toBe('Taylor Morgan');
    expect((await repository.getSnapshot('user-1'))?.tenant_name).toBe('Jordan Rivera');
  });

  it('invalidates the cached case after a rebuild', async () => {
    const hub = new CaseHub({ source: repository, ttlMs: 60_000, clock });
    expect((await hub.getCaseData('user-1')).document_count).toBe(0);

    await handleDocumentTextReady(job({}), { processor, repository, hub, clock });

    expect((await hub.getCaseData('user-1')).document_count).toBe(1);
  });

  it('processes the document inside the job context', async () => {
    let seen: RequestContext | undefined;
    jest.spyOn(processor, 'process').mockImplementationOnce(async (input) => {
      seen = getContext();
      return processor.processRuleBased(input);
    });

    await handleDocumentTextReady(job({ correlation_id: 'corr-7' }), { processor, repository, clock });

    expect(seen).toEqual({ correlationId: 'corr-7', documentId: 'doc-1', userId: 'user-1' });
    expect(getContext()).toBeUndefined();
  });

  it('counts successful builds', async () => {
    const before = await counterValue(caseBuildsCounter, 'success');

    await handleDocumentTextReady(job({}), { processor, repository, clock });

    expect(await counterValue(caseBuildsCounter, 'success')).toBe(before + 1);
  });

  it('rethrows processing failures, counts them and writes nothing', async () => {
    const failing = new DocumentProcessor();
    jest.spyOn(failing, 'process').mockRejectedValueOnce(new Error('processing exploded'));
    const before = await counterValue(caseBuildsCounter, 'failed');

    await expect(handleDocumentTextReady(job({}), { processor: failing, repository, clock })).rejects.toThrow(
      'processing exploded'
    );

    expect(await counterValue(caseBuildsCounter, 'failed')).toBe(before + 1);
    expect(repository.documentCount).toBe(0);
    expect(await repository.getSnapshot('user-1')).toBeNull();
  });
});
