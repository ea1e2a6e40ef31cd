/**
 * Document Processor Tests
 *
 * Recognition, extraction and field mapping for one document, with and
 * without a classification assist.
 */

import {
  DocumentProcessor,
  coerceAssistResponse,
  normalizeAssistType,
  createAssistFromConfig,
  assistFallbacksCounter,
  documentsRecognizedCounter,
} from '@tenantcase/shared';
import type { AssistGuess, ClassificationAssist } from '@tenantcase/shared';
import type { Counter } from 'prom-client';
import { LEASE_TEXT, REFERENCE_DATE } from './helpers';

class FakeAssist implements ClassificationAssist {
  readonly name = 'fake';
  calls = 0;

  constructor(private readonly respond: () => Promise<AssistGuess | null>) {}

  async classify(): Promise<AssistGuess | null> {
    this.calls += 1;
    return this.respond();
  }
}

async function counterValue(counter: Counter<string>, labels: Record<string, string>): Promise<number> {
  const metric = await counter.get();
  const sample = metric.values.find((value) =>
    Object.entries(labels).every(([name, expected]) => value.labels[name] === expected)
  );
  return sample?.value ?? 0;
}

const leaseInput = {
  document_id: 'doc-1',
  filename: 'lease.pdf',
  text: LEASE_TEXT,
  referenceDate: REFERENCE_DATE,
};

describe('DocumentProcessor', () => {
  it('processes a document rule-based without an assist', async () => {
    const processor = new DocumentProcessor();
    const before = await counterValue(documentsRecognizedCounter, { document_type: 'lease', mode: 'rules' });

    const document = await processor.process(leaseInput);

    expect(processor.hasAssist).toBe(false);
    expect(document.document_id).toBe('doc-1');
    expect(document.filename).toBe('lease.pdf');
    expect(document.classification.type).toBe('lease');
    expect(document.fields.document_type).toBe('lease');
    expect(document.entities.length).toBeGreaterThan(0);
    expect(await counterValue(documentsRecognizedCounter, { document_type: 'lease', mode: 'rules' })).toBe(before + 1);
  });

  it('adds the assist guess as a signal', async () => {
    const assist = new FakeAssist(async () => ({ type: 'lease', confidence: 0.9 }));
    const processor = new DocumentProcessor({ assist });

    const document = await processor.process(leaseInput);

    expect(processor.hasAssist).toBe(true);
    expect(assist.calls).toBe(1);
    expect(document.classification.reasoning_chain).toContain("assist suggested 'lease' (+0.54)");
  });

  it('falls back to rules when the assist throws', async () => {
    const assist = new FakeAssist(async () => {
      throw new Error('upstream timeout');
    });
    const before = await counterValue(assistFallbacksCounter, { reason: 'error' });

    const document = await new DocumentProcessor({ assist }).process(leaseInput);

    expect(document).toEqual(new DocumentProcessor().processRuleBased(leaseInput));
    expect(await counterValue(assistFallbacksCounter, { reason: 'error' })).toBe(before + 1);
  });

  it('falls back to rules when the assist has no guess', async () => {
    const assist = new FakeAssist(async () => null);
    const before = await counterValue(assistFallbacksCounter, { reason: 'no_guess' });

    const document = await new DocumentProcessor({ assist }).process(leaseInput);

    expect(document.classification.type).toBe('lease');
    expect(document.classification.reasoning_chain.some((line) => line.startsWith('assist'))).toBe(false);
    expect(await counterValue(assistFallbacksCounter, { reason: 'no_guess' })).toBe(before + 1);
  });

  it('skips the assist for empty text', async () => {
    const assist = new FakeAssist(async () => ({ type: 'summons', confidence: 1 }));

    const document = await new DocumentProcessor({ assist }).process({ ...leaseInput, text: '   ' });

    expect(assist.calls).toBe(0);
    expect(document.classification.type).toBe('unknown');
    expect(document.entities).toEqual([]);
  });

  it('applies the configured answer deadline offset', () => {
    const processor = new DocumentProcessor({ answerDeadlineOffsetDays: 10 });

    const document = processor.processRuleBased({
      document_id: 'doc-2',
      filename: 'summons.pdf',
      text: 'SUMMONS\nThis summons was issued on January 1, 2025.',
      referenceDate: REFERENCE_DATE,
    });

    expect(document.fields.fields.summons_date.value).toBe('2025-01-01');
    expect(document.fields.fields.answer_deadline.value).toBe('2025-01-11');
    expect(document.fields.fields.answer_deadline.review_reason).toBe(
      'Calculated as 10 days from summons date; verify against the summons'
    );
  });
});

describe('assist responses', () => {
  it('maps aliases and coerces scalar types', () => {
    expect(coerceAssistResponse({ doc_type: 'court_summons', confidence: '0.8' })).toEqual({
      type: 'summons',
      confidence: 0.8,
    });
  });

  it('parses JSON text', () => {
    expect(coerceAssistResponse('{"doc_type": "Writ of Restitution", "confidence": 0.95}')).toEqual({
      type: 'writ',
      confidence: 0.95,
    });
  });

  it('fills defaults and clamps confidence', () => {
    expect(coerceAssistResponse({})).toEqual({ type: 'unknown', confidence: 0.5 });
    expect(coerceAssistResponse({ doc_type: 'lease', confidence: 1.7 })).toEqual({ type: 'lease', confidence: 1 });
  });

  it('rejects unusable payloads', () => {
    expect(coerceAssistResponse('not json')).toBeNull();
    expect(coerceAssistResponse({ doc_type: 'lease', confidence: 'very high' })).toBeNull();
    expect(coerceAssistResponse([])).toBeNull();
  });

  it('normalizes type labels', () => {
    expect(normalizeAssistType(' Notice-To-Quit ')).toBe('notice_to_quit');
    expect(normalizeAssistType('security deposit')).toBe('deposit_statement');
    expect(normalizeAssistType('correspondence')).toBe('letter');
    expect(normalizeAssistType('banana')).toBe('unknown');
  });

  it('has no assist unless enabled', () => {
    expect(createAssistFromConfig()).toBeNull();
  });
});
