/**
 * Case Aggregator Tests
 *
 * Folding a user's processed documents into one case record.
 */

import { DocumentProcessor, aggregate, bucketForAmount } from '@tenantcase/shared';
import type { CaseDocument } from '@tenantcase/shared';
import { LEASE_TEXT, SUMMONS_TEXT, NOTICE_TO_QUIT_TEXT, REFERENCE_DATE } from './helpers';

const processor = new DocumentProcessor();

function processText(documentId: string, text: string, filename: string): CaseDocument {
  return processor.processRuleBased({ document_id: documentId, filename, text, referenceDate: REFERENCE_DATE });
}

describe('aggregate', () => {
  const summons = processText('doc-1', SUMMONS_TEXT, 'summons.pdf');
  const lease = processText('doc-2', LEASE_TEXT, 'lease.pdf');
  const notice = processText('doc-3', NOTICE_TO_QUIT_TEXT, 'notice.pdf');

  it('returns an empty case for no documents', () => {
    const data = aggregate([], { userId: 'user-1' });

    expect(data.user_id).toBe('user-1');
    expect(data.document_count).toBe(0);
    expect(data.primary_case_number).toBeNull();
    expect(data.case_numbers).toEqual([]);
    expect(data.urgency_level).toBeNull();
    expect(data.confidence_score).toBe(0);
    expect(data.documents_by_type).toEqual({});
  });

  it('takes the first non-empty scalar in document order', () => {
    const data = aggregate([summons, lease]);

    expect(data.tenant_name).toBe('Taylor Morgan');
    expect(data.landlord_name).toBe('Lakeside Apartments LLC');
    expect(data.property_address).toBe('456 Oak Avenue, Unit 12, Minneapolis, MN 55404');
    expect(data.unit_number).toBe('12');
    expect(data.hearing_date).toBe('2025-03-14');
    expect(data.hearing_time).toBe('9:00 AM');
    expect(data.lease_start).toBe('2025-01-01');
    expect(data.lease_end).toBe('2025-12-31');

    const reversed = aggregate([lease, summons]);
    expect(reversed.tenant_name).toBe('Jordan Rivera');
    expect(reversed.landlord_name).toBe('Maple Grove Properties LLC');
  });

  it('keeps every party once with the document it came from', () => {
    const { all_parties: parties } = aggregate([summons, lease]);

    expect(parties).toEqual(
      expect.arrayContaining([
        { name: 'Taylor Morgan', role: 'tenant', document_id: 'doc-1' },
        { name: 'Lakeside Apartments LLC', role: 'landlord', document_id: 'doc-1' },
        { name: 'Jordan Rivera', role: 'tenant', document_id: 'doc-2' },
        { name: 'Maple Grove Properties LLC', role: 'landlord', document_id: 'doc-2' },
      ])
    );
    expect(parties.filter((party) => party.name === 'Taylor Morgan')).toHaveLength(1);
  });

  it('buckets amounts by label', () => {
    const data = aggregate([summons, lease]);

    expect(data.rent_amount).toBe(1250);
    expect(data.rent_claimed).toBe(1800);
    expect(data.deposit_amount).toBe(1250);
    expect(data.late_fees).toBeNull();
    expect(data.damages_claimed).toBeNull();
    expect(data.total_claimed).toBeNull();
    expect(data.all_amounts).toEqual(
      expect.arrayContaining([
        { amount: 1800, label: 'Rent Claimed', document_id: 'doc-1' },
        { amount: 1250, label: 'Monthly Rent', document_id: 'doc-2' },
        { amount: 1250, label: 'Security Deposit', document_id: 'doc-2' },
      ])
    );
  });

  it('collects case numbers, statutes and document counts', () => {
    const data = aggregate([summons, lease, notice], { userId: 'user-1' });

    expect(data.case_numbers).toEqual(['27-CV-25-3456']);
    expect(data.primary_case_number).toBe('27-CV-25-3456');
    expect(data.matched_statutes).toContain('504B.291');
    expect(data.document_count).toBe(3);
    expect(data.documents_by_type).toEqual({ summons: 1, lease: 1, notice_to_quit: 1 });
  });

  it('reports the most severe urgency', () => {
    expect(aggregate([lease]).urgency_level).toBe('low');
    expect(aggregate([lease, summons]).urgency_level).toBe('high');
  });

  it('averages overall field confidence', () => {
    expect(aggregate([lease]).confidence_score).toBe(0.429);
    expect(aggregate([lease, lease]).confidence_score).toBe(0.429);
  });

  it('is idempotent', () => {
    const documents = [summons, lease, notice];

    expect(aggregate(documents, { userId: 'user-1' })).toEqual(aggregate(documents, { userId: 'user-1' }));
  });
});

describe('bucketForAmount', () => {
  it('routes labels and field names to case amount buckets', () => {
    expect(bucketForAmount('Rent Claimed')).toBe('rent_claimed');
    expect(bucketForAmount('rent_claimed')).toBe('rent_claimed');
    expect(bucketForAmount('Late Fee')).toBe('late_fees');
    expect(bucketForAmount('security_deposit')).toBe('deposit_amount');
    expect(bucketForAmount('Legal Costs')).toBe('damages_claimed');
    expect(bucketForAmount('Judgment Amount')).toBe('total_claimed');
    expect(bucketForAmount('Monthly Rent')).toBe('rent_amount');
    expect(bucketForAmount('Parking')).toBeNull();
  });
});
