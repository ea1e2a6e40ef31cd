/**
 * Entity Extraction Tests
 *
 * Dates, amounts, parties, addresses, case numbers, statutes and contacts
 * pulled from raw document text.
 */

import {
  ExtractorRegistry,
  createDefaultRegistry,
  extractEntities,
  dateExtractor,
  amountExtractor,
  partyExtractor,
  addressExtractor,
  caseNumberExtractor,
  statuteExtractor,
  phoneExtractor,
  emailExtractor,
  toIsoDate,
  parseAmount,
  nearestContactRole,
} from '@tenantcase/shared';
import type { AddressEntity, ExtractedEntity } from '@tenantcase/shared';
import { LEASE_TEXT, SUMMONS_TEXT, NOTICE_TO_QUIT_TEXT } from './helpers';

function isAddress(entity: ExtractedEntity): entity is AddressEntity {
  return entity.kind === 'address';
}

describe('DateExtractor', () => {
  it('labels lease term dates from surrounding words', () => {
    const dates = dateExtractor.extract(LEASE_TEXT);

    expect(dates.map((d) => [d.value, d.context_label, d.rule])).toEqual([
      ['2025-01-01', 'Lease Start Date', 'month_day_year'],
      ['2025-12-31', 'Lease End Date', 'month_day_year'],
    ]);
  });

  it('labels a hearing date', () => {
    const dates = dateExtractor.extract(SUMMONS_TEXT);

    expect(dates).toHaveLength(1);
    expect(dates[0]?.value).toBe('2025-03-14');
    expect(dates[0]?.context_label).toBe('Hearing Date');
    expect(dates[0]?.source_text).toBe('March 14, 2025');
  });

  it('lets a hearing word after the date outrank notice and service words before it', () => {
    const notice = dateExtractor.extract('This notice is given January 5, 2025 for the court hearing.');
    const served = dateExtractor.extract('Served January 5, 2025. Your hearing is below.');

    expect(notice.map((d) => d.context_label)).toEqual(['Hearing Date']);
    expect(served.map((d) => d.context_label)).toEqual(['Hearing Date']);
  });

  it('ranks summons over notice and notice over a plain dated line', () => {
    expect(dateExtractor.extract('Notice of this summons dated February 3, 2025')[0]?.context_label).toBe(
      'Summons Date'
    );
    expect(dateExtractor.extract('Notice dated February 3, 2025')[0]?.context_label).toBe('Notice Date');
    expect(dateExtractor.extract('Dated February 3, 2025')[0]?.context_label).toBe('Document Date');
  });

  it('drops impossible calendar dates', () => {
    expect(dateExtractor.extract('Due 13/45/9999')).toEqual([]);
    expect(toIsoDate({ year: 2025, month: 2, day: 30 })).toBeNull();
    expect(toIsoDate({ year: 2024, month: 2, day: 29 })).toBe('2024-02-29');
  });

  it('returns nothing for empty text', () => {
    expect(dateExtractor.extract('')).toEqual([]);
  });
});

describe('AmountExtractor', () => {
  it('labels rent and deposit amounts', () => {
    const amounts = amountExtractor.extract(LEASE_TEXT);

    expect(amounts.map((a) => [a.value, a.context_label, a.rule])).toEqual([
      [1250, 'Monthly Rent', 'dollar_sign'],
      [1250, 'Security Deposit', 'dollar_sign'],
    ]);
  });

  it('reads an amount due from a notice', () => {
    const amounts = amountExtractor.extract(NOTICE_TO_QUIT_TEXT);

    expect(amounts).toHaveLength(1);
    expect(amounts[0]?.value).toBe(2400);
    expect(amounts[0]?.context_label).toBe('Amount Due');
  });

  it('drops rent and deposit amounts outside their plausible range', () => {
    expect(amountExtractor.extract('Monthly rent: $50')).toEqual([]);
    expect(amountExtractor.extract('Security deposit: $50,000')).toEqual([]);
  });

  it('keeps small amounts for roles without a range', () => {
    const amounts = amountExtractor.extract('Late fee: $50');

    expect(amounts.map((a) => [a.value, a.context_label])).toEqual([[50, 'Late Fee']]);
  });

  it('parses grouped digits and cents', () => {
    expect(parseAmount('1,250', '.5')).toBe(1250.5);
    expect(parseAmount('2,400', undefined)).toBe(2400);
  });
});

describe('PartyExtractor', () => {
  it('reads labelled tenant and landlord names', () => {
    const parties = partyExtractor.extract(LEASE_TEXT);

    expect(parties.map((p) => [p.value, p.role, p.context_label, p.rule])).toEqual([
      ['Jordan Rivera', 'tenant', 'Tenant', 'tenant_label'],
      ['Maple Grove Properties LLC', 'landlord', 'Landlord', 'landlord_label'],
    ]);
  });

  it('reads caption parties around "vs."', () => {
    const parties = partyExtractor.extract(SUMMONS_TEXT);

    const tenant = parties.find((p) => p.role === 'tenant');
    const landlord = parties.find((p) => p.role === 'landlord');
    expect(tenant?.value).toBe('Taylor Morgan');
    expect(tenant?.context_label).toBe('Defendant/Tenant');
    expect(tenant?.rule).toBe('tenant_versus');
    expect(landlord?.value).toBe('Lakeside Apartments LLC');
    expect(landlord?.rule).toBe('landlord_versus');
  });
});

describe('AddressExtractor', () => {
  it('splits a property address into components', () => {
    const [address] = addressExtractor.extract(LEASE_TEXT);

    expect(address?.value).toBe('123 Main Street, Apt 4B, Minneapolis, MN 55401');
    expect(address?.context_label).toBe('Property Address');
    expect(address?.components).toEqual({
      street: '123 Main Street',
      unit: '4B',
      city: 'Minneapolis',
      state: 'MN',
      zip: '55401',
      state_defaulted: false,
    });
  });

  it('reads a unit number from a premises line', () => {
    const [address] = addressExtractor.extract(SUMMONS_TEXT);

    expect(address?.context_label).toBe('Property Address');
    expect(address?.components.unit).toBe('12');
  });
});

describe('CaseNumberExtractor and StatuteExtractor', () => {
  it('labels a district court case number by jurisdiction', () => {
    const [caseNumber] = caseNumberExtractor.extract(SUMMONS_TEXT);

    expect(caseNumber?.value).toBe('27-CV-25-3456');
    expect(caseNumber?.context_label).toBe('Case Number (Minnesota District Court)');
    expect(caseNumber?.rule).toBe('mn_district');
  });

  it('reads a Dakota County case number', () => {
    const [caseNumber] = caseNumberExtractor.extract('Court File No. 19HA-CV-25-1234');

    expect(caseNumber?.value).toBe('19HA-CV-25-1234');
    expect(caseNumber?.rule).toBe('mn_dakota');
  });

  it('skips the generic rules once a jurisdiction format matched', () => {
    const text = 'Case No: ABC-1234\nCourt File No. 27-CV-25-3456\nSee also CV-2024-77';

    expect(caseNumberExtractor.extract(text).map((c) => [c.value, c.rule])).toEqual([['27-CV-25-3456', 'mn_district']]);
  });

  it('falls back to a labelled case number', () => {
    expect(caseNumberExtractor.extract('Case No: ABC-1234').map((c) => [c.value, c.rule])).toEqual([
      ['ABC-1234', 'labeled'],
    ]);
  });

  it('finds a chapter 504B section', () => {
    const statutes = statuteExtractor.extract(SUMMONS_TEXT);

    expect(statutes.map((s) => s.value)).toContain('504B.291');
  });
});

describe('Contact extractors', () => {
  const text = 'Landlord office: (612) 555-0199\nTenant email: Jordan.Rivera@Example.com';

  it('normalizes phones and attributes them to the nearest role', () => {
    const [phone] = phoneExtractor.extract(text);

    expect(phone?.value).toBe('612-555-0199');
    expect(phone?.context_label).toBe('Landlord Phone');
  });

  it('lowercases emails and attributes them to the nearest role', () => {
    const [email] = emailExtractor.extract(text);

    expect(email?.value).toBe('jordan.rivera@example.com');
    expect(email?.context_label).toBe('Tenant Email');
  });

  it('picks the role word closest to the contact', () => {
    expect(nearestContactRole('Tenant, c/o the property manager at')).toBe('Landlord');
    expect(nearestContactRole('call us at')).toBeNull();
  });
});

describe('ExtractorRegistry', () => {
  it('registers every entity kind in a fixed order', () => {
    expect(createDefaultRegistry().kinds()).toEqual([
      'date',
      'amount',
      'party',
      'address',
      'case_number',
      'statute',
      'phone',
      'email',
    ]);
  });

  it('throws for a kind that was never registered', () => {
    const registry = new ExtractorRegistry().register(dateExtractor);

    expect(registry.has('amount')).toBe(false);
    expect(() => registry.getOrThrow('amount')).toThrow('No extractor registered for entity kind: amount');
  });

  it('only runs the registered extractors', () => {
    const registry = new ExtractorRegistry().register(amountExtractor);
    const entities = extractEntities(LEASE_TEXT, registry);

    expect(entities.every((entity) => entity.kind === 'amount')).toBe(true);
    expect(entities).toHaveLength(2);
  });

  it('extracts every kind from a full document', () => {
    const entities = extractEntities(LEASE_TEXT);

    expect(entities.filter(isAddress)).toHaveLength(1);
    expect(entities.filter((e) => e.kind === 'date')).toHaveLength(2);
    expect(entities.filter((e) => e.kind === 'party')).toHaveLength(2);
  });
});
