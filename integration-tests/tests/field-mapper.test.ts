/**
 * Field Mapper Tests
 *
 * Entities and classification mapped onto the fixed set of form fields.
 */

import {
  recognize,
  extractEntities,
  mapFields,
  deriveAnswerDeadline,
  toFormFieldsDict,
  computeOverallConfidence,
  FIELD_DEFINITIONS,
  FIELD_SET_VERSION,
  getFieldDefinition,
  titleCase,
} from '@tenantcase/shared';
import type { DateEntity, FormFieldsExtraction } from '@tenantcase/shared';
import { LEASE_TEXT, SUMMONS_TEXT, NOTICE_TO_QUIT_TEXT, REFERENCE_DATE } from './helpers';

function mapText(text: string, filename: string): FormFieldsExtraction {
  const classification = recognize(text, filename, { referenceDate: REFERENCE_DATE });
  return mapFields(extractEntities(text), classification, text, { defaultCounty: 'Dakota' });
}

function summonsDate(value: string): DateEntity {
  return {
    kind: 'date',
    value,
    context_label: 'Summons Date',
    source_text: 'January 1, 2025',
    position: { start: 0, end: 15 },
    rule: 'month_day_year',
  };
}

describe('mapFields on a lease', () => {
  const extraction = mapText(LEASE_TEXT, 'lease.pdf');
  const { fields } = extraction;

  it('fills every field in the set', () => {
    expect(Object.keys(fields)).toHaveLength(39);
    expect(FIELD_DEFINITIONS).toHaveLength(39);
    expect(extraction.field_set_version).toBe(FIELD_SET_VERSION);
    expect(extraction.document_type).toBe('lease');
  });

  it('maps parties, property and lease terms', () => {
    expect(fields.tenant_name.value).toBe('Jordan Rivera');
    expect(fields.landlord_name.value).toBe('Maple Grove Properties LLC');
    expect(fields.property_address.value).toBe('123 Main Street, Apt 4B, Minneapolis, MN 55401');
    expect(fields.property_city.value).toBe('Minneapolis');
    expect(fields.property_state.value).toBe('MN');
    expect(fields.property_zip.value).toBe('55401');
    expect(fields.unit_number.value).toBe('4B');
    expect(fields.monthly_rent.value).toBe(1250);
    expect(fields.security_deposit.value).toBe(1250);
    expect(fields.lease_start_date.value).toBe('2025-01-01');
    expect(fields.lease_end_date.value).toBe('2025-12-31');
  });

  it('records tier, source and review reason', () => {
    expect(fields.monthly_rent.confidence).toBe('medium');
    expect(fields.monthly_rent.source).toBe('entity:amount/dollar_sign');
    expect(fields.monthly_rent.source_text).toBe('$1,250.00');
    expect(fields.monthly_rent.needs_review).toBe(true);
    expect(fields.monthly_rent.review_reason).toBe('Please verify monthly rent');
  });

  it('uses the property address as a low-tier tenant address', () => {
    expect(fields.tenant_address.value).toBe('123 Main Street, Apt 4B, Minneapolis, MN 55401');
    expect(fields.tenant_address.confidence).toBe('low');
  });

  it('leaves court fields empty on a landlord document', () => {
    for (const name of ['court_name', 'county', 'judicial_district', 'answer_deadline', 'lease_type'] as const) {
      expect(fields[name].value).toBeNull();
      expect(fields[name].confidence).toBe('empty');
      expect(fields[name].source).toBe('none');
    }
    expect(fields.county.review_reason).toBe('County not found in document');
  });

  it('scores overall confidence from the weighted fields', () => {
    expect(extraction.overall_confidence).toBe(0.429);
    expect(computeOverallConfidence(fields)).toBe(0.429);
    expect(extraction.fields_needing_review).toBe(39);
  });

  it('renders a grouped dictionary', () => {
    const dict = toFormFieldsDict(extraction);

    expect(dict.lease.monthly_rent).toBe(1250);
    expect(dict.tenant.tenant_name).toBe('Jordan Rivera');
    expect(dict.case.case_number).toBeNull();
    expect(dict.metadata.document_type).toBe('lease');
    expect(dict.metadata.fields_needing_review).toBe(39);
    expect(dict.metadata.review_fields).toHaveLength(39);
  });

  it('is deterministic', () => {
    expect(mapText(LEASE_TEXT, 'lease.pdf')).toEqual(extraction);
  });
});

describe('mapFields on a summons', () => {
  const { fields } = mapText(SUMMONS_TEXT, 'summons.pdf');

  it('maps the case caption', () => {
    expect(fields.case_number.value).toBe('27-CV-25-3456');
    expect(fields.case_number.confidence).toBe('high');
    expect(fields.case_number.needs_review).toBe(false);
    expect(fields.case_number.review_reason).toBe('');
    expect(fields.tenant_name.value).toBe('Taylor Morgan');
    expect(fields.landlord_name.value).toBe('Lakeside Apartments LLC');
  });

  it('reads court, county and district from the header', () => {
    expect(fields.court_name.value).toBe('District Court');
    expect(fields.court_name.confidence).toBe('low');
    expect(fields.court_name.source).toBe('text:court_line');
    expect(fields.county.value).toBe('Hennepin');
    expect(fields.county.source).toBe('text:county_of_header');
    expect(fields.judicial_district.value).toBe('Fourth Judicial District');
    expect(fields.judicial_district.confidence).toBe('medium');
  });

  it('maps hearing date and time and the rent claimed', () => {
    expect(fields.hearing_date.value).toBe('2025-03-14');
    expect(fields.hearing_date.confidence).toBe('high');
    expect(fields.hearing_time.value).toBe('9:00 AM');
    expect(fields.hearing_time.source).toBe('text:hearing_clock');
    expect(fields.rent_claimed.value).toBe(1800);
    expect(fields.rent_claimed.confidence).toBe('medium');
  });

  it('does not derive an answer deadline without a summons date', () => {
    expect(fields.answer_deadline.value).toBeNull();
  });
});

describe('mapFields fallbacks', () => {
  it('takes the notice period from the document type', () => {
    const { fields } = mapText(NOTICE_TO_QUIT_TEXT, 'notice.pdf');

    expect(fields.notice_type.value).toBe('14-day');
    expect(fields.notice_type.confidence).toBe('low');
    expect(fields.notice_type.source).toBe('classification');
    expect(fields.rent_claimed.value).toBe(2400);
    expect(fields.rent_claimed.confidence).toBe('low');
  });

  it('assumes the default county and its district for court documents only', () => {
    const court = recognize(SUMMONS_TEXT, 'summons.pdf', { referenceDate: REFERENCE_DATE });
    const landlord = recognize(LEASE_TEXT, 'lease.pdf', { referenceDate: REFERENCE_DATE });

    const courtFields = mapFields([], court, '', { defaultCounty: 'Ramsey' }).fields;
    expect(courtFields.county.value).toBe('Ramsey');
    expect(courtFields.county.confidence).toBe('low');
    expect(courtFields.county.source).toBe('default:county');
    expect(courtFields.judicial_district.value).toBe('Second Judicial District');
    expect(courtFields.judicial_district.source).toBe('derived:county');

    expect(mapFields([], landlord, '', { defaultCounty: 'Ramsey' }).fields.county.value).toBeNull();
  });

  it('derives the answer deadline from the summons date', () => {
    const classification = recognize(SUMMONS_TEXT, 'summons.pdf', { referenceDate: REFERENCE_DATE });
    const { fields, fields_needing_review: needingReview } = mapFields(
      [summonsDate('2025-01-01')],
      classification,
      '',
      { answerDeadlineOffsetDays: 7 }
    );

    expect(fields.summons_date.value).toBe('2025-01-01');
    expect(fields.answer_deadline.value).toBe('2025-01-08');
    expect(fields.answer_deadline.confidence).toBe('low');
    expect(fields.answer_deadline.source).toBe('derived:summons_date');
    expect(fields.answer_deadline.needs_review).toBe(true);
    expect(needingReview).toBe(39);
  });

  it('never overrides an answer deadline found in the document', () => {
    const classification = recognize(SUMMONS_TEXT, 'summons.pdf', { referenceDate: REFERENCE_DATE });
    const deadline: DateEntity = { ...summonsDate('2025-01-20'), context_label: 'Answer Deadline' };
    const extraction = mapFields([summonsDate('2025-01-01'), deadline], classification, '');

    expect(extraction.fields.answer_deadline.value).toBe('2025-01-20');
    expect(extraction.fields.answer_deadline.confidence).toBe('high');
    expect(deriveAnswerDeadline(extraction, 7)).toBe(extraction);
  });
});

describe('field definitions', () => {
  it('looks up definitions by name', () => {
    expect(getFieldDefinition('hearing_time')?.displayName).toBe('Hearing Time');
    expect(getFieldDefinition('hearing_time')?.category).toBe('dates');
  });

  it('title-cases header words', () => {
    expect(titleCase('HENNEPIN')).toBe('Hennepin');
    expect(titleCase('  district   COURT ')).toBe('District Court');
  });
});
