/**
 * Contract Validation Tests
 *
 * Produced records checked against the JSON schemas in docs/contracts.
 */

import {
  DocumentProcessor,
  aggregate,
  assertValid,
  validateFormFields,
  validateCaseData,
  validateAssistResponse,
  ContractValidationError,
} from '@tenantcase/shared';
import { LEASE_TEXT, SUMMONS_TEXT, REFERENCE_DATE } from './helpers';

const processor = new DocumentProcessor();
const lease = processor.processRuleBased({
  document_id: 'doc-1',
  filename: 'lease.pdf',
  text: LEASE_TEXT,
  referenceDate: REFERENCE_DATE,
});
const summons = processor.processRuleBased({
  document_id: 'doc-2',
  filename: 'summons.pdf',
  text: SUMMONS_TEXT,
  referenceDate: REFERENCE_DATE,
});

describe('form fields contract', () => {
  it('accepts mapped fields', () => {
    expect(validateFormFields(lease.fields)).toEqual({ valid: true });
    expect(validateFormFields(summons.fields)).toEqual({ valid: true });
  });

  it('reports missing properties', () => {
    const { fields: _fields, ...withoutFields } = lease.fields;

    expect(validateFormFields(withoutFields)).toEqual({
      valid: false,
      errors: ["/: must have required property 'fields'"],
    });
  });

  it('rejects an unknown confidence tier', () => {
    const broken = {
      ...lease.fields,
      fields: { ...lease.fields.fields, county: { ...lease.fields.fields.county, confidence: 'certain' } },
    };

    const result = validateFormFields(broken);
    expect(result.valid).toBe(false);
    expect(result.errors).toContain('/fields/county/confidence: must be equal to one of the allowed values');
  });
});

describe('case data contract', () => {
  it('accepts an aggregated case', () => {
    expect(validateCaseData(aggregate([summons, lease], { userId: 'user-1' }))).toEqual({ valid: true });
    expect(validateCaseData(aggregate([]))).toEqual({ valid: true });
  });

  it('rejects an out-of-range confidence score', () => {
    const data = { ...aggregate([lease]), confidence_score: 1.5 };

    expect(validateCaseData(data)).toEqual({ valid: false, errors: ['/confidence_score: must be <= 1'] });
  });
});

describe('assertValid', () => {
  it('passes valid results through', () => {
    expect(() => assertValid('caseData', { valid: true })).not.toThrow();
  });

  it('throws a contract error naming the contract', () => {
    let caught: unknown;
    try {
      assertValid('formFields', { valid: false, errors: ['/: must be object'] });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ContractValidationError);
    if (caught instanceof ContractValidationError) {
      expect(caught.contract).toBe('formFields');
      expect(caught.errors).toEqual(['/: must be object']);
      expect(caught.message).toBe('formFields failed contract validation: /: must be object');
    }
  });
});

describe('assist response contract', () => {
  it('fills defaults in place', () => {
    const payload = { doc_type: 'lease' };

    expect(validateAssistResponse(payload)).toEqual({
      doc_type: 'lease',
      confidence: 0.5,
      title: 'Document',
      summary: '',
      key_dates: [],
      key_parties: [],
      key_amounts: [],
      key_terms: [],
    });
  });

  it('returns null for a non-object payload', () => {
    expect(validateAssistResponse('lease')).toBeNull();
  });
});
