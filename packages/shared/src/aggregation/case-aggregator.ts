/**
 * Case Aggregator
 *
 * Folds a user's processed documents into one CaseData record. Scalars are
 * first-non-empty-wins in the order the caller supplies the documents; the
 * losing values stay visible in the all_* lists. Pure and idempotent.
 */

import { URGENCY_SEVERITY } from '../patterns/document-types';
import type {
  CaseAmount,
  CaseData,
  CaseDate,
  CaseDocument,
  CaseParty,
  ExtractedField,
  FieldName,
  UrgencyLevel,
} from '../types';

export interface AggregateOptions {
  userId?: string | null;
}

type TextScalar =
  | 'tenant_name'
  | 'tenant_address'
  | 'landlord_name'
  | 'landlord_address'
  | 'property_address'
  | 'unit_number'
  | 'hearing_date'
  | 'hearing_time'
  | 'notice_date'
  | 'answer_deadline'
  | 'lease_start'
  | 'lease_end';

type AmountBucket =
  | 'rent_amount'
  | 'rent_claimed'
  | 'deposit_amount'
  | 'late_fees'
  | 'damages_claimed'
  | 'total_claimed';

/** CaseData scalar and the form field it is read from. */
const TEXT_SCALAR_SOURCES: ReadonlyArray<[TextScalar, FieldName]> = [
  ['tenant_name', 'tenant_name'],
  ['tenant_address', 'tenant_address'],
  ['landlord_name', 'landlord_name'],
  ['landlord_address', 'landlord_address'],
  ['property_address', 'property_address'],
  ['unit_number', 'unit_number'],
  ['hearing_date', 'hearing_date'],
  ['hearing_time', 'hearing_time'],
  ['notice_date', 'notice_date'],
  ['answer_deadline', 'answer_deadline'],
  ['lease_start', 'lease_start_date'],
  ['lease_end', 'lease_end_date'],
];

/** Ordered: the first bucket whose keyword appears in the field name or label takes the amount. */
export const AMOUNT_BUCKET_RULES: ReadonlyArray<{ bucket: AmountBucket; keywords: readonly string[] }> = [
  { bucket: 'rent_claimed', keywords: ['rent_claimed', 'rent claimed'] },
  { bucket: 'late_fees', keywords: ['late_fee', 'late fee'] },
  { bucket: 'deposit_amount', keywords: ['deposit'] },
  { bucket: 'damages_claimed', keywords: ['damage', 'other_fees', 'legal costs'] },
  { bucket: 'total_claimed', keywords: ['total', 'judgment'] },
  { bucket: 'rent_amount', keywords: ['rent'] },
];

const PARTY_FIELDS: ReadonlyArray<[FieldName, string]> = [
  ['tenant_name', 'tenant'],
  ['landlord_name', 'landlord'],
];

const DATE_FIELDS: readonly FieldName[] = [
  'lease_start_date',
  'lease_end_date',
  'notice_date',
  'summons_date',
  'service_date',
  'answer_deadline',
  'hearing_date',
];

const AMOUNT_FIELDS: readonly FieldName[] = [
  'monthly_rent',
  'security_deposit',
  'rent_claimed',
  'late_fees_claimed',
  'other_fees_claimed',
  'total_claimed',
];

export function bucketForAmount(key: string): AmountBucket | null {
  const lower = key.toLowerCase();
  const rule = AMOUNT_BUCKET_RULES.find((candidate) => candidate.keywords.some((keyword) => lower.includes(keyword)));
  return rule ? rule.bucket : null;
}

/** Keeps first-seen order and drops repeats of the same key. */
class UniqueList<T> {
  private readonly keys = new Set<string>();
  readonly items: T[] = [];

  constructor(private readonly keyOf: (item: T) => string) {}

  add(item: T): void {
    const key = this.keyOf(item);
    if (!this.keys.has(key)) {
      this.keys.add(key);
      this.items.push(item);
    }
  }
}

function stringValue(field: ExtractedField): string | null {
  return typeof field.value === 'string' && field.value.length > 0 ? field.value : null;
}

function numberValue(field: ExtractedField): number | null {
  return typeof field.value === 'number' ? field.value : null;
}

function mostSevere(levels: readonly UrgencyLevel[]): UrgencyLevel | null {
  return levels.reduce<UrgencyLevel | null>(
    (worst, level) => (worst === null || URGENCY_SEVERITY[level] > URGENCY_SEVERITY[worst] ? level : worst),
    null
  );
}

export function aggregate(documents: readonly CaseDocument[], options: AggregateOptions = {}): CaseData {
  const scalars = new Map<TextScalar, string>();
  const amounts = new Map<AmountBucket, number>();
  const caseNumbers = new UniqueList<string>((value) => value);
  const parties = new UniqueList<CaseParty>((party) => `${party.name}\u0000${party.role}`);
  const dates = new UniqueList<CaseDate>((date) => `${date.date}\u0000${date.label}`);
  const allAmounts = new UniqueList<CaseAmount>((amount) => `${amount.amount}\u0000${amount.label}`);
  const statutes = new Set<string>();
  const documentsByType: Record<string, number> = {};

  const offerAmount = (key: string, value: number): void => {
    const bucket = bucketForAmount(key);
    if (bucket && !amounts.has(bucket)) {
      amounts.set(bucket, value);
    }
  };

  for (const document of documents) {
    const { fields, classification, entities, document_id: documentId } = document;

    documentsByType[classification.type] = (documentsByType[classification.type] ?? 0) + 1;

    for (const [scalar, fieldName] of TEXT_SCALAR_SOURCES) {
      const value = stringValue(fields.fields[fieldName]);
      if (value !== null && !scalars.has(scalar)) {
        scalars.set(scalar, value);
      }
    }

    const fieldCaseNumber = stringValue(fields.fields.case_number);
    if (fieldCaseNumber !== null) {
      caseNumbers.add(fieldCaseNumber);
    }
    classification.case_numbers.forEach((value) => caseNumbers.add(value));

    for (const [fieldName, role] of PARTY_FIELDS) {
      const name = stringValue(fields.fields[fieldName]);
      if (name !== null) {
        parties.add({ name, role, document_id: documentId });
      }
    }
    for (const fieldName of DATE_FIELDS) {
      const field = fields.fields[fieldName];
      const date = stringValue(field);
      if (date !== null) {
        dates.add({ date, label: field.display_name, document_id: documentId });
      }
    }
    for (const fieldName of AMOUNT_FIELDS) {
      const field = fields.fields[fieldName];
      const amount = numberValue(field);
      if (amount !== null) {
        offerAmount(fieldName, amount);
        allAmounts.add({ amount, label: field.display_name, document_id: documentId });
      }
    }

    for (const entity of entities) {
      switch (entity.kind) {
        case 'party':
          parties.add({ name: entity.value, role: entity.role, document_id: documentId });
          break;
        case 'date':
          dates.add({ date: entity.value, label: entity.context_label, document_id: documentId });
          break;
        case 'amount':
          offerAmount(entity.context_label, entity.value);
          allAmounts.add({ amount: entity.value, label: entity.context_label, document_id: documentId });
          break;
        case 'case_number':
          caseNumbers.add(entity.value);
          break;
        case 'statute':
          statutes.add(entity.value);
          break;
        default:
          break;
      }
    }
  }

  const confidenceScore =
    documents.length === 0
      ? 0
      : Math.round(
          (documents.reduce((sum, document) => sum + document.fields.overall_confidence, 0) / documents.length) * 1000
        ) / 1000;

  return {
    user_id: options.userId ?? null,
    case_numbers: caseNumbers.items,
    primary_case_number: caseNumbers.items[0] ?? null,

    tenant_name: scalars.get('tenant_name') ?? null,
    tenant_address: scalars.get('tenant_address') ?? null,
    landlord_name: scalars.get('landlord_name') ?? null,
    landlord_address: scalars.get('landlord_address') ?? null,
    all_parties: parties.items,

    hearing_date: scalars.get('hearing_date') ?? null,
    hearing_time: scalars.get('hearing_time') ?? null,
    notice_date: scalars.get('notice_date') ?? null,
    answer_deadline: scalars.get('answer_deadline') ?? null,
    lease_start: scalars.get('lease_start') ?? null,
    lease_end: scalars.get('lease_end') ?? null,
    all_dates: dates.items,

    rent_amount: amounts.get('rent_amount') ?? null,
    rent_claimed: amounts.get('rent_claimed') ?? null,
    deposit_amount: amounts.get('deposit_amount') ?? null,
    late_fees: amounts.get('late_fees') ?? null,
    damages_claimed: amounts.get('damages_claimed') ?? null,
    total_claimed: amounts.get('total_claimed') ?? null,
    all_amounts: allAmounts.items,

    property_address: scalars.get('property_address') ?? null,
    unit_number: scalars.get('unit_number') ?? null,

    matched_statutes: Array.from(statutes).sort(),

    document_count: documents.length,
    documents_by_type: documentsByType,
    urgency_level: mostSevere(documents.map((document) => document.classification.urgency)),
    confidence_score: confidenceScore,
  };
}
