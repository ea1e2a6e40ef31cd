/**
 * Shared TypeScript Types
 *
 * Types for the tenant document recognition pipeline, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Document Classification
// ============================================================================

export const DOCUMENT_CATEGORIES = [
  'court',
  'landlord',
  'financial',
  'evidence',
  'communication',
  'other',
] as const;

export type DocumentCategory = (typeof DOCUMENT_CATEGORIES)[number];

/** Listed in tie-break priority order: court, then landlord, financial, evidence, communication, other. */
export const DOCUMENT_TYPES = [
  // Court
  'summons',
  'complaint',
  'eviction_filing',
  'writ',
  'judgment',
  'court_order',
  'motion',
  'answer',
  'affidavit',
  // Landlord
  'eviction_notice',
  'notice_to_quit',
  'lease_violation',
  'rent_increase',
  'late_notice',
  'non_renewal',
  'entry_notice',
  'lease',
  // Financial
  'receipt',
  'ledger',
  'deposit_statement',
  // Evidence
  'inspection',
  'repair_request',
  // Communication
  'letter',
  'email',
  // Other
  'unknown',
] as const;

export type DocumentType = (typeof DOCUMENT_TYPES)[number];

export type UrgencyLevel = 'critical' | 'high' | 'medium' | 'normal' | 'low';

export interface Classification {
  category: DocumentCategory;
  type: DocumentType;
  confidence: number;
  title: string;
  summary: string;
  urgency: UrgencyLevel;
  reasoning_chain: string[];
  key_terms: string[];
  case_numbers: string[];
  has_deadline: boolean;
  deadline_date: string | null;
  days_to_respond: number | null;
  signals_count: number;
}

// ============================================================================
// Entities
// ============================================================================

export type EntityKind =
  | 'date'
  | 'amount'
  | 'party'
  | 'address'
  | 'case_number'
  | 'statute'
  | 'phone'
  | 'email';

export interface TextPosition {
  start: number;
  end: number;
}

interface EntityBase {
  context_label: string;
  source_text: string;
  position: TextPosition;
  /** Id of the pattern rule that produced the entity */
  rule: string;
}

export interface DateEntity extends EntityBase {
  kind: 'date';
  /** ISO calendar date, YYYY-MM-DD */
  value: string;
}

export interface AmountEntity extends EntityBase {
  kind: 'amount';
  value: number;
}

export type PartyRole = 'tenant' | 'landlord' | 'attorney' | 'property_manager';

export interface PartyEntity extends EntityBase {
  kind: 'party';
  value: string;
  role: PartyRole;
}

export interface AddressComponents {
  street: string;
  unit: string | null;
  city: string | null;
  state: string;
  zip: string | null;
  state_defaulted: boolean;
}

export interface AddressEntity extends EntityBase {
  kind: 'address';
  value: string;
  components: AddressComponents;
}

export interface TextEntity extends EntityBase {
  kind: 'case_number' | 'statute' | 'phone' | 'email';
  value: string;
}

export type ExtractedEntity = DateEntity | AmountEntity | PartyEntity | AddressEntity | TextEntity;

// ============================================================================
// Form Fields
// ============================================================================

export type ConfidenceTier = 'high' | 'medium' | 'low' | 'guess' | 'empty';

export type FieldCategory = 'case' | 'tenant' | 'landlord' | 'property' | 'lease' | 'dates' | 'amounts';

export type FieldName =
  // Case
  | 'case_number'
  | 'court_name'
  | 'county'
  | 'judicial_district'
  // Tenant
  | 'tenant_name'
  | 'tenant_address'
  | 'tenant_city'
  | 'tenant_state'
  | 'tenant_zip'
  | 'tenant_phone'
  | 'tenant_email'
  // Landlord
  | 'landlord_name'
  | 'landlord_address'
  | 'landlord_city'
  | 'landlord_state'
  | 'landlord_zip'
  | 'landlord_phone'
  | 'landlord_email'
  // Property
  | 'property_address'
  | 'property_city'
  | 'property_state'
  | 'property_zip'
  | 'unit_number'
  // Lease
  | 'lease_start_date'
  | 'lease_end_date'
  | 'monthly_rent'
  | 'security_deposit'
  | 'lease_type'
  // Dates
  | 'notice_date'
  | 'notice_type'
  | 'summons_date'
  | 'service_date'
  | 'answer_deadline'
  | 'hearing_date'
  | 'hearing_time'
  // Amounts
  | 'rent_claimed'
  | 'late_fees_claimed'
  | 'other_fees_claimed'
  | 'total_claimed';

export type FieldValue = string | number;

export interface ExtractedField {
  field_name: FieldName;
  display_name: string;
  value: FieldValue | null;
  confidence: ConfidenceTier;
  source: string;
  source_text: string;
  alternatives: FieldValue[];
  needs_review: boolean;
  review_reason: string;
}

export interface FormFieldsExtraction {
  field_set_version: string;
  document_type: DocumentType;
  fields: Record<FieldName, ExtractedField>;
  overall_confidence: number;
  fields_needing_review: number;
}

// ============================================================================
// Case Aggregation
// ============================================================================

/** One processed document as handed to the aggregator, in caller-supplied order. */
export interface CaseDocument {
  document_id: string;
  filename: string;
  classification: Classification;
  entities: ExtractedEntity[];
  fields: FormFieldsExtraction;
}

export interface CaseParty {
  name: string;
  role: string;
  document_id: string;
}

export interface CaseDate {
  date: string;
  label: string;
  document_id: string;
}

export interface CaseAmount {
  amount: number;
  label: string;
  document_id: string;
}

export interface CaseData {
  user_id: string | null;
  case_numbers: string[];
  primary_case_number: string | null;

  tenant_name: string | null;
  tenant_address: string | null;
  landlord_name: string | null;
  landlord_address: string | null;
  all_parties: CaseParty[];

  hearing_date: string | null;
  hearing_time: string | null;
  notice_date: string | null;
  answer_deadline: string | null;
  lease_start: string | null;
  lease_end: string | null;
  all_dates: CaseDate[];

  rent_amount: number | null;
  rent_claimed: number | null;
  deposit_amount: number | null;
  late_fees: number | null;
  damages_claimed: number | null;
  total_claimed: number | null;
  all_amounts: CaseAmount[];

  property_address: string | null;
  unit_number: string | null;

  matched_statutes: string[];

  document_count: number;
  documents_by_type: Record<string, number>;
  urgency_level: UrgencyLevel | null;
  confidence_score: number;
}
