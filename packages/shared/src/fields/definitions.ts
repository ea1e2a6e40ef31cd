/**
 * Form field definitions
 *
 * Every field the legal forms need, in form order, with where its value
 * comes from. Bump FIELD_SET_VERSION whenever a field, a source or the
 * confidence field list changes.
 */

import type { AddressComponents, ConfidenceTier, EntityKind, FieldCategory, FieldName } from '../types';

export const FIELD_SET_VERSION = '1.0.0';

/** Entities whose context_label is one of `labels`; the first group with a match wins. */
export interface MatcherGroup {
  labels: readonly string[];
  tier: ConfidenceTier;
}

export interface TextRule {
  id: string;
  pattern: RegExp;
  tier: ConfidenceTier;
  /** Turns the match into the field value; defaults to capture group 1 */
  format?: (match: RegExpExecArray) => string;
}

export type FieldSource =
  | { kind: 'entity'; entity: EntityKind; groups: readonly MatcherGroup[] }
  | {
      kind: 'component';
      component: Exclude<keyof AddressComponents, 'state_defaulted'>;
      groups: readonly MatcherGroup[];
    }
  | { kind: 'text'; rules: readonly TextRule[] };

export interface FieldDefinition {
  name: FieldName;
  displayName: string;
  category: FieldCategory;
  source: FieldSource;
}

export const TIER_WEIGHTS: Readonly<Record<ConfidenceTier, number>> = {
  high: 1.0,
  medium: 0.75,
  low: 0.5,
  guess: 0.25,
  empty: 0,
};

const ORDINALS = ['first', 'second', 'third', 'fourth', 'fifth', 'sixth', 'seventh', 'eighth', 'ninth', 'tenth'];

export function titleCase(value: string): string {
  return value
    .toLowerCase()
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/** "4th" and "FOURTH" both become "Fourth Judicial District". */
function formatJudicialDistrict(match: RegExpExecArray): string {
  const raw = (match[1] ?? '').toLowerCase();
  const numeric = parseInt(raw, 10);
  const ordinal = Number.isNaN(numeric) ? raw : ORDINALS[numeric - 1] ?? raw;
  return `${titleCase(ordinal)} Judicial District`;
}

/** "9:00 a.m." becomes "9:00 AM". */
function formatTime(match: RegExpExecArray): string {
  const [, clock = '', meridiem = ''] = match;
  return `${clock} ${meridiem.replace(/\./g, '').toUpperCase()}`;
}

const fromGroup = (match: RegExpExecArray): string => titleCase(match[1] ?? '');

// Exact context labels produced by the extractors
const JURISDICTION_CASE_LABELS = [
  'Case Number (Dakota County)',
  'Case Number (Hennepin Housing Court)',
  'Case Number (Minnesota District Court)',
];
const GENERIC_CASE_LABELS = ['Case Number', 'Case Number (Civil)'];

const TENANT_ADDRESS_GROUPS: readonly MatcherGroup[] = [
  { labels: ['Tenant Address'], tier: 'medium' },
  { labels: ['Property Address'], tier: 'low' },
];
const LANDLORD_ADDRESS_GROUPS: readonly MatcherGroup[] = [{ labels: ['Landlord Address'], tier: 'medium' }];
const PROPERTY_ADDRESS_GROUPS: readonly MatcherGroup[] = [
  { labels: ['Property Address'], tier: 'medium' },
  { labels: ['Address'], tier: 'guess' },
];

function addressFields(
  prefix: 'tenant' | 'landlord' | 'property',
  displayPrefix: string,
  category: FieldCategory,
  groups: readonly MatcherGroup[]
): FieldDefinition[] {
  return [
    {
      name: `${prefix}_address`,
      displayName: `${displayPrefix} Address`,
      category,
      source: { kind: 'entity', entity: 'address', groups },
    },
    {
      name: `${prefix}_city`,
      displayName: `${displayPrefix} City`,
      category,
      source: { kind: 'component', component: 'city', groups },
    },
    {
      name: `${prefix}_state`,
      displayName: `${displayPrefix} State`,
      category,
      source: { kind: 'component', component: 'state', groups },
    },
    {
      name: `${prefix}_zip`,
      displayName: `${displayPrefix} ZIP Code`,
      category,
      source: { kind: 'component', component: 'zip', groups },
    },
  ];
}

export const FIELD_DEFINITIONS: readonly FieldDefinition[] = [
  // Case
  {
    name: 'case_number',
    displayName: 'Case Number',
    category: 'case',
    source: {
      kind: 'entity',
      entity: 'case_number',
      groups: [
        { labels: JURISDICTION_CASE_LABELS, tier: 'high' },
        { labels: GENERIC_CASE_LABELS, tier: 'medium' },
      ],
    },
  },
  {
    name: 'court_name',
    displayName: 'Court Name',
    category: 'case',
    source: {
      kind: 'text',
      rules: [
        {
          id: 'county_court',
          pattern: /\b([A-Za-z]+ County (?:District|Housing|Conciliation) Court)\b/i,
          tier: 'medium',
          format: fromGroup,
        },
        {
          id: 'court_line',
          pattern: /\b((?:District|Housing|Conciliation) Court)\b/i,
          tier: 'low',
          format: fromGroup,
        },
      ],
    },
  },
  {
    name: 'county',
    displayName: 'County',
    category: 'case',
    source: {
      kind: 'text',
      rules: [
        { id: 'county_of_header', pattern: /\bCOUNTY OF ([A-Z][A-Za-z]+)/, tier: 'medium', format: fromGroup },
        { id: 'named_county', pattern: /\b([A-Z][a-z]+) County\b/, tier: 'medium', format: fromGroup },
      ],
    },
  },
  {
    name: 'judicial_district',
    displayName: 'Judicial District',
    category: 'case',
    source: {
      kind: 'text',
      rules: [
        {
          id: 'judicial_district',
          pattern: /\b(first|second|third|fourth|fifth|sixth|seventh|eighth|ninth|tenth|\d{1,2})(?:st|nd|rd|th)?\s+judicial\s+district\b/i,
          tier: 'medium',
          format: formatJudicialDistrict,
        },
      ],
    },
  },

  // Tenant
  {
    name: 'tenant_name',
    displayName: 'Tenant Name',
    category: 'tenant',
    source: { kind: 'entity', entity: 'party', groups: [{ labels: ['Tenant', 'Defendant/Tenant'], tier: 'medium' }] },
  },
  ...addressFields('tenant', 'Tenant', 'tenant', TENANT_ADDRESS_GROUPS),
  {
    name: 'tenant_phone',
    displayName: 'Tenant Phone',
    category: 'tenant',
    source: {
      kind: 'entity',
      entity: 'phone',
      groups: [
        { labels: ['Tenant Phone'], tier: 'medium' },
        { labels: ['Phone'], tier: 'guess' },
      ],
    },
  },
  {
    name: 'tenant_email',
    displayName: 'Tenant Email',
    category: 'tenant',
    source: {
      kind: 'entity',
      entity: 'email',
      groups: [
        { labels: ['Tenant Email'], tier: 'medium' },
        { labels: ['Email'], tier: 'guess' },
      ],
    },
  },

  // Landlord
  {
    name: 'landlord_name',
    displayName: 'Landlord Name',
    category: 'landlord',
    source: {
      kind: 'entity',
      entity: 'party',
      groups: [{ labels: ['Landlord', 'Plaintiff/Landlord'], tier: 'medium' }],
    },
  },
  ...addressFields('landlord', 'Landlord', 'landlord', LANDLORD_ADDRESS_GROUPS),
  {
    name: 'landlord_phone',
    displayName: 'Landlord Phone',
    category: 'landlord',
    source: { kind: 'entity', entity: 'phone', groups: [{ labels: ['Landlord Phone'], tier: 'medium' }] },
  },
  {
    name: 'landlord_email',
    displayName: 'Landlord Email',
    category: 'landlord',
    source: { kind: 'entity', entity: 'email', groups: [{ labels: ['Landlord Email'], tier: 'medium' }] },
  },

  // Property
  ...addressFields('property', 'Property', 'property', PROPERTY_ADDRESS_GROUPS),
  {
    name: 'unit_number',
    displayName: 'Unit Number',
    category: 'property',
    source: { kind: 'component', component: 'unit', groups: PROPERTY_ADDRESS_GROUPS },
  },

  // Lease
  {
    name: 'lease_start_date',
    displayName: 'Lease Start Date',
    category: 'lease',
    source: { kind: 'entity', entity: 'date', groups: [{ labels: ['Lease Start Date'], tier: 'medium' }] },
  },
  {
    name: 'lease_end_date',
    displayName: 'Lease End Date',
    category: 'lease',
    source: { kind: 'entity', entity: 'date', groups: [{ labels: ['Lease End Date'], tier: 'medium' }] },
  },
  {
    name: 'monthly_rent',
    displayName: 'Monthly Rent',
    category: 'lease',
    source: { kind: 'entity', entity: 'amount', groups: [{ labels: ['Monthly Rent'], tier: 'medium' }] },
  },
  {
    name: 'security_deposit',
    displayName: 'Security Deposit',
    category: 'lease',
    source: { kind: 'entity', entity: 'amount', groups: [{ labels: ['Security Deposit'], tier: 'medium' }] },
  },
  {
    name: 'lease_type',
    displayName: 'Lease Type',
    category: 'lease',
    source: {
      kind: 'text',
      rules: [
        { id: 'month_to_month', pattern: /\bmonth[- ]to[- ]month\b/i, tier: 'medium', format: () => 'month-to-month' },
        { id: 'fixed_term', pattern: /\bfixed[- ]term\b/i, tier: 'medium', format: () => 'fixed-term' },
        { id: 'lease_term', pattern: /\b(?:term of (?:the )?lease|lease term)\b/i, tier: 'low', format: () => 'fixed-term' },
      ],
    },
  },

  // Dates
  {
    name: 'notice_date',
    displayName: 'Notice Date',
    category: 'dates',
    source: { kind: 'entity', entity: 'date', groups: [{ labels: ['Notice Date'], tier: 'medium' }] },
  },
  {
    name: 'notice_type',
    displayName: 'Notice Type',
    category: 'dates',
    source: {
      kind: 'text',
      rules: [
        {
          id: 'day_notice',
          pattern: /\b(\d{1,2})[-\s]day\s+notice\b/i,
          tier: 'medium',
          format: (match) => `${match[1] ?? ''}-day`,
        },
      ],
    },
  },
  {
    name: 'summons_date',
    displayName: 'Summons Date',
    category: 'dates',
    source: {
      kind: 'entity',
      entity: 'date',
      groups: [
        { labels: ['Summons Date'], tier: 'medium' },
        { labels: ['Filing Date'], tier: 'low' },
      ],
    },
  },
  {
    name: 'service_date',
    displayName: 'Service Date',
    category: 'dates',
    source: { kind: 'entity', entity: 'date', groups: [{ labels: ['Service Date'], tier: 'medium' }] },
  },
  {
    name: 'answer_deadline',
    displayName: 'Answer Deadline',
    category: 'dates',
    source: { kind: 'entity', entity: 'date', groups: [{ labels: ['Answer Deadline'], tier: 'high' }] },
  },
  {
    name: 'hearing_date',
    displayName: 'Hearing Date',
    category: 'dates',
    source: { kind: 'entity', entity: 'date', groups: [{ labels: ['Hearing Date'], tier: 'high' }] },
  },
  {
    name: 'hearing_time',
    displayName: 'Hearing Time',
    category: 'dates',
    source: {
      kind: 'text',
      rules: [
        {
          id: 'hearing_clock',
          pattern: /\bhearing\b[^\n]{0,80}?\b(\d{1,2}:\d{2})\s*([AaPp]\.?[Mm]\.?)/i,
          tier: 'medium',
          format: formatTime,
        },
        {
          id: 'any_clock',
          pattern: /\b(\d{1,2}:\d{2})\s*([AaPp]\.?[Mm]\.?)/,
          tier: 'low',
          format: formatTime,
        },
      ],
    },
  },

  // Amounts
  {
    name: 'rent_claimed',
    displayName: 'Rent Claimed',
    category: 'amounts',
    source: {
      kind: 'entity',
      entity: 'amount',
      groups: [
        { labels: ['Rent Claimed'], tier: 'medium' },
        { labels: ['Amount Due'], tier: 'low' },
      ],
    },
  },
  {
    name: 'late_fees_claimed',
    displayName: 'Late Fees Claimed',
    category: 'amounts',
    source: { kind: 'entity', entity: 'amount', groups: [{ labels: ['Late Fee'], tier: 'medium' }] },
  },
  {
    name: 'other_fees_claimed',
    displayName: 'Other Fees Claimed',
    category: 'amounts',
    source: { kind: 'entity', entity: 'amount', groups: [{ labels: ['Legal Costs', 'Damages'], tier: 'medium' }] },
  },
  {
    name: 'total_claimed',
    displayName: 'Total Claimed',
    category: 'amounts',
    source: {
      kind: 'entity',
      entity: 'amount',
      groups: [{ labels: ['Total Due', 'Judgment Amount'], tier: 'medium' }],
    },
  },
];

/** Fields that make up overall_confidence. */
export const CONFIDENCE_FIELDS: readonly FieldName[] = [
  'case_number',
  'tenant_name',
  'landlord_name',
  'property_address',
  'property_city',
  'property_zip',
  'monthly_rent',
  'security_deposit',
  'lease_start_date',
  'notice_date',
  'answer_deadline',
  'hearing_date',
  'rent_claimed',
  'total_claimed',
];

/** Notice period implied by the document type when the text names none. */
export const NOTICE_TYPE_BY_DOCUMENT: Readonly<Partial<Record<string, string>>> = {
  notice_to_quit: '14-day',
  late_notice: '14-day',
  lease_violation: '14-day',
  non_renewal: '30-day',
};

/** Metro-area counties and their judicial districts. */
export const COUNTY_JUDICIAL_DISTRICTS: Readonly<Partial<Record<string, string>>> = {
  Dakota: 'First Judicial District',
  Scott: 'First Judicial District',
  Carver: 'First Judicial District',
  Ramsey: 'Second Judicial District',
  Hennepin: 'Fourth Judicial District',
  Washington: 'Tenth Judicial District',
  Anoka: 'Tenth Judicial District',
};

export function getFieldDefinition(name: FieldName): FieldDefinition | undefined {
  return FIELD_DEFINITIONS.find((definition) => definition.name === name);
}
