/**
 * Entity patterns
 *
 * Ordered rule tables for each entity kind. Where a kind has several formats
 * or roles, the first rule in the table wins.
 */

import cityData from '../../data/mn-cities.json';
import type { PartyRole } from '../types';

export interface LabelRule {
  label: string;
  keywords: readonly string[];
}

/** First rule with a keyword present in the context wins. */
export function matchLabel(rules: readonly LabelRule[], context: string): LabelRule | undefined {
  const lower = context.toLowerCase();
  return rules.find((rule) => rule.keywords.some((keyword) => lower.includes(keyword)));
}

// ============================================================================
// Dates
// ============================================================================

export interface CalendarParts {
  year: number;
  month: number;
  day: number;
}

export interface DatePatternRule {
  id: string;
  pattern: RegExp;
  parse: (match: RegExpMatchArray) => CalendarParts;
}

const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
] as const;

const MONTH_ABBREVIATIONS: Readonly<Record<string, number>> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  sept: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

const MONTHS = 'January|February|March|April|May|June|July|August|September|October|November|December';
const MONTH_ABBR = 'Jan|Feb|Mar|Apr|Jun|Jul|Aug|Sept|Sep|Oct|Nov|Dec';

function monthFromName(name: string): number {
  const lower = name.toLowerCase();
  const index = MONTH_NAMES.findIndex((month) => month === lower);
  return index >= 0 ? index + 1 : MONTH_ABBREVIATIONS[lower] ?? 0;
}

function num(value: string | undefined): number {
  return value === undefined ? NaN : parseInt(value, 10);
}

export const DATE_PATTERNS: readonly DatePatternRule[] = [
  {
    id: 'month_day_year',
    pattern: new RegExp(`\\b(${MONTHS})\\s+(\\d{1,2})(?:st|nd|rd|th)?,?\\s+(\\d{4})\\b`, 'gi'),
    parse: (m) => ({ year: num(m[3]), month: monthFromName(m[1] ?? ''), day: num(m[2]) }),
  },
  {
    id: 'abbreviated_month',
    pattern: new RegExp(`\\b(${MONTH_ABBR})\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?,?\\s+(\\d{4})\\b`, 'gi'),
    parse: (m) => ({ year: num(m[3]), month: monthFromName(m[1] ?? ''), day: num(m[2]) }),
  },
  {
    id: 'day_month_year',
    pattern: new RegExp(`\\b(\\d{1,2})\\s+(${MONTHS})\\s+(\\d{4})\\b`, 'gi'),
    parse: (m) => ({ year: num(m[3]), month: monthFromName(m[2] ?? ''), day: num(m[1]) }),
  },
  {
    id: 'slash',
    pattern: /\b(\d{1,2})\/(\d{1,2})\/(\d{4})\b/g,
    parse: (m) => ({ year: num(m[3]), month: num(m[1]), day: num(m[2]) }),
  },
  {
    id: 'dash',
    pattern: /\b(\d{1,2})-(\d{1,2})-(\d{4})\b/g,
    parse: (m) => ({ year: num(m[3]), month: num(m[1]), day: num(m[2]) }),
  },
  {
    id: 'iso',
    pattern: /\b(\d{4})-(\d{2})-(\d{2})\b/g,
    parse: (m) => ({ year: num(m[1]), month: num(m[2]), day: num(m[3]) }),
  },
];

export const MIN_DATE_YEAR = 1900;
export const MAX_DATE_YEAR = 2100;

export const DATE_CONTEXT_BEFORE = 60;
export const DATE_CONTEXT_AFTER = 25;

/** Ordered: hearing beats summons and service, which beat notice, which beats deadlines and the rest. */
export const DATE_ROLE_RULES: readonly LabelRule[] = [
  { label: 'Hearing Date', keywords: ['hearing', 'court date', 'appear', 'trial'] },
  { label: 'Summons Date', keywords: ['summons'] },
  { label: 'Service Date', keywords: ['served', 'service'] },
  { label: 'Notice Date', keywords: ['notice', 'notified', 'vacate', 'quit', 'evict'] },
  { label: 'Answer Deadline', keywords: ['deadline', 'answer', 'respond', 'response', 'must'] },
  { label: 'Filing Date', keywords: ['filed', 'filing'] },
  { label: 'Judgment Date', keywords: ['judgment', 'judgement'] },
  { label: 'Lease Start Date', keywords: ['begins', 'beginning', 'commenc', 'start', 'move-in', 'move in'] },
  { label: 'Lease End Date', keywords: ['ends', 'ending', 'expire', 'terminat', 'move-out', 'move out'] },
  { label: 'Payment Due Date', keywords: ['due', 'payable'] },
  { label: 'Document Date', keywords: ['dated', 'signed', 'date:'] },
];

export const DEFAULT_DATE_LABEL = 'Date Referenced';

// ============================================================================
// Amounts
// ============================================================================

export interface AmountPatternRule {
  id: string;
  pattern: RegExp;
}

export const AMOUNT_PATTERNS: readonly AmountPatternRule[] = [
  { id: 'dollar_sign', pattern: /\$\s?(\d{1,3}(?:,\d{3})+|\d+)(\.\d{1,2})?/g },
  { id: 'dollar_words', pattern: /\b(\d{1,3}(?:,\d{3})+|\d+)(\.\d{2})?\s*(?:dollars?|USD)\b/gi },
];

export interface AmountRoleRule extends LabelRule {
  min: number;
  max: number;
}

const ANY_AMOUNT = { min: 0.01, max: 10_000_000 };

export const AMOUNT_ROLE_RULES: readonly AmountRoleRule[] = [
  { label: 'Judgment Amount', keywords: ['judgment', 'judgement', 'awarded', 'adjudged'], ...ANY_AMOUNT },
  { label: 'Total Due', keywords: ['total'], ...ANY_AMOUNT },
  { label: 'Late Fee', keywords: ['late fee', 'late charge', 'late payment fee'], ...ANY_AMOUNT },
  { label: 'Security Deposit', keywords: ['security deposit', 'deposit'], min: 100, max: 10_000 },
  {
    label: 'Rent Claimed',
    keywords: ['unpaid rent', 'past due rent', 'past-due rent', 'rent owed', 'back rent', 'rent due', 'rent arrears', 'rent claimed'],
    min: 200,
    max: 10_000,
  },
  {
    label: 'Monthly Rent',
    keywords: ['monthly rent', 'rent:', 'rent of', 'rent is', 'per month', 'a month', '/month'],
    min: 200,
    max: 10_000,
  },
  { label: 'Damages', keywords: ['damage', 'repair', 'cleaning'], ...ANY_AMOUNT },
  { label: 'Legal Costs', keywords: ['attorney', 'court cost', 'filing fee', 'disbursements'], ...ANY_AMOUNT },
  { label: 'Amount Due', keywords: ['due', 'owed', 'owe', 'balance', 'arrears'], ...ANY_AMOUNT },
  { label: 'Payment Amount', keywords: ['paid', 'payment', 'received'], ...ANY_AMOUNT },
];

export const DEFAULT_AMOUNT_ROLE: AmountRoleRule = { label: 'Amount', keywords: [], ...ANY_AMOUNT };

export const AMOUNT_CONTEXT_BEFORE = 40;
export const AMOUNT_CONTEXT_AFTER = 15;

// ============================================================================
// Parties
// ============================================================================

export interface PartyPatternRule {
  id: string;
  role: PartyRole;
  label: string;
  pattern: RegExp;
}

/** Both capitalizations of each label word, e.g. Tenant|TENANT. */
function labelAlternation(labels: readonly string[]): string {
  return `(?:${labels.flatMap((label) => [label, label.toUpperCase()]).join('|')})`;
}

const PERSON_NAME = "[A-Z][A-Za-z.'\\-]*(?:[ \\t]+[A-Z][A-Za-z.'\\-]*)*";

const ENTITY_SUFFIX =
  '(?:LLC|L\\.L\\.C\\.|Inc\\.?|INC\\.?|Corp\\.?|CORP\\.?|Corporation|Company|Co\\.|Properties|PROPERTIES|Management|MANAGEMENT|Realty|REALTY|Apartments|APARTMENTS|Holdings|HOLDINGS|LLP|LP)';

const BUSINESS_NAME = `[A-Z][A-Za-z0-9&'.\\-]*(?:[ \\t]+[A-Za-z0-9&'.\\-]+)*?,?[ \\t]+${ENTITY_SUFFIX}(?:,?[ \\t]+${ENTITY_SUFFIX})*(?![A-Za-z])`;

const TENANT_LABELS = labelAlternation(['Defendant', 'Tenant', 'Lessee', 'Renter', 'Respondent']);
const LANDLORD_LABELS = labelAlternation(['Landlord', 'Lessor', 'Plaintiff', 'Owner', 'Petitioner']);
const VERSUS = '(?:v|vs|V|VS)\\.';

/** Ordered per role: labels, then v./vs. position, then caption style. */
export const PARTY_RULES: readonly PartyPatternRule[] = [
  {
    id: 'tenant_label',
    role: 'tenant',
    label: 'Tenant',
    pattern: new RegExp(`${TENANT_LABELS}s?(?:\\(s\\))?[ \\t]*:[ \\t]*(${PERSON_NAME})`, 'g'),
  },
  {
    id: 'tenant_versus',
    role: 'tenant',
    label: 'Defendant/Tenant',
    pattern: new RegExp(`\\b${VERSUS}[ \\t]*\\n?[ \\t]*(${PERSON_NAME})`, 'g'),
  },
  {
    id: 'tenant_caption',
    role: 'tenant',
    label: 'Defendant/Tenant',
    pattern: new RegExp(`^[ \\t]*(${PERSON_NAME}),?[ \\t]*\\n?[ \\t]*(?:Defendants?|DEFENDANTS?)\\b`, 'gm'),
  },
  {
    id: 'landlord_label',
    role: 'landlord',
    label: 'Landlord',
    pattern: new RegExp(`${LANDLORD_LABELS}s?[ \\t]*:[ \\t]*(${BUSINESS_NAME})`, 'g'),
  },
  {
    id: 'landlord_versus',
    role: 'landlord',
    label: 'Plaintiff/Landlord',
    pattern: new RegExp(
      `^[ \\t]*(${BUSINESS_NAME}),?[ \\t]*(?:\\n[ \\t]*)?(?:(?:Plaintiffs?|PLAINTIFFS?),?[ \\t]*\\n?[ \\t]*)?${VERSUS}`,
      'gm'
    ),
  },
  {
    id: 'landlord_caption',
    role: 'landlord',
    label: 'Plaintiff/Landlord',
    pattern: new RegExp(`^[ \\t]*(${BUSINESS_NAME}),?[ \\t]*\\n?[ \\t]*(?:Plaintiffs?|PLAINTIFFS?)\\b`, 'gm'),
  },
  {
    id: 'attorney_label',
    role: 'attorney',
    label: 'Attorney',
    pattern: new RegExp(
      `(?:Attorney|ATTORNEY|Counsel|COUNSEL) (?:for|FOR) (?:Plaintiff|PLAINTIFF|Defendant|DEFENDANT|Landlord|LANDLORD|Tenant|TENANT)[ \\t]*:?[ \\t]*\\n?[ \\t]*(${PERSON_NAME})`,
      'g'
    ),
  },
  {
    id: 'manager_label',
    role: 'property_manager',
    label: 'Property Manager',
    pattern: new RegExp(`${labelAlternation(['Property Manager', 'Manager', 'Agent'])}[ \\t]*:[ \\t]*(${PERSON_NAME})`, 'g'),
  },
];

/** Trailing role words the name patterns may swallow. */
export const PARTY_NAME_TRAILERS = /(?:[ \t,]+(?:Defendants?|Plaintiffs?|Tenants?|Respondents?|Landlords?|DEFENDANTS?|PLAINTIFFS?|TENANTS?))+$/;

export const MIN_PARTY_NAME_LENGTH = 3;
export const MAX_PARTY_NAME_LENGTH = 80;

/** Capitalized words that are never a party name on their own. */
export const NON_NAME_WORDS: ReadonlySet<string> = new Set([
  'the',
  'above',
  'above-named',
  'unknown',
  'all',
  'other',
  'occupants',
  'and',
]);

// ============================================================================
// Addresses
// ============================================================================

const STREET_TYPE_WORDS = [
  'Street',
  'St',
  'Avenue',
  'Ave',
  'Road',
  'Rd',
  'Drive',
  'Dr',
  'Lane',
  'Ln',
  'Court',
  'Ct',
  'Boulevard',
  'Blvd',
  'Way',
  'Circle',
  'Cir',
  'Place',
  'Pl',
  'Parkway',
  'Pkwy',
  'Terrace',
  'Ter',
  'Trail',
  'Trl',
  'Highway',
  'Hwy',
];

const STREET_TYPES = STREET_TYPE_WORDS.flatMap((word) => [word, word.toUpperCase()]).join('|');

const UNIT_MARKERS = 'Apt|APT|Apartment|APARTMENT|Unit|UNIT|Suite|SUITE|Ste|STE|#';

/** Groups: 1 street number, 2 street name words, 3 street type, 4 unit. */
export const STREET_PATTERN = new RegExp(
  `\\b(\\d{1,6})[ \\t]+((?:[A-Z0-9][A-Za-z0-9'.\\-]*[ \\t]+){1,4}?)(${STREET_TYPES})\\.?(?![A-Za-z])` +
    `(?:,?[ \\t]*(?:${UNIT_MARKERS})\\.?[ \\t]*#?([A-Za-z0-9\\-]+))?`,
  'g'
);

/** Street-name words that mean the match is a duration, not an address. */
export const NON_STREET_WORDS = /^(?:days?|months?|years?|weeks?|hours?)$/i;

export const STATE_PATTERN =
  /^,?[ \t]*(Minnesota|MINNESOTA|MN|Wisconsin|WISCONSIN|WI|Iowa|IOWA|IA|North Dakota|ND|South Dakota|SD)(?![A-Za-z])/;

export const STATE_ABBREVIATIONS: Readonly<Record<string, string>> = {
  minnesota: 'MN',
  wisconsin: 'WI',
  iowa: 'IA',
  'north dakota': 'ND',
  'south dakota': 'SD',
};

export const ZIP_PATTERN = /^,?[ \t]*(\d{5}(?:-\d{4})?)(?!\d)/;

/** Known cities, longest first so "St. Louis Park" wins over shorter prefixes. */
export const KNOWN_CITIES: readonly string[] = [...cityData].sort((a, b) => b.length - a.length);

export const ADDRESS_CONTEXT_BEFORE = 50;

export const ADDRESS_ROLE_RULES: readonly LabelRule[] = [
  { label: 'Property Address', keywords: ['property', 'premises', 'located at', 'rental unit', 'unit address'] },
  { label: 'Landlord Address', keywords: ['landlord', 'owner', 'plaintiff', 'remit', 'mail payment', 'management', 'office'] },
  { label: 'Tenant Address', keywords: ['tenant', 'defendant', 'resides', 'mailing address'] },
];

export const DEFAULT_ADDRESS_LABEL = 'Address';

// ============================================================================
// Case numbers and statutes
// ============================================================================

export interface ReferencePatternRule {
  id: string;
  label: string;
  pattern: RegExp;
}

/** Jurisdiction-specific formats, most specific first. */
export const CASE_NUMBER_RULES: readonly ReferencePatternRule[] = [
  { id: 'mn_dakota', label: 'Case Number (Dakota County)', pattern: /\b(\d{2}[A-Z]{2}-CV-\d{2}-\d+)\b/g },
  { id: 'mn_hennepin_housing', label: 'Case Number (Hennepin Housing Court)', pattern: /\b(\d{2}-CV-HC-\d{2}-\d+)\b/g },
  { id: 'mn_district', label: 'Case Number (Minnesota District Court)', pattern: /\b(\d{2}-CV-\d{2}-\d+)\b/g },
];

/** Tried only when no jurisdiction-specific format matched. */
export const GENERIC_CASE_NUMBER_RULES: readonly ReferencePatternRule[] = [
  {
    id: 'labeled',
    label: 'Case Number',
    pattern: /\b(?:Court File|Case|File|CASE|FILE)[ \t]*(?:No\.?|NO\.?|Number|NUMBER|#)[ \t]*:?[ \t]*([A-Z0-9][A-Z0-9\-]{3,})/g,
  },
  { id: 'civil', label: 'Case Number (Civil)', pattern: /\b(CV-\d{4}-\d+)\b/g },
];

export const STATUTE_RULES: readonly ReferencePatternRule[] = [
  { id: 'mn_504b', label: 'Minnesota Statute', pattern: /\b(504B\.\d{3})\b/g },
];

export const GENERIC_STATUTE_RULES: readonly ReferencePatternRule[] = [
  { id: 'section_symbol', label: 'Statute Reference', pattern: /§+\s*(\d{1,4}[A-Z]?\.\d{1,4})\b/g },
];

// ============================================================================
// Contact details
// ============================================================================

export const PHONE_PATTERN = /(?:\(\d{3}\)[ \t]*|\b\d{3}[-. \t])\d{3}[-. \t]\d{4}\b/g;
export const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

export const CONTACT_CONTEXT_BEFORE = 60;

export const CONTACT_ROLE_RULES: readonly LabelRule[] = [
  { label: 'Tenant', keywords: ['tenant', 'defendant', 'resident'] },
  { label: 'Landlord', keywords: ['landlord', 'owner', 'manager', 'management', 'office', 'plaintiff', 'leasing'] },
];
