/**
 * Document recognition patterns
 *
 * Weighted keyword tables (loaded from data/document-keywords.json), layout
 * markers, co-occurrence rules and response-window phrases. Every table is
 * ordered; rules are evaluated top to bottom.
 */

import keywordData from '../../data/document-keywords.json';
import type { DocumentCategory, DocumentType } from '../types';
import { isDocumentType } from './document-types';

// ============================================================================
// Keyword tables
// ============================================================================

export interface WeightedPhrase {
  phrase: string;
  weight: number;
  /** Whole-word matcher for the phrase on lower-cased text */
  matcher: RegExp;
}

export interface KeywordTable {
  primary: readonly WeightedPhrase[];
  supporting: readonly WeightedPhrase[];
  /** Words that should co-occur with this type (prefix match) */
  context: readonly string[];
  /** Filename tokens that hint at this type */
  filename: readonly string[];
}

/** Supporting phrases count at this fraction when no primary phrase matched. */
export const SUPPORTING_ONLY_FACTOR = 0.3;

/** Each further distinct phrase is scaled by this factor once more. */
export const KEYWORD_DECAY = 0.75;

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function phraseMatcher(phrase: string): RegExp {
  return new RegExp(`(?<![a-z0-9])${escapeRegExp(phrase)}(?![a-z0-9])`);
}

function toWeighted(entries: ReadonlyArray<{ phrase: string; weight: number }>): WeightedPhrase[] {
  return entries.map((entry) => ({
    phrase: entry.phrase,
    weight: entry.weight,
    matcher: phraseMatcher(entry.phrase),
  }));
}

interface KeywordRecord {
  primary: ReadonlyArray<{ phrase: string; weight: number }>;
  supporting: ReadonlyArray<{ phrase: string; weight: number }>;
  context: readonly string[];
  filename: readonly string[];
}

const keywordRecords: Readonly<Record<string, KeywordRecord>> = keywordData;

function buildKeywordTables(): ReadonlyMap<DocumentType, KeywordTable> {
  const tables = new Map<DocumentType, KeywordTable>();
  for (const [type, table] of Object.entries(keywordRecords)) {
    if (!isDocumentType(type)) {
      throw new Error(`Unknown document type in keyword data: ${type}`);
    }
    tables.set(type, {
      primary: toWeighted(table.primary),
      supporting: toWeighted(table.supporting),
      context: table.context,
      filename: table.filename,
    });
  }
  return tables;
}

export const KEYWORD_TABLES = buildKeywordTables();

// ============================================================================
// Structural markers
// ============================================================================

export interface RuleTarget {
  category?: DocumentCategory;
  types?: readonly DocumentType[];
}

export interface StructureRule {
  id: string;
  description: string;
  /** All patterns must match */
  patterns: readonly RegExp[];
  target: RuleTarget;
  weight: number;
}

export const STRUCTURE_RULES: readonly StructureRule[] = [
  {
    id: 'state_header',
    description: 'STATE OF header',
    patterns: [/\bSTATE OF [A-Z]{3,}/],
    target: { category: 'court' },
    weight: 0.3,
  },
  {
    id: 'county_header',
    description: 'COUNTY OF header',
    patterns: [/\bCOUNTY OF [A-Z]{3,}/],
    target: { category: 'court' },
    weight: 0.2,
  },
  {
    id: 'court_name',
    description: 'court name line',
    patterns: [/\b(?:DISTRICT|HOUSING|SUPERIOR|CIRCUIT|COUNTY|CONCILIATION) COURT\b/i],
    target: { category: 'court' },
    weight: 0.3,
  },
  {
    id: 'case_caption',
    description: 'case number caption',
    patterns: [/\b(?:Court File|Case|File)\s*(?:No\.?|Number|#)/i],
    target: { category: 'court' },
    weight: 0.3,
  },
  {
    id: 'party_caption',
    description: 'plaintiff v. defendant caption',
    patterns: [/\bPlaintiffs?\b[\s\S]{0,200}?\bv(?:s)?\.[\s\S]{0,200}?\bDefendants?\b/i],
    target: { category: 'court' },
    weight: 0.3,
  },
  {
    id: 'court_signature',
    description: 'court signature block',
    patterns: [/\b(?:Judge of District Court|District Court Judge|BY THE COURT|Court Administrator|Referee)\b/i],
    target: { category: 'court' },
    weight: 0.3,
  },
  {
    id: 'landlord_signature',
    description: 'landlord signature block',
    patterns: [/\b(?:Landlord|Owner|Property Manager|Agent)(?:'s)?\s*(?:Signature|\/s\/)/i],
    target: { category: 'landlord' },
    weight: 0.1,
  },
  {
    id: 'party_labels',
    description: 'LANDLORD and TENANT labels',
    patterns: [/^[ \t]*(?:LANDLORD|Landlord|LESSOR|Lessor)[ \t]*:/m, /^[ \t]*(?:TENANT|Tenant|LESSEE|Lessee)[ \t]*:/m],
    target: { types: ['lease'] },
    weight: 0.3,
  },
  {
    id: 'salutation',
    description: 'letter salutation',
    patterns: [/^[ \t]*Dear\s+\S/m],
    target: { types: ['letter'] },
    weight: 0.4,
  },
  {
    id: 'email_headers',
    description: 'email header block',
    patterns: [/^[ \t]*From:/im, /^[ \t]*(?:Sent|Date|Subject):/im],
    target: { types: ['email'] },
    weight: 0.4,
  },
];

/** Bonus when an ALL-CAPS title line contains one of the type's primary phrases. */
export const TITLE_HEADER_WEIGHT = 0.5;

/** Only the first lines of a document are considered for title headers. */
export const TITLE_HEADER_LINES = 20;

// ============================================================================
// Co-occurrence
// ============================================================================

export interface CooccurrenceRule {
  id: string;
  description: string;
  type: DocumentType;
  anchor: RegExp;
  near: RegExp;
  /** Characters searched on each side of the anchor */
  window: number;
  weight: number;
}

const MONEY = /\$\s?\d[\d,]*/;
const DAY_COUNT = /\b\d{1,2}\s*(?:\)\s*)?(?:business\s+|calendar\s+)?days?\b/i;

export const COOCCURRENCE_RULES: readonly CooccurrenceRule[] = [
  {
    id: 'judgment_amount',
    description: 'judgment near a dollar amount',
    type: 'judgment',
    anchor: /\bjudgment\b/gi,
    near: MONEY,
    window: 120,
    weight: 0.3,
  },
  {
    id: 'quit_days',
    description: 'quit near a day count',
    type: 'notice_to_quit',
    anchor: /\bquit\b/gi,
    near: DAY_COUNT,
    window: 120,
    weight: 0.3,
  },
  {
    id: 'vacate_days',
    description: 'vacate near a day count',
    type: 'eviction_notice',
    anchor: /\bvacate\b/gi,
    near: DAY_COUNT,
    window: 120,
    weight: 0.3,
  },
  {
    id: 'respond_days',
    description: 'respond or answer near a day count',
    type: 'summons',
    anchor: /\b(?:respond|answer)\b/gi,
    near: DAY_COUNT,
    window: 80,
    weight: 0.3,
  },
  {
    id: 'sheriff_removal',
    description: 'sheriff near removal or possession',
    type: 'writ',
    anchor: /\bsheriff\b/gi,
    near: /\b(?:remove|premises|possession)\b/i,
    window: 150,
    weight: 0.3,
  },
  {
    id: 'rent_amount',
    description: 'monthly rent near a dollar amount',
    type: 'lease',
    anchor: /\bmonthly rent\b|\brent of\b/gi,
    near: MONEY,
    window: 60,
    weight: 0.2,
  },
  {
    id: 'increase_amount',
    description: 'increase near a dollar amount',
    type: 'rent_increase',
    anchor: /\bincrease/gi,
    near: MONEY,
    window: 100,
    weight: 0.2,
  },
  {
    id: 'paid_amount',
    description: 'paid or received near a dollar amount',
    type: 'receipt',
    anchor: /\b(?:paid|received)\b/gi,
    near: MONEY,
    window: 60,
    weight: 0.3,
  },
  {
    id: 'deposit_deduction',
    description: 'deposit near deductions',
    type: 'deposit_statement',
    anchor: /\bdeposit\b/gi,
    near: /\bdeduct/i,
    window: 150,
    weight: 0.3,
  },
  {
    id: 'late_fee_amount',
    description: 'late fee near a dollar amount',
    type: 'late_notice',
    anchor: /\blate fees?\b/gi,
    near: MONEY,
    window: 40,
    weight: 0.2,
  },
];

/** Added when at least half of a type's context words are present, scaled by the ratio. */
export const CONTEXT_MATCH_BONUS = 0.4;

/** Applied when fewer than half of a type's context words are present. */
export const CONTEXT_MISS_PENALTY = -0.2;

// ============================================================================
// Filename, legal-domain and assist weights
// ============================================================================

export const FILENAME_HINT_BONUS = 0.05;

/** Content score a type needs before a filename hint may count for it. */
export const FILENAME_HINT_MIN_CONTENT = 0.25;

export const STATUTE_REFERENCE_WEIGHT = 0.1;
export const STATUTE_REFERENCE_CAP = 0.3;
export const STATUTE_TYPE_BONUS = 0.2;

export const ASSIST_SIGNAL_WEIGHT = 0.6;

/** Below this normalized score the document is reported as unknown. */
export const MIN_CLASSIFICATION_CONFIDENCE = 0.15;

// ============================================================================
// Response windows ("within 14 days", "twenty (20) days")
// ============================================================================

export interface ResponseWindowRule {
  id: string;
  pattern: RegExp;
  /** Capture group holds digits, or a written number */
  format: 'digits' | 'words';
}

export const RESPONSE_WINDOW_RULES: readonly ResponseWindowRule[] = [
  { id: 'parenthesized', pattern: /\(\s*(\d{1,2})\s*\)\s*(?:business\s+|calendar\s+)?days?\b/i, format: 'digits' },
  { id: 'within_digits', pattern: /\bwithin\s+(\d{1,2})\s+(?:business\s+|calendar\s+)?days?\b/i, format: 'digits' },
  {
    id: 'within_words',
    pattern: /\bwithin\s+([a-z]+(?:-[a-z]+)?)\s+(?:business\s+|calendar\s+)?days?\b/i,
    format: 'words',
  },
  { id: 'day_notice', pattern: /\b(\d{1,2})[-\s]day\s+notice\b/i, format: 'digits' },
];

const UNIT_WORDS: Readonly<Record<string, number>> = {
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12,
  thirteen: 13,
  fourteen: 14,
  fifteen: 15,
  sixteen: 16,
  seventeen: 17,
  eighteen: 18,
  nineteen: 19,
};

const TENS_WORDS: Readonly<Record<string, number>> = {
  twenty: 20,
  thirty: 30,
};

/** Reads "fourteen", "twenty-one", "thirty" and so on; null for anything else. */
export function parseNumberWords(words: string): number | null {
  const parts = words.toLowerCase().split('-');
  const [first, second] = parts;
  if (parts.length === 1) {
    return UNIT_WORDS[first] ?? TENS_WORDS[first] ?? null;
  }
  if (parts.length === 2 && first in TENS_WORDS && second in UNIT_WORDS && UNIT_WORDS[second] < 10) {
    return TENS_WORDS[first] + UNIT_WORDS[second];
  }
  return null;
}
