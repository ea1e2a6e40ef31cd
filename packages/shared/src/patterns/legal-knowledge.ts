/**
 * Minnesota landlord-tenant knowledge: Chapter 504B sections, legal terms
 * of art and statutory response periods.
 */

import legalData from '../../data/legal-terms.json';
import type { DocumentType } from '../types';
import { isDocumentType } from './document-types';
import { phraseMatcher } from './document-patterns';

export interface StatuteReference {
  section: string;
  title: string;
  /** Document types this section points to */
  types: readonly DocumentType[];
}

interface StatuteRecord {
  section: string;
  title: string;
  types: readonly string[];
}

const statuteRecords: readonly StatuteRecord[] = legalData.statutes;

export const MN_STATUTES: readonly StatuteReference[] = statuteRecords.map((statute) => ({
  section: statute.section,
  title: statute.title,
  types: statute.types.filter(isDocumentType),
}));

const STATUTES_BY_SECTION = new Map<string, StatuteReference>(
  MN_STATUTES.map((statute): [string, StatuteReference] => [statute.section, statute])
);

export function findStatute(section: string): StatuteReference | undefined {
  return STATUTES_BY_SECTION.get(section);
}

export interface LegalTerm {
  term: string;
  matcher: RegExp;
}

export const LEGAL_TERMS: readonly LegalTerm[] = legalData.terms.map((term) => ({
  term,
  matcher: phraseMatcher(term),
}));

/** Formats a section for key_terms, e.g. "MN Stat. 504B.135". */
export function formatStatuteTerm(section: string): string {
  return `MN Stat. ${section}`;
}

/** Statutory periods in days. */
export const MN_DEADLINES = {
  evictionAnswer: 7,
  nonpaymentNotice: 14,
  leaseViolation: 14,
  monthToMonth: 30,
} as const;
