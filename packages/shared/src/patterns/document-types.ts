/**
 * Document type profiles: category, display title, summary sentence,
 * default urgency and the fixed normalization ceiling for each type.
 */

import { DOCUMENT_TYPES, type DocumentCategory, type DocumentType, type UrgencyLevel } from '../types';

export interface DocumentTypeProfile {
  category: DocumentCategory;
  title: string;
  summary: string;
  defaultUrgency: UrgencyLevel;
  /** Raw score that maps to confidence 1.0 */
  ceiling: number;
}

const COURT_CEILING = 6.5;
const DEFAULT_CEILING = 4.5;
const COMMUNICATION_CEILING = 3.0;

export const DOCUMENT_TYPE_PROFILES: Readonly<Record<DocumentType, DocumentTypeProfile>> = {
  summons: {
    category: 'court',
    title: 'Court Summons',
    summary: 'A court summons starting an eviction case. A written answer is due by the deadline stated.',
    defaultUrgency: 'high',
    ceiling: COURT_CEILING,
  },
  complaint: {
    category: 'court',
    title: 'Eviction Complaint',
    summary: "The landlord's complaint describing the claims made against the tenant.",
    defaultUrgency: 'high',
    ceiling: COURT_CEILING,
  },
  eviction_filing: {
    category: 'court',
    title: 'Eviction Filing',
    summary: 'A filing that opens an eviction action in court.',
    defaultUrgency: 'high',
    ceiling: COURT_CEILING,
  },
  writ: {
    category: 'court',
    title: 'Writ of Restitution',
    summary: 'A writ authorizing the sheriff to remove the tenant from the premises.',
    defaultUrgency: 'critical',
    ceiling: COURT_CEILING,
  },
  judgment: {
    category: 'court',
    title: 'Court Judgment',
    summary: 'A judgment entered by the court, which may include possession and money amounts.',
    defaultUrgency: 'high',
    ceiling: COURT_CEILING,
  },
  court_order: {
    category: 'court',
    title: 'Court Order',
    summary: 'An order issued by the court in the case.',
    defaultUrgency: 'normal',
    ceiling: COURT_CEILING,
  },
  motion: {
    category: 'court',
    title: 'Motion',
    summary: 'A motion asking the court to take an action in the case.',
    defaultUrgency: 'normal',
    ceiling: COURT_CEILING,
  },
  answer: {
    category: 'court',
    title: 'Answer to Complaint',
    summary: "The tenant's written answer responding to the complaint.",
    defaultUrgency: 'normal',
    ceiling: COURT_CEILING,
  },
  affidavit: {
    category: 'court',
    title: 'Affidavit',
    summary: 'A sworn statement filed in the case.',
    defaultUrgency: 'normal',
    ceiling: COURT_CEILING,
  },
  eviction_notice: {
    category: 'landlord',
    title: 'Eviction Notice',
    summary: 'A landlord notice demanding that the tenant vacate the unit.',
    defaultUrgency: 'high',
    ceiling: DEFAULT_CEILING,
  },
  notice_to_quit: {
    category: 'landlord',
    title: 'Pay or Quit Notice',
    summary: 'A notice demanding payment of rent owed or surrender of the premises.',
    defaultUrgency: 'high',
    ceiling: DEFAULT_CEILING,
  },
  lease_violation: {
    category: 'landlord',
    title: 'Lease Violation Notice',
    summary: 'A notice alleging a violation of the lease.',
    defaultUrgency: 'medium',
    ceiling: DEFAULT_CEILING,
  },
  rent_increase: {
    category: 'landlord',
    title: 'Rent Increase Notice',
    summary: 'A notice announcing a change in the rent amount.',
    defaultUrgency: 'normal',
    ceiling: DEFAULT_CEILING,
  },
  late_notice: {
    category: 'landlord',
    title: 'Late Rent Notice',
    summary: 'A notice that rent is past due, often with late fees.',
    defaultUrgency: 'medium',
    ceiling: DEFAULT_CEILING,
  },
  non_renewal: {
    category: 'landlord',
    title: 'Lease Non-Renewal Notice',
    summary: 'A notice that the lease will not be renewed at the end of its term.',
    defaultUrgency: 'medium',
    ceiling: DEFAULT_CEILING,
  },
  entry_notice: {
    category: 'landlord',
    title: 'Notice of Entry',
    summary: 'A notice that the landlord intends to enter the unit.',
    defaultUrgency: 'low',
    ceiling: DEFAULT_CEILING,
  },
  lease: {
    category: 'landlord',
    title: 'Lease Agreement',
    summary: 'The rental agreement setting the rent, deposit and lease term.',
    defaultUrgency: 'low',
    ceiling: DEFAULT_CEILING,
  },
  receipt: {
    category: 'financial',
    title: 'Payment Receipt',
    summary: 'A receipt recording a payment made to the landlord.',
    defaultUrgency: 'low',
    ceiling: DEFAULT_CEILING,
  },
  ledger: {
    category: 'financial',
    title: 'Tenant Ledger',
    summary: 'An account ledger of charges, payments and balance.',
    defaultUrgency: 'low',
    ceiling: DEFAULT_CEILING,
  },
  deposit_statement: {
    category: 'financial',
    title: 'Security Deposit Statement',
    summary: 'An itemized statement of the security deposit and any deductions.',
    defaultUrgency: 'normal',
    ceiling: DEFAULT_CEILING,
  },
  inspection: {
    category: 'evidence',
    title: 'Inspection Report',
    summary: 'A record of the condition of the unit.',
    defaultUrgency: 'low',
    ceiling: DEFAULT_CEILING,
  },
  repair_request: {
    category: 'evidence',
    title: 'Repair Request',
    summary: 'A request for repairs or maintenance in the unit.',
    defaultUrgency: 'normal',
    ceiling: DEFAULT_CEILING,
  },
  letter: {
    category: 'communication',
    title: 'Letter',
    summary: 'Written correspondence between the parties.',
    defaultUrgency: 'low',
    ceiling: COMMUNICATION_CEILING,
  },
  email: {
    category: 'communication',
    title: 'Email',
    summary: 'An email exchanged between the parties.',
    defaultUrgency: 'low',
    ceiling: COMMUNICATION_CEILING,
  },
  unknown: {
    category: 'other',
    title: 'Unclassified Document',
    summary: 'The document type could not be determined.',
    defaultUrgency: 'normal',
    ceiling: DEFAULT_CEILING,
  },
};

/** Fixed tie-break order: earlier wins. */
export const TYPE_PRIORITY: readonly DocumentType[] = DOCUMENT_TYPES;

export const URGENCY_SEVERITY: Readonly<Record<UrgencyLevel, number>> = {
  critical: 4,
  high: 3,
  medium: 2,
  normal: 1,
  low: 0,
};

export function isDocumentType(value: string): value is DocumentType {
  return DOCUMENT_TYPES.some((type) => type === value);
}

export function getCategory(type: DocumentType): DocumentCategory {
  return DOCUMENT_TYPE_PROFILES[type].category;
}

export function typesInCategory(category: DocumentCategory): DocumentType[] {
  return DOCUMENT_TYPES.filter((type) => DOCUMENT_TYPE_PROFILES[type].category === category);
}

export function moreSevere(a: UrgencyLevel, b: UrgencyLevel): UrgencyLevel {
  return URGENCY_SEVERITY[b] > URGENCY_SEVERITY[a] ? b : a;
}
