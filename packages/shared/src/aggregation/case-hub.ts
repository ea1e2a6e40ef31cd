/**
 * Case Hub
 *
 * TTL-cached access to each user's aggregated case, plus the helper views
 * built on it: hearing, deadline, calendar and housing-court form autofill.
 * Construct one per process and inject it; the document source and clock
 * are dependencies so tests can drive them.
 */

import { daysBetween, toIsoDay } from '../calendar';
import { config } from '../config';
import { logger } from '../logger';
import type { CaseData, CaseDocument } from '../types';
import { aggregate } from './case-aggregator';

/** Supplies a user's processed documents in upload order. */
export interface CaseDocumentSource {
  listDocuments(userId: string): Promise<CaseDocument[]>;
}

export type Clock = () => number;

export interface CaseHubOptions {
  source: CaseDocumentSource;
  ttlMs?: number;
  clock?: Clock;
}

export interface HearingInfo {
  date: string | null;
  time: string | null;
  has_hearing: boolean;
}

export interface DeadlineInfo {
  answer_deadline: string | null;
  days_until: number | null;
  is_past: boolean;
  /** 0 to 3 days remaining */
  is_urgent: boolean;
}

export type CalendarEventType = 'hearing' | 'deadline' | 'notice' | 'lease_end';

export interface CalendarEvent {
  id: string;
  title: string;
  date: string;
  time: string | null;
  type: CalendarEventType;
  critical: boolean;
  source: 'document_extraction';
}

export const FORM_IDS = ['HOU301', 'HOU302', 'HOU303', 'HOU304'] as const;
export type FormId = (typeof FORM_IDS)[number];

export type AutofillValue = string | number | string[] | null;
export type FormAutofill = Record<string, AutofillValue>;

const URGENT_DAYS = 3;
const MAX_SUPPORTING_STATUTES = 5;

interface CacheEntry {
  data: CaseData;
  cachedAt: number;
}

// ============================================================================
// Suggestion rules
// ============================================================================

interface SuggestionRule {
  code: string;
  applies: (data: CaseData) => boolean;
}

const hasDocuments = (data: CaseData, ...types: string[]): boolean =>
  types.some((type) => (data.documents_by_type[type] ?? 0) > 0);

const DEFENSE_RULES: readonly SuggestionRule[] = [
  { code: 'IMPROPER_NOTICE', applies: (data) => data.notice_date !== null && data.hearing_date !== null },
  { code: 'HABITABILITY', applies: (data) => hasDocuments(data, 'repair_request', 'inspection') },
  { code: 'RENT_ESCROW', applies: (data) => hasDocuments(data, 'repair_request', 'inspection') },
  { code: 'RETALIATION', applies: (data) => hasDocuments(data, 'letter', 'email') },
  { code: 'PAYMENT_MADE', applies: (data) => hasDocuments(data, 'receipt', 'ledger') },
];

const DISMISSAL_RULES: readonly SuggestionRule[] = [
  { code: 'IMPROPER_SERVICE', applies: (data) => data.case_numbers.length === 0 },
  { code: 'PAYMENT_RENDERED_MOOT', applies: (data) => hasDocuments(data, 'receipt') },
];

const COUNTERCLAIM_RULES: readonly SuggestionRule[] = [
  { code: 'SECURITY_DEPOSIT_VIOLATION', applies: (data) => data.deposit_amount !== null },
  { code: 'BREACH_OF_WARRANTY_HABITABILITY', applies: (data) => hasDocuments(data, 'repair_request') },
  { code: 'PROPERTY_DAMAGE', applies: (data) => hasDocuments(data, 'inspection') },
];

function suggest(rules: readonly SuggestionRule[], data: CaseData): string[] {
  return rules.filter((rule) => rule.applies(data)).map((rule) => rule.code);
}

// ============================================================================
// Hub
// ============================================================================

export class CaseHub {
  private readonly source: CaseDocumentSource;
  private readonly ttlMs: number;
  private readonly clock: Clock;
  private readonly cache = new Map<string, CacheEntry>();
  /** Bumped on invalidation; a rebuild started under an older generation is not cached. */
  private readonly generations = new Map<string, number>();
  private epoch = 0;

  constructor(options: CaseHubOptions) {
    this.source = options.source;
    this.ttlMs = options.ttlMs ?? config.caseCacheTtlMs;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * The user's aggregated case. Served from cache while younger than the
   * TTL unless `forceRefresh` is set.
   */
  async getCaseData(userId: string, options: { forceRefresh?: boolean } = {}): Promise<CaseData> {
    const now = this.clock();
    const cached = this.cache.get(userId);
    if (!options.forceRefresh && cached && now - cached.cachedAt < this.ttlMs) {
      return cached.data;
    }

    const generation = this.generationOf(userId);
    const documents = await this.source.listDocuments(userId);
    const data = aggregate(documents, { userId });
    if (this.generationOf(userId) === generation) {
      this.cache.set(userId, { data, cachedAt: now });
    }

    logger.debug('Case data rebuilt', {
      user_id: userId,
      document_count: data.document_count,
      force_refresh: options.forceRefresh ?? false,
    });

    return data;
  }

  invalidate(userId: string): void {
    this.cache.delete(userId);
    this.generations.set(userId, (this.generations.get(userId) ?? 0) + 1);
  }

  invalidateAll(): void {
    this.cache.clear();
    this.epoch += 1;
  }

  private generationOf(userId: string): string {
    return `${this.epoch}:${this.generations.get(userId) ?? 0}`;
  }

  async getHearingInfo(userId: string): Promise<HearingInfo> {
    const data = await this.getCaseData(userId);
    return {
      date: data.hearing_date,
      time: data.hearing_time,
      has_hearing: data.hearing_date !== null,
    };
  }

  async getDeadlineInfo(userId: string, now: Date = new Date(this.clock())): Promise<DeadlineInfo> {
    const data = await this.getCaseData(userId);
    const daysUntil = data.answer_deadline === null ? null : daysBetween(toIsoDay(now), data.answer_deadline);
    return {
      answer_deadline: data.answer_deadline,
      days_until: daysUntil,
      is_past: daysUntil !== null && daysUntil < 0,
      is_urgent: daysUntil !== null && daysUntil >= 0 && daysUntil <= URGENT_DAYS,
    };
  }

  /**
   * Hearing, answer deadline, notice and lease end, sorted by date.
   */
  async getCalendarEvents(userId: string): Promise<CalendarEvent[]> {
    const data = await this.getCaseData(userId);
    const candidates: Array<Omit<CalendarEvent, 'source' | 'date'> & { date: string | null }> = [
      { id: `hearing_${userId}`, title: 'Court Hearing', date: data.hearing_date, time: data.hearing_time, type: 'hearing', critical: true },
      { id: `deadline_${userId}`, title: 'Answer Deadline', date: data.answer_deadline, time: null, type: 'deadline', critical: true },
      { id: `notice_${userId}`, title: 'Notice Date', date: data.notice_date, time: null, type: 'notice', critical: false },
      { id: `lease_end_${userId}`, title: 'Lease Ends', date: data.lease_end, time: null, type: 'lease_end', critical: false },
    ];

    const events: CalendarEvent[] = [];
    for (const candidate of candidates) {
      if (candidate.date !== null) {
        events.push({ ...candidate, date: candidate.date, source: 'document_extraction' });
      }
    }
    return events.sort((a, b) => a.date.localeCompare(b.date));
  }

  /**
   * Field map for a Minnesota housing-court form:
   * HOU301 answer, HOU302 motion to dismiss, HOU303 continuance, HOU304 counterclaim.
   */
  async getFormAutofill(userId: string, formId: FormId): Promise<FormAutofill> {
    const data = await this.getCaseData(userId);

    const base: FormAutofill = {
      case_number: data.primary_case_number,
      plaintiff_name: data.landlord_name,
      plaintiff_address: data.landlord_address,
      defendant_name: data.tenant_name,
      defendant_address: data.tenant_address,
      property_address: data.property_address,
      hearing_date: data.hearing_date,
      hearing_time: data.hearing_time,
    };

    switch (formId) {
      case 'HOU301':
        return {
          ...base,
          rent_amount: data.rent_amount,
          rent_claimed: data.rent_claimed,
          deposit_amount: data.deposit_amount,
          notice_date: data.notice_date,
          lease_start_date: data.lease_start,
          lease_end_date: data.lease_end,
          late_fees_claimed: data.late_fees,
          total_claimed: data.total_claimed,
          suggested_defenses: suggest(DEFENSE_RULES, data),
        };
      case 'HOU302':
        return {
          ...base,
          grounds: suggest(DISMISSAL_RULES, data),
          supporting_statutes: data.matched_statutes.slice(0, MAX_SUPPORTING_STATUTES),
        };
      case 'HOU303':
        return {
          ...base,
          current_hearing_date: data.hearing_date,
          reason: '',
        };
      case 'HOU304':
        return {
          ...base,
          damages_claimed: data.damages_claimed,
          suggested_claims: suggest(COUNTERCLAIM_RULES, data),
        };
    }
  }
}

export function isFormId(value: string): value is FormId {
  return FORM_IDS.some((formId) => formId === value);
}
