/**
 * Response windows and deadline dates.
 */

import { addDays, daysBetween } from '../calendar';
import type { DateEntity } from '../types';
import { RESPONSE_WINDOW_RULES, parseNumberWords } from '../patterns/document-patterns';

/** Labels whose dates count as a deadline the tenant must meet. */
export const DEADLINE_DATE_LABELS: readonly string[] = ['Answer Deadline', 'Hearing Date'];

/** Written numbers are read up to thirty. */
const MAX_WORDED_DAYS = 30;

/**
 * Days to respond from the first response-window phrase, e.g.
 * "within 14 days" or "twenty (20) days".
 */
export function findDaysToRespond(text: string): number | null {
  for (const rule of RESPONSE_WINDOW_RULES) {
    const match = rule.pattern.exec(text);
    const captured = match?.[1];
    if (captured === undefined) {
      continue;
    }
    if (rule.format === 'digits') {
      const days = parseInt(captured, 10);
      if (days > 0) {
        return days;
      }
      continue;
    }
    const days = parseNumberWords(captured);
    if (days !== null && days <= MAX_WORDED_DAYS) {
      return days;
    }
  }
  return null;
}

export interface DeadlineResolution {
  deadlineDate: string | null;
  /** Whole days from the reference day; negative once past */
  daysUntil: number | null;
}

/**
 * The earliest deadline-labelled date on or after the reference day. When
 * there is none, the reference day plus the response window. When neither
 * exists, the latest deadline-labelled date already past.
 */
export function resolveDeadline(
  dates: readonly DateEntity[],
  daysToRespond: number | null,
  referenceDay: string
): DeadlineResolution {
  const labelled = dates
    .filter((date) => DEADLINE_DATE_LABELS.includes(date.context_label))
    .map((date) => date.value)
    .sort();

  const upcoming = labelled.find((value) => value >= referenceDay);
  let deadlineDate: string | null = upcoming ?? null;

  if (deadlineDate === null && daysToRespond !== null) {
    deadlineDate = addDays(referenceDay, daysToRespond);
  }
  if (deadlineDate === null && labelled.length > 0) {
    deadlineDate = labelled[labelled.length - 1] ?? null;
  }

  return {
    deadlineDate,
    daysUntil: deadlineDate === null ? null : daysBetween(referenceDay, deadlineDate),
  };
}
