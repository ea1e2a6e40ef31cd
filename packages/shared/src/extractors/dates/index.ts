/**
 * Date Extractor
 *
 * Finds calendar dates in six formats and labels each one from the words
 * around it (hearing, notice, lease start and so on).
 */

import type { DateEntity, EntityKind } from '../../types';
import {
  DATE_CONTEXT_AFTER,
  DATE_CONTEXT_BEFORE,
  DATE_PATTERNS,
  DATE_ROLE_RULES,
  DEFAULT_DATE_LABEL,
  MAX_DATE_YEAR,
  MIN_DATE_YEAR,
  matchLabel,
  type CalendarParts,
} from '../../patterns/entity-patterns';
import { BaseEntityExtractor } from '../base-extractor';
import type { Span } from '../types';

interface DateCandidate extends Span {
  iso: string;
  rule: string;
}

/**
 * Validates the parts with a UTC round trip and formats YYYY-MM-DD.
 * Returns null for impossible dates such as 02/30 or month 13.
 */
export function toIsoDate(parts: CalendarParts): string | null {
  const { year, month, day } = parts;
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return null;
  }
  if (year < MIN_DATE_YEAR || year > MAX_DATE_YEAR) {
    return null;
  }
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date.toISOString().slice(0, 10);
}

export class DateExtractor extends BaseEntityExtractor<DateEntity> {
  readonly kind: EntityKind = 'date';
  readonly description = 'Calendar dates labelled by role (hearing, notice, deadline, lease term)';

  protected extractImpl(text: string): DateEntity[] {
    const claimed: Span[] = [];
    const candidates: DateCandidate[] = [];

    for (const rule of DATE_PATTERNS) {
      for (const hit of this.scan(text, rule.pattern)) {
        if (this.overlaps(claimed, hit.start, hit.end)) {
          continue;
        }
        const iso = toIsoDate(rule.parse(hit.match));
        if (iso === null) {
          continue;
        }
        claimed.push({ start: hit.start, end: hit.end });
        candidates.push({ start: hit.start, end: hit.end, iso, rule: rule.id });
      }
    }

    candidates.sort((a, b) => a.start - b.start);

    return candidates.map((candidate, index) => {
      const previous = candidates[index - 1];
      const next = candidates[index + 1];
      const before = this.windowBefore(text, candidate.start, DATE_CONTEXT_BEFORE, previous ? previous.end : 0);
      const after = this.windowAfter(text, candidate.end, DATE_CONTEXT_AFTER, next ? next.start : text.length);
      // Rule order decides the role across both sides of the date.
      const role = matchLabel(DATE_ROLE_RULES, `${before} ${after}`);

      return {
        kind: 'date',
        value: candidate.iso,
        context_label: role ? role.label : DEFAULT_DATE_LABEL,
        source_text: text.slice(candidate.start, candidate.end),
        position: { start: candidate.start, end: candidate.end },
        rule: candidate.rule,
      };
    });
  }
}

export const dateExtractor = new DateExtractor();
