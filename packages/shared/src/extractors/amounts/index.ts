/**
 * Amount Extractor
 *
 * Finds dollar amounts, labels them from the preceding words and drops
 * values outside the plausible range for their label.
 */

import type { AmountEntity, EntityKind } from '../../types';
import {
  AMOUNT_CONTEXT_AFTER,
  AMOUNT_CONTEXT_BEFORE,
  AMOUNT_PATTERNS,
  AMOUNT_ROLE_RULES,
  DEFAULT_AMOUNT_ROLE,
} from '../../patterns/entity-patterns';
import { BaseEntityExtractor } from '../base-extractor';
import type { Span } from '../types';

interface AmountCandidate extends Span {
  value: number;
  rule: string;
}

/** "1,250" plus ".5" becomes 1250.5 */
export function parseAmount(whole: string, fraction: string | undefined): number {
  const value = parseFloat(`${whole.replace(/,/g, '')}${fraction ?? ''}`);
  return Math.round(value * 100) / 100;
}

export class AmountExtractor extends BaseEntityExtractor<AmountEntity> {
  readonly kind: EntityKind = 'amount';
  readonly description = 'Dollar amounts labelled as rent, deposit, fees, judgment or totals';

  protected extractImpl(text: string): AmountEntity[] {
    const claimed: Span[] = [];
    const candidates: AmountCandidate[] = [];

    for (const rule of AMOUNT_PATTERNS) {
      for (const hit of this.scan(text, rule.pattern)) {
        if (this.overlaps(claimed, hit.start, hit.end)) {
          continue;
        }
        const value = parseAmount(hit.match[1] ?? '', hit.match[2]);
        if (!Number.isFinite(value)) {
          continue;
        }
        claimed.push({ start: hit.start, end: hit.end });
        candidates.push({ start: hit.start, end: hit.end, value, rule: rule.id });
      }
    }

    candidates.sort((a, b) => a.start - b.start);

    const entities: AmountEntity[] = [];
    candidates.forEach((candidate, index) => {
      const previous = candidates[index - 1];
      const before = this.windowBefore(text, candidate.start, AMOUNT_CONTEXT_BEFORE, previous ? previous.end : 0);
      const after = this.windowAfter(text, candidate.end, AMOUNT_CONTEXT_AFTER, this.lineEnd(text, candidate.end));
      const context = `${before} ${after}`.toLowerCase();

      const role =
        AMOUNT_ROLE_RULES.find((rule) => rule.keywords.some((keyword) => context.includes(keyword))) ??
        DEFAULT_AMOUNT_ROLE;

      if (candidate.value < role.min || candidate.value > role.max) {
        return;
      }

      entities.push({
        kind: 'amount',
        value: candidate.value,
        context_label: role.label,
        source_text: text.slice(candidate.start, candidate.end),
        position: { start: candidate.start, end: candidate.end },
        rule: candidate.rule,
      });
    });

    return entities;
  }
}

export const amountExtractor = new AmountExtractor();
