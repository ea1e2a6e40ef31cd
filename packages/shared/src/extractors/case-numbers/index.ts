/**
 * Case Number Extractor
 *
 * Minnesota court file numbers. Jurisdiction-specific formats are tried
 * first; the generic "Case No:" and CV-YYYY-N rules only run when none of
 * them matched. The first rule with matches wins.
 */

import type { EntityKind, TextEntity } from '../../types';
import {
  CASE_NUMBER_RULES,
  GENERIC_CASE_NUMBER_RULES,
  type ReferencePatternRule,
} from '../../patterns/entity-patterns';
import { BaseEntityExtractor } from '../base-extractor';

export class CaseNumberExtractor extends BaseEntityExtractor<TextEntity> {
  readonly kind: EntityKind = 'case_number';
  readonly description = 'Court case and file numbers';

  protected extractImpl(text: string): TextEntity[] {
    for (const rules of [CASE_NUMBER_RULES, GENERIC_CASE_NUMBER_RULES]) {
      for (const rule of rules) {
        const found = this.apply(text, rule);
        if (found.length > 0) {
          return found;
        }
      }
    }
    return [];
  }

  private apply(text: string, rule: ReferencePatternRule): TextEntity[] {
    const entities: TextEntity[] = [];
    for (const hit of this.scan(text, rule.pattern)) {
      const value = hit.match[1];
      if (value === undefined || !/\d/.test(value)) {
        continue;
      }
      const start = hit.start + Math.max(hit.match[0].indexOf(value), 0);
      const end = start + value.length;
      entities.push({
        kind: 'case_number',
        value,
        context_label: rule.label,
        source_text: text.slice(start, end),
        position: { start, end },
        rule: rule.id,
      });
    }
    return entities;
  }
}

export const caseNumberExtractor = new CaseNumberExtractor();
