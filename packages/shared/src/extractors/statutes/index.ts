/**
 * Statute Extractor
 *
 * Minnesota Chapter 504B section references, labelled with the section
 * title when it is a known one. A bare "§ N.N" is only reported when no
 * 504B reference was found.
 */

import type { EntityKind, TextEntity } from '../../types';
import { GENERIC_STATUTE_RULES, STATUTE_RULES } from '../../patterns/entity-patterns';
import { findStatute } from '../../patterns/legal-knowledge';
import { BaseEntityExtractor } from '../base-extractor';

export class StatuteExtractor extends BaseEntityExtractor<TextEntity> {
  readonly kind: EntityKind = 'statute';
  readonly description = 'Minnesota 504B statute references';

  protected extractImpl(text: string): TextEntity[] {
    for (const rules of [STATUTE_RULES, GENERIC_STATUTE_RULES]) {
      const entities: TextEntity[] = [];
      for (const rule of rules) {
        for (const hit of this.scan(text, rule.pattern)) {
          const section = hit.match[1];
          if (section === undefined) {
            continue;
          }
          const start = hit.start + Math.max(hit.match[0].indexOf(section), 0);
          const end = start + section.length;
          entities.push({
            kind: 'statute',
            value: section,
            context_label: findStatute(section)?.title ?? rule.label,
            source_text: text.slice(start, end),
            position: { start, end },
            rule: rule.id,
          });
        }
      }
      if (entities.length > 0) {
        return entities;
      }
    }
    return [];
  }
}

export const statuteExtractor = new StatuteExtractor();
