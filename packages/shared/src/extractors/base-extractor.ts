/**
 * Base Entity Extractor
 *
 * Abstract base class with the helpers every kind shares: regex scanning,
 * span bookkeeping, context windows and per-kind deduplication.
 */

import type { EntityKind, ExtractedEntity } from '../types';
import type { EntityExtractor, Span } from './types';

export interface RegexHit {
  match: RegExpExecArray;
  start: number;
  end: number;
}

export abstract class BaseEntityExtractor<E extends ExtractedEntity> implements EntityExtractor<E> {
  abstract readonly kind: EntityKind;
  abstract readonly description: string;

  extract(text: string): E[] {
    if (!text) {
      return [];
    }
    return this.dedupe(this.extractImpl(text));
  }

  /**
   * Kind-specific extraction. Subclasses return candidates in document
   * order; deduplication is applied afterwards.
   */
  protected abstract extractImpl(text: string): E[];

  /**
   * All matches of a global pattern. A fresh RegExp is used so the shared
   * table constant keeps no lastIndex state.
   */
  protected scan(text: string, pattern: RegExp): RegexHit[] {
    const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
    const regex = new RegExp(pattern.source, flags);
    const hits: RegexHit[] = [];
    let match: RegExpExecArray | null;
    while ((match = regex.exec(text)) !== null) {
      if (match[0].length === 0) {
        regex.lastIndex += 1;
        continue;
      }
      hits.push({ match, start: match.index, end: match.index + match[0].length });
    }
    return hits;
  }

  protected overlaps(claimed: readonly Span[], start: number, end: number): boolean {
    return claimed.some((span) => start < span.end && end > span.start);
  }

  /** Text before `start`, at most `size` characters, never reaching back past `floor`. */
  protected windowBefore(text: string, start: number, size: number, floor = 0): string {
    return text.slice(Math.max(floor, start - size), start);
  }

  /** Text after `end`, at most `size` characters, never reaching past `ceiling`. */
  protected windowAfter(text: string, end: number, size: number, ceiling = text.length): string {
    return text.slice(end, Math.min(ceiling, end + size));
  }

  protected lineEnd(text: string, from: number): number {
    const newline = text.indexOf('\n', from);
    return newline === -1 ? text.length : newline;
  }

  /**
   * Keeps the first entity for each (value, context_label) pair. The label is
   * part of the key: a $1,250 rent and an equal $1,250 deposit are two facts.
   */
  protected dedupe(entities: E[]): E[] {
    const seen = new Set<string>();
    return entities.filter((entity) => {
      const key = `${String(entity.value)}\u0000${entity.context_label}`;
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    });
  }
}
