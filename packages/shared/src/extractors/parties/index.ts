/**
 * Party Extractor
 *
 * Tenant, landlord, attorney and property-manager names. Each role has an
 * ordered rule table; the first rule that finds anything wins for that role
 * and all of its distinct matches are kept, so co-tenants survive as
 * alternatives downstream.
 */

import type { EntityKind, PartyEntity, PartyRole } from '../../types';
import {
  MAX_PARTY_NAME_LENGTH,
  MIN_PARTY_NAME_LENGTH,
  NON_NAME_WORDS,
  PARTY_NAME_TRAILERS,
  PARTY_RULES,
  type PartyPatternRule,
} from '../../patterns/entity-patterns';
import { BaseEntityExtractor, type RegexHit } from '../base-extractor';

const ROLE_ORDER: readonly PartyRole[] = ['tenant', 'landlord', 'attorney', 'property_manager'];

/** Strips swallowed role words and trailing punctuation. */
export function cleanPartyName(raw: string): string {
  return raw
    .replace(PARTY_NAME_TRAILERS, '')
    .replace(/[\s,;:]+$/, '')
    .replace(/\s+/g, ' ')
    .trim();
}

function isPlausibleName(name: string): boolean {
  if (name.length < MIN_PARTY_NAME_LENGTH || name.length > MAX_PARTY_NAME_LENGTH) {
    return false;
  }
  const words = name.toLowerCase().split(' ');
  return !words.every((word) => NON_NAME_WORDS.has(word));
}

export class PartyExtractor extends BaseEntityExtractor<PartyEntity> {
  readonly kind: EntityKind = 'party';
  readonly description = 'Tenant, landlord, attorney and property manager names';

  protected extractImpl(text: string): PartyEntity[] {
    const entities: PartyEntity[] = [];

    for (const role of ROLE_ORDER) {
      for (const rule of PARTY_RULES.filter((candidate) => candidate.role === role)) {
        const found = this.scan(text, rule.pattern)
          .map((hit) => this.toEntity(text, hit, rule))
          .filter((entity): entity is PartyEntity => entity !== null);
        if (found.length > 0) {
          entities.push(...found);
          break;
        }
      }
    }

    return entities;
  }

  private toEntity(text: string, hit: RegexHit, rule: PartyPatternRule): PartyEntity | null {
    const raw = hit.match[1];
    if (raw === undefined) {
      return null;
    }
    const name = cleanPartyName(raw);
    if (!isPlausibleName(name)) {
      return null;
    }
    const offset = hit.match[0].indexOf(raw);
    const start = hit.start + Math.max(offset, 0);
    const end = start + name.length;

    return {
      kind: 'party',
      value: name,
      role: rule.role,
      context_label: rule.label,
      source_text: text.slice(start, end),
      position: { start, end },
      rule: rule.id,
    };
  }
}

export const partyExtractor = new PartyExtractor();
