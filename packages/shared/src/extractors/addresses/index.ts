/**
 * Address Extractor
 *
 * Street addresses with an optional unit, followed on the same line by a
 * known city, a state and a zip code.
 */

import { config } from '../../config';
import type { AddressComponents, AddressEntity, EntityKind } from '../../types';
import {
  ADDRESS_CONTEXT_BEFORE,
  ADDRESS_ROLE_RULES,
  DEFAULT_ADDRESS_LABEL,
  KNOWN_CITIES,
  NON_STREET_WORDS,
  STATE_ABBREVIATIONS,
  STATE_PATTERN,
  STREET_PATTERN,
  ZIP_PATTERN,
  matchLabel,
} from '../../patterns/entity-patterns';
import { BaseEntityExtractor } from '../base-extractor';

interface ParsedTail {
  city: string | null;
  state: string | null;
  zip: string | null;
  /** Characters of the tail that belong to the address */
  consumed: number;
}

const LEADING_SEPARATOR = /^,?[ \t]*/;

function matchCity(rest: string): { city: string; length: number } | null {
  const separator = LEADING_SEPARATOR.exec(rest)?.[0].length ?? 0;
  const candidate = rest.slice(separator).toLowerCase();
  for (const city of KNOWN_CITIES) {
    const lower = city.toLowerCase();
    if (candidate.startsWith(lower) && !/[a-z]/.test(candidate.charAt(lower.length))) {
      return { city, length: separator + city.length };
    }
  }
  return null;
}

/** Reads city, then state, then zip from the text following the street. */
export function parseAddressTail(tail: string): ParsedTail {
  let consumed = 0;

  const city = matchCity(tail);
  if (city) {
    consumed += city.length;
  }

  const stateMatch = STATE_PATTERN.exec(tail.slice(consumed));
  let state: string | null = null;
  if (stateMatch) {
    const raw = stateMatch[1] ?? '';
    state = STATE_ABBREVIATIONS[raw.toLowerCase()] ?? raw.toUpperCase();
    consumed += stateMatch[0].length;
  }

  const zipMatch = ZIP_PATTERN.exec(tail.slice(consumed));
  let zip: string | null = null;
  if (zipMatch) {
    zip = zipMatch[1] ?? null;
    consumed += zipMatch[0].length;
  }

  return { city: city ? city.city : null, state, zip, consumed };
}

export class AddressExtractor extends BaseEntityExtractor<AddressEntity> {
  readonly kind: EntityKind = 'address';
  readonly description = 'Street addresses with unit, city, state and zip';

  protected extractImpl(text: string): AddressEntity[] {
    const entities: AddressEntity[] = [];
    let previousEnd = 0;

    for (const hit of this.scan(text, STREET_PATTERN)) {
      const [, number = '', nameWords = '', streetType = '', unit] = hit.match;
      const words = nameWords.trim().split(/[ \t]+/);
      if (words.some((word) => NON_STREET_WORDS.test(word))) {
        continue;
      }

      const tail = parseAddressTail(text.slice(hit.end, this.lineEnd(text, hit.end)));
      const end = hit.end + tail.consumed;

      const components: AddressComponents = {
        street: `${number} ${words.join(' ')} ${streetType}`,
        unit: unit ?? null,
        city: tail.city,
        state: tail.state ?? config.defaultState,
        zip: tail.zip,
        state_defaulted: tail.state === null,
      };

      const before = this.windowBefore(text, hit.start, ADDRESS_CONTEXT_BEFORE, previousEnd);
      const role = matchLabel(ADDRESS_ROLE_RULES, before);
      const sourceText = text.slice(hit.start, end);

      entities.push({
        kind: 'address',
        value: sourceText.replace(/[\s,]+$/, ''),
        components,
        context_label: role ? role.label : DEFAULT_ADDRESS_LABEL,
        source_text: sourceText,
        position: { start: hit.start, end },
        rule: 'street_address',
      });
      previousEnd = end;
    }

    return entities;
  }
}

export const addressExtractor = new AddressExtractor();
