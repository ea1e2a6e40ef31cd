/**
 * Contact Extractors
 *
 * Phone numbers and email addresses, attributed to the tenant or landlord
 * by the nearest role word before them.
 */

import type { EntityKind, TextEntity } from '../../types';
import {
  CONTACT_CONTEXT_BEFORE,
  CONTACT_ROLE_RULES,
  EMAIL_PATTERN,
  PHONE_PATTERN,
} from '../../patterns/entity-patterns';
import { BaseEntityExtractor } from '../base-extractor';

/** The role whose keyword sits closest to the end of the context, or null. */
export function nearestContactRole(context: string): string | null {
  const lower = context.toLowerCase();
  let best: { label: string; index: number } | null = null;
  for (const rule of CONTACT_ROLE_RULES) {
    for (const keyword of rule.keywords) {
      const index = lower.lastIndexOf(keyword);
      if (index >= 0 && (best === null || index > best.index)) {
        best = { label: rule.label, index };
      }
    }
  }
  return best ? best.label : null;
}

abstract class ContactExtractor extends BaseEntityExtractor<TextEntity> {
  protected abstract readonly pattern: RegExp;
  protected abstract readonly noun: string;
  protected abstract readonly ruleId: string;

  protected abstract normalize(raw: string): string;

  protected extractImpl(text: string): TextEntity[] {
    return this.scan(text, this.pattern).map((hit) => {
      const role = nearestContactRole(this.windowBefore(text, hit.start, CONTACT_CONTEXT_BEFORE));
      return {
        kind: this.kind === 'phone' ? 'phone' : 'email',
        value: this.normalize(hit.match[0]),
        context_label: role ? `${role} ${this.noun}` : this.noun,
        source_text: hit.match[0],
        position: { start: hit.start, end: hit.end },
        rule: this.ruleId,
      };
    });
  }
}

export class PhoneExtractor extends ContactExtractor {
  readonly kind: EntityKind = 'phone';
  readonly description = 'US phone numbers';
  protected readonly pattern = PHONE_PATTERN;
  protected readonly noun = 'Phone';
  protected readonly ruleId = 'us_phone';

  /** Formats as 651-555-0100 */
  protected normalize(raw: string): string {
    const digits = raw.replace(/\D/g, '');
    return `${digits.slice(0, 3)}-${digits.slice(3, 6)}-${digits.slice(6)}`;
  }
}

export class EmailExtractor extends ContactExtractor {
  readonly kind: EntityKind = 'email';
  readonly description = 'Email addresses';
  protected readonly pattern = EMAIL_PATTERN;
  protected readonly noun = 'Email';
  protected readonly ruleId = 'email_address';

  protected normalize(raw: string): string {
    return raw.toLowerCase();
  }
}

export const phoneExtractor = new PhoneExtractor();
export const emailExtractor = new EmailExtractor();
