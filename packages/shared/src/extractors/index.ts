/**
 * Entity Extractors Module
 *
 * One extractor per entity kind, held in an explicitly constructed
 * registry. Extraction is independent of classification.
 */

import type { ExtractedEntity } from '../types';
import { ExtractorRegistry } from './registry';
import { dateExtractor } from './dates';
import { amountExtractor } from './amounts';
import { partyExtractor } from './parties';
import { addressExtractor } from './addresses';
import { caseNumberExtractor } from './case-numbers';
import { statuteExtractor } from './statutes';
import { phoneExtractor, emailExtractor } from './contacts';

// Core types and interfaces
export type { EntityExtractor, Span } from './types';

// Base class and registry
export { BaseEntityExtractor, type RegexHit } from './base-extractor';
export { ExtractorRegistry } from './registry';

// Individual extractors
export { DateExtractor, dateExtractor, toIsoDate } from './dates';
export { AmountExtractor, amountExtractor, parseAmount } from './amounts';
export { PartyExtractor, partyExtractor, cleanPartyName } from './parties';
export { AddressExtractor, addressExtractor, parseAddressTail } from './addresses';
export { CaseNumberExtractor, caseNumberExtractor } from './case-numbers';
export { StatuteExtractor, statuteExtractor } from './statutes';
export { PhoneExtractor, EmailExtractor, phoneExtractor, emailExtractor, nearestContactRole } from './contacts';

/**
 * A registry with every entity kind, in fixed order.
 */
export function createDefaultRegistry(): ExtractorRegistry {
  return new ExtractorRegistry()
    .register(dateExtractor)
    .register(amountExtractor)
    .register(partyExtractor)
    .register(addressExtractor)
    .register(caseNumberExtractor)
    .register(statuteExtractor)
    .register(phoneExtractor)
    .register(emailExtractor);
}

/**
 * Extract every entity kind from raw text.
 */
export function extractEntities(text: string, registry: ExtractorRegistry = createDefaultRegistry()): ExtractedEntity[] {
  return registry.extractAll(text);
}
