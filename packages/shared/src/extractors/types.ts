/**
 * Entity Extractor Types
 *
 * Each entity kind gets its own extractor. Extractors are pure: they read
 * the raw text and return entities, with no dependence on classification.
 */

import type { EntityKind, ExtractedEntity } from '../types';

/**
 * Interface for kind-specific entity extractors.
 */
export interface EntityExtractor<E extends ExtractedEntity = ExtractedEntity> {
  /** The entity kind this extractor produces */
  readonly kind: EntityKind;

  /** Human-readable description of what this extractor finds */
  readonly description: string;

  /**
   * Extract entities of this kind from raw text.
   * Never throws for content problems; unparseable matches are dropped.
   */
  extract(text: string): E[];
}

/** Half-open character range claimed by an earlier match. */
export interface Span {
  start: number;
  end: number;
}
