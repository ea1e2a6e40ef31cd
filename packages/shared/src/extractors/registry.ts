/**
 * Extractor Registry
 *
 * Holds one extractor per entity kind. Registries are constructed
 * explicitly and passed to whoever needs them; there is no module-level
 * singleton.
 */

import type { EntityKind, ExtractedEntity } from '../types';
import type { EntityExtractor } from './types';
import { logger } from '../logger';

export class ExtractorRegistry {
  private readonly extractors = new Map<EntityKind, EntityExtractor>();

  /**
   * Register an extractor for its kind.
   * Overwrites any existing extractor for that kind; registration order is kept.
   */
  register(extractor: EntityExtractor): this {
    this.extractors.set(extractor.kind, extractor);

    logger.debug('Registered entity extractor', {
      kind: extractor.kind,
      description: extractor.description,
    });

    return this;
  }

  get(kind: EntityKind): EntityExtractor | undefined {
    return this.extractors.get(kind);
  }

  /**
   * @throws Error if no extractor is registered for the kind
   */
  getOrThrow(kind: EntityKind): EntityExtractor {
    const extractor = this.extractors.get(kind);
    if (!extractor) {
      throw new Error(`No extractor registered for entity kind: ${kind}`);
    }
    return extractor;
  }

  has(kind: EntityKind): boolean {
    return this.extractors.has(kind);
  }

  kinds(): EntityKind[] {
    return Array.from(this.extractors.keys());
  }

  list(): EntityExtractor[] {
    return Array.from(this.extractors.values());
  }

  /**
   * Run every registered extractor, in registration order, and concatenate
   * their results.
   */
  extractAll(text: string): ExtractedEntity[] {
    const entities: ExtractedEntity[] = [];
    for (const extractor of this.extractors.values()) {
      entities.push(...extractor.extract(text));
    }
    return entities;
  }

  /**
   * Get registry statistics
   */
  stats(): { totalExtractors: number; kinds: EntityKind[] } {
    return {
      totalExtractors: this.extractors.size,
      kinds: this.kinds(),
    };
  }
}
