/**
 * Per-type score accumulator. Each contribution keeps the reasoning line
 * that explains it, in the order it was added.
 */

import type { DocumentType } from '../types';

export type ScoreLayer = 'keyword' | 'structure' | 'context' | 'signal' | 'filename' | 'statute' | 'assist';

export interface Contribution {
  layer: ScoreLayer;
  amount: number;
  reason: string;
}

/** "+0.30" or "-0.20" */
export function formatAmount(amount: number): string {
  return amount >= 0 ? `+${amount.toFixed(2)}` : amount.toFixed(2);
}

export class ScoreBoard {
  private readonly entries = new Map<DocumentType, Contribution[]>();

  add(type: DocumentType, layer: ScoreLayer, amount: number, description: string): void {
    const contributions = this.entries.get(type) ?? [];
    contributions.push({ layer, amount, reason: `${description} (${formatAmount(amount)})` });
    this.entries.set(type, contributions);
  }

  /** A type is a candidate once its keyword layer scored above zero. */
  isCandidate(type: DocumentType): boolean {
    return this.layerTotal(type, 'keyword') > 0 || this.layerTotal(type, 'assist') > 0;
  }

  candidates(): DocumentType[] {
    return Array.from(this.entries.keys()).filter((type) => this.isCandidate(type));
  }

  total(type: DocumentType): number {
    return (this.entries.get(type) ?? []).reduce((sum, contribution) => sum + contribution.amount, 0);
  }

  layerTotal(type: DocumentType, layer: ScoreLayer): number {
    return (this.entries.get(type) ?? [])
      .filter((contribution) => contribution.layer === layer)
      .reduce((sum, contribution) => sum + contribution.amount, 0);
  }

  contributions(type: DocumentType): readonly Contribution[] {
    return this.entries.get(type) ?? [];
  }
}
