/**
 * Recognition layers
 *
 * Each layer reads the document facts and adds contributions to the score
 * board. Only the keyword layer can make a type a candidate; every later
 * layer adjusts candidates only.
 */

import type { DocumentType } from '../types';
import {
  ASSIST_SIGNAL_WEIGHT,
  CONTEXT_MATCH_BONUS,
  CONTEXT_MISS_PENALTY,
  COOCCURRENCE_RULES,
  FILENAME_HINT_BONUS,
  FILENAME_HINT_MIN_CONTENT,
  KEYWORD_DECAY,
  KEYWORD_TABLES,
  STATUTE_REFERENCE_CAP,
  STATUTE_REFERENCE_WEIGHT,
  STATUTE_TYPE_BONUS,
  STRUCTURE_RULES,
  SUPPORTING_ONLY_FACTOR,
  TITLE_HEADER_LINES,
  TITLE_HEADER_WEIGHT,
  escapeRegExp,
  type RuleTarget,
} from '../patterns/document-patterns';
import { getCategory, typesInCategory } from '../patterns/document-types';
import { findStatute, formatStatuteTerm } from '../patterns/legal-knowledge';
import type { ScoreBoard } from './score-board';

/** What the layers know about one document. */
export interface DocumentFacts {
  text: string;
  lower: string;
  filename: string;
  caseNumbers: readonly string[];
  /** Distinct 504B sections, in order of first appearance */
  statuteSections: readonly string[];
  hasJudgmentAmount: boolean;
  hasPartyPair: boolean;
  hasResponsePhrase: boolean;
}

export interface AssistGuess {
  type: DocumentType;
  confidence: number;
}

function resolveTargets(target: RuleTarget): readonly DocumentType[] {
  if (target.types) {
    return target.types;
  }
  return target.category ? typesInCategory(target.category) : [];
}

// ============================================================================
// Keyword layer
// ============================================================================

export function applyKeywordLayer(facts: DocumentFacts, board: ScoreBoard): void {
  for (const [type, table] of KEYWORD_TABLES) {
    const primary = table.primary.filter((entry) => entry.matcher.test(facts.lower));
    const supportingFactor = primary.length > 0 ? 1 : SUPPORTING_ONLY_FACTOR;
    const supporting = table.supporting
      .filter((entry) => entry.matcher.test(facts.lower))
      .map((entry) => ({ phrase: entry.phrase, weight: entry.weight * supportingFactor }));

    const seen = new Set<string>();
    const matched = [...primary.map((entry) => ({ phrase: entry.phrase, weight: entry.weight })), ...supporting]
      .filter((entry) => {
        if (seen.has(entry.phrase)) {
          return false;
        }
        seen.add(entry.phrase);
        return true;
      })
      .sort((a, b) => b.weight - a.weight);

    matched.forEach((entry, index) => {
      const amount = entry.weight * Math.pow(KEYWORD_DECAY, index);
      board.add(type, 'keyword', amount, `keyword '${entry.phrase}' matched`);
    });
  }
}

// ============================================================================
// Structural layer
// ============================================================================

function isTitleLine(line: string): boolean {
  return /[A-Z]/.test(line) && line === line.toUpperCase();
}

export function applyStructureLayer(facts: DocumentFacts, board: ScoreBoard): void {
  for (const rule of STRUCTURE_RULES) {
    if (!rule.patterns.every((pattern) => pattern.test(facts.text))) {
      continue;
    }
    for (const type of resolveTargets(rule.target)) {
      if (board.isCandidate(type)) {
        board.add(type, 'structure', rule.weight, `structure '${rule.description}'`);
      }
    }
  }

  const titleLines = facts.text
    .split('\n')
    .slice(0, TITLE_HEADER_LINES)
    .map((line) => line.trim())
    .filter(isTitleLine)
    .map((line) => line.toLowerCase());

  for (const type of board.candidates()) {
    const table = KEYWORD_TABLES.get(type);
    if (!table) {
      continue;
    }
    const header = table.primary.find((entry) => titleLines.some((line) => entry.matcher.test(line)));
    if (header) {
      board.add(type, 'structure', TITLE_HEADER_WEIGHT, `structure 'title header ${header.phrase.toUpperCase()}'`);
    }
  }
}

// ============================================================================
// Contextual layer
// ============================================================================

function cooccurs(text: string, anchor: RegExp, near: RegExp, window: number): boolean {
  const regex = new RegExp(anchor.source, anchor.flags.includes('g') ? anchor.flags : `${anchor.flags}g`);
  let match: RegExpExecArray | null;
  while ((match = regex.exec(text)) !== null) {
    const start = Math.max(0, match.index - window);
    const end = Math.min(text.length, match.index + match[0].length + window);
    if (near.test(text.slice(start, end))) {
      return true;
    }
    if (match[0].length === 0) {
      regex.lastIndex += 1;
    }
  }
  return false;
}

export function applyContextLayer(facts: DocumentFacts, board: ScoreBoard): void {
  for (const rule of COOCCURRENCE_RULES) {
    if (board.isCandidate(rule.type) && cooccurs(facts.text, rule.anchor, rule.near, rule.window)) {
      board.add(rule.type, 'context', rule.weight, `context '${rule.description}'`);
    }
  }

  for (const type of board.candidates()) {
    const words = KEYWORD_TABLES.get(type)?.context ?? [];
    if (words.length === 0) {
      continue;
    }
    const present = words.filter((word) => new RegExp(`(?<![a-z])${escapeRegExp(word)}`).test(facts.lower)).length;
    const ratio = present / words.length;
    const amount = ratio >= 0.5 ? CONTEXT_MATCH_BONUS * ratio : CONTEXT_MISS_PENALTY;
    board.add(type, 'context', amount, `context requirements ${present}/${words.length} present`);
  }
}

// ============================================================================
// Cross-signal reasoning
// ============================================================================

interface CrossSignalRule {
  id: string;
  description: string;
  applies: (facts: DocumentFacts) => boolean;
  target: RuleTarget;
  weight: number;
}

export const CROSS_SIGNAL_RULES: readonly CrossSignalRule[] = [
  {
    id: 'case_number',
    description: 'case number present',
    applies: (facts) => facts.caseNumbers.length > 0,
    target: { category: 'court' },
    weight: 0.5,
  },
  {
    id: 'party_pair',
    description: 'plaintiff and defendant named',
    applies: (facts) => facts.hasPartyPair,
    target: { types: ['summons', 'complaint', 'eviction_filing', 'answer', 'motion'] },
    weight: 0.3,
  },
  {
    id: 'judgment_amount',
    description: 'judgment amount present',
    applies: (facts) => facts.hasJudgmentAmount,
    target: { types: ['judgment'] },
    weight: 0.3,
  },
  {
    id: 'response_deadline',
    description: 'response deadline phrase',
    applies: (facts) => facts.hasResponsePhrase,
    target: { types: ['summons'] },
    weight: 0.25,
  },
];

export function applyCrossSignalLayer(facts: DocumentFacts, board: ScoreBoard): void {
  for (const rule of CROSS_SIGNAL_RULES) {
    if (!rule.applies(facts)) {
      continue;
    }
    for (const type of resolveTargets(rule.target)) {
      if (board.isCandidate(type)) {
        board.add(type, 'signal', rule.weight, `signal '${rule.description}'`);
      }
    }
  }
}

// ============================================================================
// Filename hint
// ============================================================================

export function applyFilenameLayer(facts: DocumentFacts, board: ScoreBoard): void {
  const filename = facts.filename.toLowerCase();
  if (!filename) {
    return;
  }
  for (const type of board.candidates()) {
    const token = KEYWORD_TABLES.get(type)?.filename.find((hint) => filename.includes(hint));
    if (token && board.total(type) >= FILENAME_HINT_MIN_CONTENT) {
      board.add(type, 'filename', FILENAME_HINT_BONUS, `filename hint '${token}' matched`);
    }
  }
}

// ============================================================================
// Legal-domain knowledge
// ============================================================================

export function applyStatuteLayer(facts: DocumentFacts, board: ScoreBoard): void {
  const candidates = board.candidates();
  const legalCandidates = candidates.filter((type) => {
    const category = getCategory(type);
    return category === 'court' || category === 'landlord';
  });

  for (const type of legalCandidates) {
    let applied = 0;
    for (const section of facts.statuteSections) {
      const amount = Math.min(STATUTE_REFERENCE_WEIGHT, STATUTE_REFERENCE_CAP - applied);
      if (amount <= 1e-9) {
        break;
      }
      applied += amount;
      board.add(type, 'statute', amount, `statute '${formatStatuteTerm(section)}' referenced`);
    }
  }

  for (const section of facts.statuteSections) {
    for (const type of findStatute(section)?.types ?? []) {
      if (candidates.includes(type)) {
        board.add(type, 'statute', STATUTE_TYPE_BONUS, `statute '${formatStatuteTerm(section)}' governs ${type}`);
      }
    }
  }
}

// ============================================================================
// Assist signal
// ============================================================================

export function applyAssistSignal(guess: AssistGuess | null | undefined, board: ScoreBoard): void {
  if (!guess || guess.type === 'unknown' || guess.confidence <= 0) {
    return;
  }
  const amount = ASSIST_SIGNAL_WEIGHT * Math.min(1, guess.confidence);
  board.add(guess.type, 'assist', amount, `assist suggested '${guess.type}'`);
}
