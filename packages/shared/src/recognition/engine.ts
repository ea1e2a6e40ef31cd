/**
 * Recognition Engine
 *
 * Scores raw text against every document type through the recognition
 * layers, normalizes by the per-type ceiling and picks the best type. Ties
 * go to the fixed type priority. The engine never throws for any input.
 */

import { toIsoDay } from '../calendar';
import { amountExtractor } from '../extractors/amounts';
import { caseNumberExtractor } from '../extractors/case-numbers';
import { dateExtractor } from '../extractors/dates';
import { statuteExtractor } from '../extractors/statutes';
import { logger } from '../logger';
import { MIN_CLASSIFICATION_CONFIDENCE } from '../patterns/document-patterns';
import { DOCUMENT_TYPE_PROFILES, TYPE_PRIORITY } from '../patterns/document-types';
import { LEGAL_TERMS, formatStatuteTerm } from '../patterns/legal-knowledge';
import type { Classification, DocumentType } from '../types';
import { findDaysToRespond, resolveDeadline } from './deadlines';
import {
  applyAssistSignal,
  applyContextLayer,
  applyCrossSignalLayer,
  applyFilenameLayer,
  applyKeywordLayer,
  applyStatuteLayer,
  applyStructureLayer,
  type AssistGuess,
  type DocumentFacts,
} from './layers';
import { ScoreBoard } from './score-board';
import { computeUrgency } from './urgency';

export interface RecognizeOptions {
  /** Day deadlines are measured from; defaults to now */
  referenceDate?: Date;
  /** Optional external guess, added as one more weighted signal */
  assist?: AssistGuess | null;
}

const PARTY_PAIR = [/\bplaintiffs?\b/i, /\bdefendants?\b/i];
const RESPONSE_PHRASE = /\bwithin\s+[a-z0-9-]+(?:\s*\(\s*\d{1,2}\s*\))?\s+(?:business\s+|calendar\s+)?days?\b/i;

function unique(values: readonly string[]): string[] {
  return Array.from(new Set(values));
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function roundConfidence(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function collectFacts(text: string, filename: string): DocumentFacts {
  return {
    text,
    lower: text.toLowerCase(),
    filename,
    caseNumbers: unique(caseNumberExtractor.extract(text).map((entity) => entity.value)),
    statuteSections: unique(
      statuteExtractor
        .extract(text)
        .filter((entity) => entity.rule === 'mn_504b')
        .map((entity) => entity.value)
    ),
    hasJudgmentAmount: amountExtractor.extract(text).some((entity) => entity.context_label === 'Judgment Amount'),
    hasPartyPair: PARTY_PAIR.every((pattern) => pattern.test(text)),
    hasResponsePhrase: RESPONSE_PHRASE.test(text),
  };
}

function findKeyTerms(facts: DocumentFacts): string[] {
  const statutes = facts.statuteSections.map(formatStatuteTerm);
  const terms = LEGAL_TERMS.filter((term) => term.matcher.test(facts.lower)).map((term) => term.term);
  return [...statutes, ...terms];
}

export interface TypeDecision {
  type: DocumentType;
  confidence: number;
  reasoning: string[];
  signalsCount: number;
}

/**
 * Best candidate by normalized score. Equal scores keep the type that comes
 * first in the fixed priority order, so court types win ties.
 */
export function decideDocumentType(board: ScoreBoard): TypeDecision {
  let bestType: DocumentType | null = null;
  let bestScore = 0;

  for (const type of TYPE_PRIORITY) {
    if (!board.isCandidate(type)) {
      continue;
    }
    const score = clamp01(board.total(type) / DOCUMENT_TYPE_PROFILES[type].ceiling);
    if (bestType === null || score > bestScore) {
      bestType = type;
      bestScore = score;
    }
  }

  if (bestType === null) {
    return { type: 'unknown', confidence: 0, reasoning: ['no document type signals found'], signalsCount: 0 };
  }

  const contributions = board.contributions(bestType);
  const reasoning = contributions.map((contribution) => contribution.reason);

  if (bestScore < MIN_CLASSIFICATION_CONFIDENCE) {
    reasoning.push(
      `best match '${bestType}' scored ${bestScore.toFixed(2)}, below the ${MIN_CLASSIFICATION_CONFIDENCE.toFixed(2)} threshold`
    );
    return { type: 'unknown', confidence: roundConfidence(bestScore), reasoning, signalsCount: contributions.length };
  }

  return { type: bestType, confidence: roundConfidence(bestScore), reasoning, signalsCount: contributions.length };
}

function emptyClassification(reason: string): Classification {
  const profile = DOCUMENT_TYPE_PROFILES.unknown;
  return {
    category: profile.category,
    type: 'unknown',
    confidence: 0,
    title: profile.title,
    summary: profile.summary,
    urgency: profile.defaultUrgency,
    reasoning_chain: [reason],
    key_terms: [],
    case_numbers: [],
    has_deadline: false,
    deadline_date: null,
    days_to_respond: null,
    signals_count: 0,
  };
}

function classify(text: string, filename: string, options: RecognizeOptions): Classification {
  if (text.trim().length === 0) {
    return emptyClassification('empty document text');
  }

  const facts = collectFacts(text, filename);
  const board = new ScoreBoard();

  applyKeywordLayer(facts, board);
  applyStructureLayer(facts, board);
  applyContextLayer(facts, board);
  applyCrossSignalLayer(facts, board);
  applyFilenameLayer(facts, board);
  applyStatuteLayer(facts, board);
  applyAssistSignal(options.assist, board);

  const decision = decideDocumentType(board);
  const profile = DOCUMENT_TYPE_PROFILES[decision.type];

  const referenceDay = toIsoDay(options.referenceDate ?? new Date());
  const daysToRespond = findDaysToRespond(text);
  const deadline = resolveDeadline(dateExtractor.extract(text), daysToRespond, referenceDay);
  const primaryCaseNumber = facts.caseNumbers[0];

  return {
    category: profile.category,
    type: decision.type,
    confidence: decision.confidence,
    title: primaryCaseNumber ? `${profile.title} - Case ${primaryCaseNumber}` : profile.title,
    summary: profile.summary,
    urgency: computeUrgency(decision.type, deadline.daysUntil),
    reasoning_chain: decision.reasoning,
    key_terms: findKeyTerms(facts),
    case_numbers: [...facts.caseNumbers],
    has_deadline: deadline.deadlineDate !== null,
    deadline_date: deadline.deadlineDate,
    days_to_respond: daysToRespond,
    signals_count: decision.signalsCount,
  };
}

/**
 * Recognize the document type of raw text.
 *
 * @param filename - weak hint only; never decides a type on its own
 */
export function recognize(text: string, filename: string, options: RecognizeOptions = {}): Classification {
  try {
    const classification = classify(text, filename, options);

    logger.debug('Document recognized', {
      filename,
      document_type: classification.type,
      confidence: classification.confidence,
      urgency: classification.urgency,
      signals_count: classification.signals_count,
    });

    return classification;
  } catch (error) {
    logger.error('Recognition failed, reporting unknown', error, { filename });
    return emptyClassification('recognition failed');
  }
}
