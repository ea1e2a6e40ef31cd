/**
 * Recognition Module
 */

export { recognize, collectFacts, decideDocumentType, type TypeDecision, type RecognizeOptions } from './engine';
export { ScoreBoard, formatAmount, type Contribution, type ScoreLayer } from './score-board';
export { CROSS_SIGNAL_RULES, type AssistGuess, type DocumentFacts } from './layers';
export { findDaysToRespond, resolveDeadline, DEADLINE_DATE_LABELS, type DeadlineResolution } from './deadlines';
export { baseUrgency, computeUrgency, DEADLINE_ESCALATIONS } from './urgency';
