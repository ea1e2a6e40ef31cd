/**
 * Urgency: the type default, raised for court documents and escalated by
 * how close the deadline is. Escalation never lowers the level.
 */

import type { DocumentType, UrgencyLevel } from '../types';
import { DOCUMENT_TYPE_PROFILES, moreSevere } from '../patterns/document-types';

interface DeadlineEscalation {
  maxDays: number;
  level: UrgencyLevel;
}

/** Ordered; the first bound the deadline falls within applies. Past deadlines count as 0 days. */
export const DEADLINE_ESCALATIONS: readonly DeadlineEscalation[] = [
  { maxDays: 3, level: 'critical' },
  { maxDays: 7, level: 'high' },
  { maxDays: 14, level: 'medium' },
];

export function baseUrgency(type: DocumentType): UrgencyLevel {
  const profile = DOCUMENT_TYPE_PROFILES[type];
  if (profile.category === 'court') {
    return moreSevere(profile.defaultUrgency, 'high');
  }
  return profile.defaultUrgency;
}

export function computeUrgency(type: DocumentType, daysUntilDeadline: number | null): UrgencyLevel {
  const base = baseUrgency(type);
  if (daysUntilDeadline === null) {
    return base;
  }
  const escalation = DEADLINE_ESCALATIONS.find((rule) => daysUntilDeadline <= rule.maxDays);
  return escalation ? moreSevere(base, escalation.level) : base;
}
