/**
 * Merge rule for extracted facts: a record's email or website is written
 * only when it has none, or when the new fact is strictly more confident.
 */

import { CONFIDENCE_LEVELS, type ConfidenceLevel, type EmailFact, type FacultyRecord, type WebsiteFact } from '../types/faculty';

export function confidenceRank(level: ConfidenceLevel): number {
  return CONFIDENCE_LEVELS.indexOf(level);
}

export function isMoreConfident(candidate: ConfidenceLevel, current: ConfidenceLevel): boolean {
  return confidenceRank(candidate) > confidenceRank(current);
}

function shouldReplace(current: { confidence: ConfidenceLevel } | null, candidate: { confidence: ConfidenceLevel }): boolean {
  return current === null || isMoreConfident(candidate.confidence, current.confidence);
}

/** Returns true when the record was updated. */
export function mergeEmailFact(record: FacultyRecord, fact: EmailFact | null): boolean {
  if (!fact || !shouldReplace(record.email, fact)) return false;
  record.email = fact;
  return true;
}

/** Returns true when the record was updated. */
export function mergeWebsiteFact(record: FacultyRecord, fact: WebsiteFact | null): boolean {
  if (!fact || !shouldReplace(record.website, fact)) return false;
  record.website = fact;
  return true;
}
