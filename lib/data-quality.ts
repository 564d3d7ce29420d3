/**
 * Data Quality Module
 * Review flags for records whose facts deserve a human look, and the
 * coverage summary reported with every run.
 */

import type { ConfidenceLevel, DataSource, FacultyRecord } from '../types/faculty';

// ============ Review Flags ============

export interface ReviewAssessment {
  needsReview: boolean;
  notes: string[];
}

/**
 * Derived only from the record's current facts, so re-running it after any
 * phase gives the same answer.
 */
export function assessRecord(record: FacultyRecord): ReviewAssessment {
  const notes: string[] = [];

  if (record.email?.confidence === 'low') {
    notes.push('Low-confidence email');
  }
  if (record.email?.extractionMethod === 'directory_fuzzy_match') {
    notes.push('Email matched by fuzzy directory lookup');
  }
  if (record.website?.confidence === 'low') {
    notes.push('Low-confidence website');
  }
  if (record.website?.pageType === 'aggregator') {
    notes.push('Website is a citation aggregator');
  }

  return { needsReview: notes.length > 0, notes };
}

/** Returns the number of records flagged. */
export function applyReviewFlags(records: FacultyRecord[]): number {
  let flagged = 0;
  for (const record of records) {
    const { needsReview, notes } = assessRecord(record);
    record.needsReview = needsReview;
    record.reviewNotes = notes.join('; ');
    if (needsReview) flagged++;
  }
  return flagged;
}

// ============ Coverage ============

export interface CoverageSummary {
  totalFaculty: number;
  websitesFound: number;
  websiteCoverage: number;
  emailsFound: number;
  emailCoverage: number;
  highConfidenceEmails: number;
  emailsBySource: Partial<Record<DataSource, number>>;
  emailsByConfidence: Partial<Record<ConfidenceLevel, number>>;
  websitesBySource: Partial<Record<DataSource, number>>;
  websitesByConfidence: Partial<Record<ConfidenceLevel, number>>;
  withResearchTopics: number;
  researchCoverage: number;
  needingReview: number;
}

function ratio(count: number, total: number): number {
  if (total === 0) return 0;
  return Math.round((count / total) * 1000) / 1000;
}

function countBy<K extends string>(values: K[]): Partial<Record<K, number>> {
  const counts: Partial<Record<K, number>> = {};
  for (const value of values) {
    counts[value] = (counts[value] ?? 0) + 1;
  }
  return counts;
}

export function summarizeCoverage(records: FacultyRecord[]): CoverageSummary {
  const total = records.length;
  const emails = records.flatMap((record) => (record.email ? [record.email] : []));
  const websites = records.flatMap((record) => (record.website ? [record.website] : []));
  const withTopics = records.filter((record) => record.research.topics.length > 0).length;

  return {
    totalFaculty: total,
    websitesFound: websites.length,
    websiteCoverage: ratio(websites.length, total),
    emailsFound: emails.length,
    emailCoverage: ratio(emails.length, total),
    highConfidenceEmails: emails.filter((email) => email.confidence === 'high').length,
    emailsBySource: countBy(emails.map((email) => email.source)),
    emailsByConfidence: countBy(emails.map((email) => email.confidence)),
    websitesBySource: countBy(websites.map((website) => website.source)),
    websitesByConfidence: countBy(websites.map((website) => website.confidence)),
    withResearchTopics: withTopics,
    researchCoverage: ratio(withTopics, total),
    needingReview: records.filter((record) => record.needsReview).length,
  };
}
