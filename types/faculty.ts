// Ordered lowest to highest; index is the rank used by the merge rule.
export const CONFIDENCE_LEVELS = ['unknown', 'low', 'medium', 'high'] as const;
export type ConfidenceLevel = (typeof CONFIDENCE_LEVELS)[number];

export const DATA_SOURCES = [
  'openalex',
  'orcid',
  'directory',
  'search',
  'website',
  'fallback',
  'unknown',
] as const;
export type DataSource = (typeof DATA_SOURCES)[number];

export const EMAIL_METHODS = [
  'orcid_api',
  'directory_exact_match',
  'directory_fuzzy_match',
  'mailto',
  'regex',
  'obfuscated',
  'contact_page',
  'fallback_search',
] as const;
export type EmailExtractionMethod = (typeof EMAIL_METHODS)[number];

export const PAGE_TYPES = ['personal', 'department', 'publications', 'aggregator', 'unknown'] as const;
export type PageType = (typeof PAGE_TYPES)[number];

export interface ResearchTopic {
  name: string;
  score: number;
}

export interface ResearchConcept {
  name: string;
  level: number;
  score: number;
}

export interface ResearchProfile {
  topics: ResearchTopic[];
  concepts: ResearchConcept[];
  fields: string[];
  keywords: string[];
  description?: string;
}

export interface EmailFact {
  value: string;
  source: DataSource;
  confidence: ConfidenceLevel;
  extractedFrom: string;
  extractionMethod: EmailExtractionMethod;
  nameMatchScore: number;
}

export interface WebsiteFact {
  value: string;
  source: DataSource;
  confidence: ConfidenceLevel;
  score: number;
  signals: string[];
  pageType: PageType;
}

export interface FacultyRecord {
  readonly name: string;
  bibliometricId: string | null;
  orcidId: string | null;
  institution: string;
  institutionId: string;
  hIndex: number;
  i10Index: number;
  worksCount: number;
  citedByCount: number;
  research: ResearchProfile;
  email: EmailFact | null;
  website: WebsiteFact | null;
  extractionDate: string;
  needsReview: boolean;
  reviewNotes: string;
}


/** Normalized name -> contact data scraped from institutional listing pages. */
export interface DirectoryCache {
  emails: Record<string, string>;
  websites: Record<string, string>;
}

/** Pipeline phases in execution order. */
export const PIPELINE_PHASES = [
  'extract',
  'directories',
  'websites',
  'orcid_emails',
  'website_emails',
  'fallback_emails',
] as const;
export type PipelinePhase = (typeof PIPELINE_PHASES)[number];

export interface CheckpointExtra {
  directoryCache?: DirectoryCache;
}

export interface CheckpointSnapshot {
  phase: PipelinePhase;
  timestamp: string;
  institution: string;
  records: FacultyRecord[];
  extra: CheckpointExtra;
}
