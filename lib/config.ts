/**
 * Central Configuration Module
 * Builds one immutable configuration object per run from the institution
 * table, environment variables and CLI overrides.
 */

import { z } from 'zod';
import institutionTable from '../config/institutions.json';
import genericEmailPatterns from '../config/generic-email-patterns.json';
import { ConfigurationError } from './errors';

export const PIPELINE_VERSION = '4.5.0';

export interface InstitutionConfig {
  key: string;
  name: string;
  /** Substring that must appear in a catalog author's primary affiliation. */
  shortName: string;
  catalogId: string;
  websiteDomain: string;
  emailDomains: string[];
  directoryUrls: string[];
  skipSites: string[];
  contactPageSites: string[];
}

export interface ThresholdConfig {
  highValueHIndex: number;
  mediumValueHIndex: number;
  minHIndex: number;
  minWorksCount: number;
  maxAffiliations: number;
  fuzzyMatch: number;
  websiteMinScore: number;
  websiteHigh: number;
  websiteMedium: number;
  emailContactPageTrigger: number;
  emailStopScore: number;
  emailHigh: number;
  emailMedium: number;
  emailAcceptCombined: number;
  emailAcceptMailtoName: number;
  emailAcceptName: number;
  fallbackMinNameScore: number;
}

export interface LimitConfig {
  pageSize: number;
  maxPages: number;
  maxQueries: number;
  maxFallbackSearches: number;
  maxContactPages: number;
  searchResultCount: number;
}

/** Minimum spacing between calls to the same external service, in ms. */
export interface DelayConfig {
  search: number;
  scrape: number;
  orcid: number;
  catalog: number;
}

export interface TimeoutConfig {
  page: number;
  orcid: number;
  search: number;
  catalog: number;
}

export interface RetryConfig {
  maxAttempts: number;
  backoffBaseMs: number;
  rateLimitBackoffBaseMs: number;
}

export interface PipelineConfig {
  version: string;
  institution: InstitutionConfig;
  searchApiKey: string | null;
  contactEmail: string;
  pageUserAgent: string;
  catalogUserAgent: string;
  genericEmailPatterns: RegExp[];
  thresholds: ThresholdConfig;
  limits: LimitConfig;
  delays: DelayConfig;
  timeouts: TimeoutConfig;
  retry: RetryConfig;
  sentryDsn: string | null;
}

export interface ConfigOverrides {
  thresholds?: Partial<ThresholdConfig>;
  limits?: Partial<LimitConfig>;
  delays?: Partial<DelayConfig>;
  timeouts?: Partial<TimeoutConfig>;
  retry?: Partial<RetryConfig>;
}

export interface LoadConfigOptions {
  institutionKey: string;
  /** Takes precedence over BRAVE_API_KEY. */
  apiKey?: string | null;
  contactEmail?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

const institutionEntrySchema = z.object({
  name: z.string().min(1),
  shortName: z.string().min(1),
  catalogId: z.string().regex(/^I\d+$/, 'Catalog id must look like I123'),
  websiteDomain: z.string().min(1),
  emailDomains: z.array(z.string().min(1)).min(1),
  directoryUrls: z.array(z.string().url()),
  skipSites: z.array(z.string()),
  contactPageSites: z.array(z.string()),
});

const institutionTableSchema = z.record(institutionEntrySchema);

const DEFAULT_CONTACT_EMAIL = 'research-pipeline@example.org';

const PAGE_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export const DEFAULT_THRESHOLDS: ThresholdConfig = {
  highValueHIndex: 40,
  mediumValueHIndex: 20,
  minHIndex: 10,
  minWorksCount: 30,
  maxAffiliations: 15,
  fuzzyMatch: 0.85,
  websiteMinScore: 0.15,
  websiteHigh: 0.5,
  websiteMedium: 0.3,
  emailContactPageTrigger: 0.5,
  emailStopScore: 0.6,
  emailHigh: 0.6,
  emailMedium: 0.4,
  emailAcceptCombined: 0.4,
  emailAcceptMailtoName: 0.25,
  emailAcceptName: 0.35,
  fallbackMinNameScore: 0.3,
};

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function emptyToNull(value: string | null | undefined): string | null {
  if (value === undefined || value === null) return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

export function listInstitutions(): string[] {
  return Object.keys(institutionTableSchema.parse(institutionTable));
}

export function getInstitution(key: string): InstitutionConfig {
  const parsed = institutionTableSchema.safeParse(institutionTable);
  if (!parsed.success) {
    throw new ConfigurationError('Institution table is invalid', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const normalizedKey = key.trim().toLowerCase();
  const entry = parsed.data[normalizedKey];
  if (!entry) {
    throw new ConfigurationError(`Unknown institution: ${key}`, {
      available: Object.keys(parsed.data),
    });
  }
  return { key: normalizedKey, ...entry };
}

export function loadConfig(options: LoadConfigOptions): PipelineConfig {
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};
  const institution = getInstitution(options.institutionKey);
  const contactEmail =
    emptyToNull(options.contactEmail) ?? emptyToNull(env.OPENALEX_CONTACT_EMAIL) ?? DEFAULT_CONTACT_EMAIL;

  return {
    version: PIPELINE_VERSION,
    institution,
    searchApiKey: options.apiKey !== undefined ? emptyToNull(options.apiKey) : emptyToNull(env.BRAVE_API_KEY),
    contactEmail,
    pageUserAgent: PAGE_USER_AGENT,
    catalogUserAgent: `FacultyPipeline/${PIPELINE_VERSION} (mailto:${contactEmail})`,
    genericEmailPatterns: genericEmailPatterns.map((pattern) => new RegExp(pattern, 'i')),
    thresholds: { ...DEFAULT_THRESHOLDS, ...overrides.thresholds },
    limits: {
      pageSize: 200,
      maxPages: 100,
      maxQueries: parseNumber(env.PIPELINE_MAX_QUERIES, 5000),
      maxFallbackSearches: parseNumber(env.PIPELINE_MAX_FALLBACK_SEARCHES, 100),
      maxContactPages: 7,
      searchResultCount: 10,
      ...overrides.limits,
    },
    delays: {
      search: parseNumber(env.PIPELINE_SEARCH_DELAY_MS, 600),
      scrape: parseNumber(env.PIPELINE_SCRAPE_DELAY_MS, 300),
      orcid: parseNumber(env.PIPELINE_ORCID_DELAY_MS, 200),
      catalog: 100,
      ...overrides.delays,
    },
    timeouts: {
      page: 15000,
      orcid: 10000,
      search: 15000,
      catalog: 30000,
      ...overrides.timeouts,
    },
    retry: {
      maxAttempts: 3,
      backoffBaseMs: 1000,
      rateLimitBackoffBaseMs: 2000,
      ...overrides.retry,
    },
    sentryDsn: emptyToNull(env.SENTRY_DSN),
  };
}
