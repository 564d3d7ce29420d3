/**
 * Website Discovery
 *
 * Finds a personal or lab homepage for each researcher by running a few web
 * searches and scoring the returned URLs. The directory cache is consulted
 * first so that search quota is spent only on people it does not cover.
 */

import type { FacultyRecord, PageType, WebsiteFact } from '../types/faculty';
import type { InstitutionConfig, PipelineConfig, ThresholdConfig } from './config';
import type { DirectoryScraper } from './directory-scraper';
import { mergeWebsiteFact } from './fact-merge';
import { logger } from './monitoring';
import { getNameParts } from './name-matcher';
import type { SearchResult, WebSearch } from './search-client';

// ============ Denylists ============

const HARD_DENYLIST = [
  'facebook.com',
  'twitter.com',
  'x.com',
  'instagram.com',
  'linkedin.com',
  'tiktok.com',
  'youtube.com',
  'doi.org',
  'pubmed.ncbi.nlm.nih.gov',
  'arxiv.org',
  'biorxiv.org',
  'wikipedia.org',
  'amazon.com',
];

const URL_PATTERN_DENYLIST = [
  '/login',
  '/signin',
  '/auth',
  '/course/',
  '/courses/',
  '/news/article',
  '/press-release',
  '.pdf',
  '.doc',
  '.ppt',
  '/search?',
  '/tag/',
  '/category/',
  '/event/',
];

/** Citation aggregators: allowed, but penalized and never scraped for email. */
const AGGREGATOR_DOMAINS = [
  'research.com',
  'researchgate.net',
  'academia.edu',
  'semanticscholar.org',
  'scholar.google.com',
  'aminer.org',
];

const PUBLICATION_PATTERNS = ['/pubs', '/publications/', '/papers/'];

const PERSONAL_PAGE_PATTERNS = [
  '/~',
  '/people/',
  '/faculty/',
  '/profile/',
  '/lab/',
  '/labs/',
  '/group/',
  'people.',
  'scholar.',
  '/person/',
  '/staff/',
];

const HOMEPAGE_KEYWORDS = [
  'publications',
  'research',
  'teaching',
  'cv',
  'curriculum vitae',
  'students',
  'lab',
  'group',
  'contact',
  'about',
  'bio',
  'projects',
];

const LISTING_SUFFIXES = ['/people', '/faculty', '/directory', '/staff'];

// ============ Scoring ============

export interface ScoredCandidate {
  url: string;
  score: number;
  signals: string[];
  pageType: PageType;
}

export interface WebsiteBatchSummary {
  directoryHits: number;
  eligible: number;
  trimmedForBudget: number;
  searched: number;
  found: number;
  stoppedForQuota: boolean;
}

export function isHardDenied(url: string): boolean {
  const lower = url.toLowerCase();
  return HARD_DENYLIST.some((domain) => lower.includes(domain)) || URL_PATTERN_DENYLIST.some((pattern) => lower.includes(pattern));
}

export function classifyPageType(url: string, websiteDomain: string): { pageType: PageType; modifier: number } {
  const lower = url.toLowerCase();

  if (AGGREGATOR_DOMAINS.some((domain) => lower.includes(domain))) return { pageType: 'aggregator', modifier: -0.4 };
  if (PUBLICATION_PATTERNS.some((pattern) => lower.includes(pattern))) return { pageType: 'publications', modifier: -0.2 };
  if (PERSONAL_PAGE_PATTERNS.some((pattern) => lower.includes(pattern))) return { pageType: 'personal', modifier: 0.1 };
  if (websiteDomain && lower.includes(websiteDomain)) return { pageType: 'department', modifier: 0.05 };
  return { pageType: 'unknown', modifier: 0 };
}

/** Score one search hit for a person, before the rank bonus. */
export function scoreSearchResult(result: SearchResult, name: string, websiteDomain: string): ScoredCandidate {
  const url = result.url.toLowerCase();
  const title = result.title.toLowerCase();
  const combined = `${title} ${result.description.toLowerCase()}`;

  let score = 0;
  const signals: string[] = [];

  const { pageType, modifier } = classifyPageType(url, websiteDomain);
  score += modifier;
  if (modifier !== 0) signals.push(`type:${pageType}`);

  if (websiteDomain && url.includes(websiteDomain)) {
    score += 0.4;
    signals.push('institution_domain');
  }

  if (url.includes('.edu')) {
    score += 0.2;
    signals.push('edu_domain');
  }

  if (url.includes('/~')) {
    score += 0.35;
    signals.push('tilde_url');
  } else if (['/people/', '/faculty/', '/profile/'].some((pattern) => url.includes(pattern))) {
    score += 0.2;
    signals.push('profile_url');
  } else if (['/lab/', '/labs/', '/group/'].some((pattern) => url.includes(pattern))) {
    score += 0.15;
    signals.push('lab_url');
  }

  const { first, last } = getNameParts(name);
  if (last.length > 2) {
    if (url.includes(last)) {
      score += 0.25;
      signals.push('lastname_in_url');
    }
    if (title.includes(last)) {
      score += 0.15;
      signals.push('lastname_in_title');
    }
  }
  if (first.length > 2 && title.includes(first)) {
    score += 0.1;
    signals.push('firstname_in_title');
  }
  if (name && title.includes(name.toLowerCase())) {
    score += 0.2;
    signals.push('fullname_in_title');
  }

  const keywordCount = HOMEPAGE_KEYWORDS.filter((keyword) => combined.includes(keyword)).length;
  if (keywordCount >= 2) {
    score += 0.1;
    signals.push(`keywords:${keywordCount}`);
  }

  const trimmed = url.replace(/\/+$/, '');
  if (LISTING_SUFFIXES.some((suffix) => trimmed.endsWith(suffix))) {
    score -= 0.3;
    signals.push('generic_listing');
  }

  return { url: result.url, score, signals, pageType };
}

/** Earlier results get up to +0.045; rank is 1-based within its query. */
export function rankBonus(rank: number): number {
  return (0.05 * (10 - rank)) / 10;
}

export function buildWebsiteQueries(
  record: Pick<FacultyRecord, 'name' | 'hIndex'>,
  institution: InstitutionConfig,
  highValueHIndex: number
): string[] {
  const queries: string[] = [];
  if (institution.websiteDomain) {
    queries.push(`"${record.name}" site:${institution.websiteDomain}`);
  }
  if (record.hIndex >= highValueHIndex) {
    queries.push(`"${record.name}" ${institution.name} professor homepage`);
    queries.push(`"${record.name}" ${institution.name} lab research group`);
  }
  return queries;
}

/** Best candidate as a fact, or null when it misses the acceptance floor. */
export function selectWebsite(candidates: ScoredCandidate[], thresholds: ThresholdConfig): WebsiteFact | null {
  if (candidates.length === 0) return null;

  const best = [...candidates].sort((a, b) => b.score - a.score)[0];
  if (best.score < thresholds.websiteMinScore) return null;

  const confidence =
    best.score >= thresholds.websiteHigh ? 'high' : best.score >= thresholds.websiteMedium ? 'medium' : 'low';

  return {
    value: best.url,
    source: 'search',
    confidence,
    score: best.score,
    signals: best.signals,
    pageType: best.pageType,
  };
}

/**
 * Records to search, highest h-index first. Records below the medium tier
 * are not searched; the lowest-priority ones are dropped until the estimated
 * query count fits the budget.
 */
export function planWebsiteBatch(
  records: FacultyRecord[],
  institution: InstitutionConfig,
  thresholds: ThresholdConfig,
  queryBudget: number
): { batch: FacultyRecord[]; trimmed: number; estimatedQueries: number } {
  const eligible = records
    .filter((record) => record.website === null && record.hIndex >= thresholds.mediumValueHIndex)
    .sort((a, b) => b.hIndex - a.hIndex);

  const cost = (record: FacultyRecord) => buildWebsiteQueries(record, institution, thresholds.highValueHIndex).length;
  let estimatedQueries = eligible.reduce((sum, record) => sum + cost(record), 0);

  const batch = [...eligible];
  while (batch.length > 0 && estimatedQueries > queryBudget) {
    const dropped = batch.pop();
    if (dropped) estimatedQueries -= cost(dropped);
  }

  return { batch, trimmed: eligible.length - batch.length, estimatedQueries };
}

function normalizeUrlKey(url: string): string {
  return url.toLowerCase().replace(/\/+$/, '');
}

export class WebsiteDiscovery {
  constructor(
    private readonly config: PipelineConfig,
    private readonly search: WebSearch
  ) {}

  async findWebsite(record: Pick<FacultyRecord, 'name' | 'hIndex'>): Promise<WebsiteFact | null> {
    if (this.search.quotaExhausted) return null;

    const { institution, thresholds } = this.config;
    const seen = new Set<string>();
    const candidates: ScoredCandidate[] = [];

    for (const query of buildWebsiteQueries(record, institution, thresholds.highValueHIndex)) {
      const results = await this.search.search(query);
      if (this.search.quotaExhausted) break;

      results.forEach((result, index) => {
        const key = normalizeUrlKey(result.url);
        if (seen.has(key)) return;
        seen.add(key);
        if (isHardDenied(result.url)) return;

        const scored = scoreSearchResult(result, record.name, institution.websiteDomain);
        candidates.push({ ...scored, score: scored.score + rankBonus(index + 1) });
      });
    }

    return selectWebsite(candidates, thresholds);
  }

  /** Fill missing websites from the directory cache, then from search. */
  async discoverWebsites(records: FacultyRecord[], directory: DirectoryScraper | null = null): Promise<WebsiteBatchSummary> {
    const { institution, thresholds, limits } = this.config;

    let directoryHits = 0;
    if (directory) {
      for (const record of records) {
        if (record.website) continue;
        const match = directory.lookupWebsite(record.name);
        if (!match) continue;
        const fact: WebsiteFact = {
          value: match.url,
          source: 'directory',
          confidence: match.confidence,
          score: match.matchScore,
          signals: ['directory_cache'],
          pageType: classifyPageType(match.url, institution.websiteDomain).pageType,
        };
        if (mergeWebsiteFact(record, fact)) directoryHits++;
      }
      logger.info('Directory website hits', { hits: directoryHits });
    }

    const budget = Math.max(0, limits.maxQueries - this.search.queriesUsed);
    const { batch, trimmed, estimatedQueries } = planWebsiteBatch(records, institution, thresholds, budget);
    logger.info('Website search planned', { records: batch.length, trimmed, estimatedQueries, budget });

    const summary: WebsiteBatchSummary = {
      directoryHits,
      eligible: batch.length + trimmed,
      trimmedForBudget: trimmed,
      searched: 0,
      found: 0,
      stoppedForQuota: false,
    };

    for (const [index, record] of batch.entries()) {
      if (this.search.quotaExhausted) {
        summary.stoppedForQuota = true;
        logger.warn('Quota exhausted, stopping website discovery', { processed: index, total: batch.length });
        break;
      }

      const website = await this.findWebsite(record);
      summary.searched++;
      if (mergeWebsiteFact(record, website)) {
        summary.found++;
        logger.debug('Website found', { name: record.name, url: website?.value, confidence: website?.confidence });
      }

      if ((index + 1) % 25 === 0) {
        logger.info('Website discovery progress', { processed: index + 1, total: batch.length, found: summary.found });
      }
    }

    if (this.search.quotaExhausted) summary.stoppedForQuota = true;

    const withWebsite = records.filter((record) => record.website).length;
    logger.info('Website discovery complete', { withWebsite, total: records.length, ...summary });
    return summary;
  }
}
