/**
 * Bibliometric Extractor
 *
 * Pages through the OpenAlex authors endpoint for one institution and turns
 * each qualifying author into a seed FacultyRecord. Any page that still fails
 * after retries aborts the run: a partial seed population is not useful.
 */

import type { FacultyRecord, ResearchProfile } from '../types/faculty';
import type { PipelineConfig } from './config';
import {
  CatalogRequestError,
  HttpStatusError,
  RateLimitError,
  ResponseFormatError,
  getErrorMessage,
  isRetryableError,
  withRetry,
} from './errors';
import { logger } from './monitoring';
import { fetchWithTimeout, parseRetryAfter } from './page-fetcher';
import type { RateLimiter } from './rate-limiter';
import { catalogAuthorSchema, catalogPageSchema, type CatalogAuthor } from './schemas/api';

export const CATALOG_BASE_URL = 'https://api.openalex.org';

const MAX_TOPICS = 10;
const MAX_CONCEPTS = 5;
const MAX_FIELDS = 5;
const MAX_KEYWORDS = 15;

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function parseResearchProfile(author: CatalogAuthor): ResearchProfile {
  const topics = (author.topics ?? [])
    .slice(0, 15)
    .flatMap((topic) => (topic.display_name ? [{ name: topic.display_name, score: round3(topic.score ?? 0) }] : []));

  const rawConcepts = author.x_concepts ?? [];
  const concepts = rawConcepts
    .slice(0, 10)
    .flatMap((concept) =>
      concept.display_name
        ? [{ name: concept.display_name, level: concept.level ?? 0, score: round3(concept.score ?? 0) }]
        : []
    );
  const fields = rawConcepts
    .flatMap((concept) => (concept.level === 0 && concept.display_name ? [concept.display_name] : []))
    .slice(0, MAX_FIELDS);

  const keywords =
    topics.length > 0
      ? topics.map((topic) => topic.name)
      : concepts.filter((concept) => concept.level >= 1).map((concept) => concept.name);

  return {
    topics: topics.slice(0, MAX_TOPICS),
    concepts: concepts.slice(0, MAX_CONCEPTS),
    fields,
    keywords: keywords.slice(0, MAX_KEYWORDS),
  };
}

export class BibliometricExtractor {
  constructor(
    private readonly config: PipelineConfig,
    private readonly limiter: RateLimiter
  ) {}

  pageUrl(page: number): string {
    const params = new URLSearchParams({
      filter: `last_known_institutions.id:${this.config.institution.catalogId}`,
      per_page: String(this.config.limits.pageSize),
      page: String(page),
      mailto: this.config.contactEmail,
    });
    return `${CATALOG_BASE_URL}/authors?${params.toString()}`;
  }

  /**
   * Convert one catalog author into a seed record, or null when it fails the
   * shape check, the affiliation filters or the minimum-signal filter.
   */
  toFacultyRecord(raw: unknown, extractionDate: string): FacultyRecord | null {
    const parsed = catalogAuthorSchema.safeParse(raw);
    if (!parsed.success) {
      logger.debug('Skipping malformed catalog author', { issue: parsed.error.issues[0]?.message });
      return null;
    }
    const author = parsed.data;
    const { institution, thresholds } = this.config;

    const affiliations = author.last_known_institutions ?? [];
    if (affiliations.length === 0) return null;

    const primary = affiliations[0].display_name ?? '';
    if (!primary.includes(institution.shortName)) return null;
    if (affiliations.length > thresholds.maxAffiliations) return null;

    const hIndex = author.summary_stats?.h_index ?? 0;
    const worksCount = author.works_count;
    if (hIndex < thresholds.minHIndex && worksCount < thresholds.minWorksCount) return null;

    return {
      name: author.display_name.trim(),
      bibliometricId: author.id ?? null,
      orcidId: author.orcid ?? null,
      institution: institution.name,
      institutionId: institution.catalogId,
      hIndex,
      i10Index: author.summary_stats?.i10_index ?? 0,
      worksCount,
      citedByCount: author.cited_by_count,
      research: parseResearchProfile(author),
      email: null,
      website: null,
      extractionDate,
      needsReview: false,
      reviewNotes: '',
    };
  }

  async extract(maxRecords: number | null = null): Promise<FacultyRecord[]> {
    const { institution, limits } = this.config;
    const extractionDate = new Date().toISOString();
    const records: FacultyRecord[] = [];
    const limitReached = () => maxRecords !== null && records.length >= maxRecords;

    logger.info('Extracting faculty from catalog', { institution: institution.name, maxRecords });

    for (let page = 1; page <= limits.maxPages && !limitReached(); page++) {
      const results = await this.fetchPage(page);
      if (results.length === 0) break;

      for (const raw of results) {
        if (limitReached()) break;
        const record = this.toFacultyRecord(raw, extractionDate);
        if (record) records.push(record);
      }

      logger.info('Catalog page processed', { page, records: records.length });
    }

    records.sort((a, b) => b.hIndex - a.hIndex);

    const withOrcid = records.filter((record) => record.orcidId).length;
    logger.info('Catalog extraction complete', { records: records.length, withOrcid });
    return records;
  }

  private async fetchPage(page: number): Promise<unknown[]> {
    const url = this.pageUrl(page);

    try {
      return await withRetry(() => this.requestPage(url), {
        maxRetries: Math.max(0, this.config.retry.maxAttempts - 1),
        baseDelayMs: this.config.retry.backoffBaseMs,
        shouldRetry: isRetryableError,
        onRetry: (error, attempt) => {
          logger.warn('Catalog request failed, retrying', { page, attempt, error: error.message });
        },
      });
    } catch (error) {
      throw new CatalogRequestError(url, error instanceof Error ? error : new Error(getErrorMessage(error)));
    }
  }

  private async requestPage(url: string): Promise<unknown[]> {
    await this.limiter.wait('catalog');

    return fetchWithTimeout(
      url,
      { headers: { 'User-Agent': this.config.catalogUserAgent, Accept: 'application/json' } },
      this.config.timeouts.catalog,
      async (response) => {
        if (response.status === 429) {
          throw new RateLimitError('catalog', parseRetryAfter(response));
        }
        if (!response.ok) {
          throw new HttpStatusError(url, response.status);
        }

        const body: unknown = await response.json();
        const parsed = catalogPageSchema.safeParse(body);
        if (!parsed.success) {
          throw new ResponseFormatError('catalog', parsed.error.issues[0]?.message ?? 'invalid page');
        }
        return parsed.data.results;
      }
    );
  }
}
