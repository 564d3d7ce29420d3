/**
 * Fallback Email Search
 *
 * Last resort for records that have a website but still no email: two
 * targeted queries whose result titles and snippets are scanned for an
 * address. Result pages themselves are never fetched.
 */

import type { EmailFact, FacultyRecord } from '../types/faculty';
import type { PipelineConfig } from './config';
import { extractEmailsFromText, isAcceptableEmail } from './email-patterns';
import { mergeEmailFact } from './fact-merge';
import { logger } from './monitoring';
import { emailNameScore } from './name-matcher';
import type { WebSearch } from './search-client';

export type FallbackBatchSummary = {
  eligible: number;
  searched: number;
  found: number;
  stoppedForQuota: boolean;
};

export function buildFallbackQueries(name: string, websiteDomain: string): string[] {
  return [`"${name}" email site:${websiteDomain}`, `"${name}" contact site:${websiteDomain}`];
}

export class FallbackEmailSearch {
  constructor(
    private readonly config: PipelineConfig,
    private readonly search: WebSearch
  ) {}

  async searchEmail(name: string): Promise<EmailFact | null> {
    if (this.search.quotaExhausted) return null;

    const { institution, thresholds, genericEmailPatterns } = this.config;

    for (const query of buildFallbackQueries(name, institution.websiteDomain)) {
      const results = await this.search.search(query);
      if (this.search.quotaExhausted) break;

      for (const result of results) {
        for (const email of extractEmailsFromText(`${result.title} ${result.description}`)) {
          if (!isAcceptableEmail(email, institution.emailDomains, genericEmailPatterns)) continue;

          const nameScore = emailNameScore(email, name);
          if (nameScore < thresholds.fallbackMinNameScore) continue;

          return {
            value: email,
            source: 'fallback',
            confidence: 'medium',
            extractedFrom: result.url,
            extractionMethod: 'fallback_search',
            nameMatchScore: nameScore,
          };
        }
      }
    }

    return null;
  }

  /** Highest h-index first, capped at the configured number of records. */
  async searchEmails(records: FacultyRecord[]): Promise<FallbackBatchSummary> {
    const eligible = records
      .filter((record) => record.website !== null && record.email === null)
      .sort((a, b) => b.hIndex - a.hIndex)
      .slice(0, this.config.limits.maxFallbackSearches);

    logger.info('Fallback email search', { eligible: eligible.length });

    const summary: FallbackBatchSummary = { eligible: eligible.length, searched: 0, found: 0, stoppedForQuota: false };

    for (const [index, record] of eligible.entries()) {
      if (this.search.quotaExhausted) {
        summary.stoppedForQuota = true;
        logger.warn('Quota exhausted, stopping fallback search', { processed: index, total: eligible.length });
        break;
      }

      const email = await this.searchEmail(record.name);
      summary.searched++;
      if (mergeEmailFact(record, email)) {
        summary.found++;
        logger.debug('Fallback email found', { name: record.name, email: email?.value });
      }

      if ((index + 1) % 25 === 0) {
        logger.info('Fallback search progress', { processed: index + 1, total: eligible.length, found: summary.found });
      }
    }

    if (this.search.quotaExhausted) summary.stoppedForQuota = true;

    logger.info('Fallback email search complete', summary);
    return summary;
  }
}
