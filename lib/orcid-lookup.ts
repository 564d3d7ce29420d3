/**
 * ORCID Email Lookup
 * Reads the public email list of an ORCID record. A 404 means the person has
 * no public record or no public email, which is not an error.
 */

import type { EmailFact, FacultyRecord } from '../types/faculty';
import type { PipelineConfig } from './config';
import { HttpStatusError, RateLimitError, ResponseFormatError, getErrorMessage, isRetryableError, withRetry } from './errors';
import { isValidEmailAddress } from './email-patterns';
import { mergeEmailFact } from './fact-merge';
import { logger, type RunMetrics } from './monitoring';
import { fetchWithTimeout, parseRetryAfter } from './page-fetcher';
import type { RateLimiter } from './rate-limiter';
import { orcidEmailResponseSchema } from './schemas/api';

export const ORCID_API_BASE = 'https://pub.orcid.org/v3.0';

const ORCID_ID_PATTERN = /(\d{4}-\d{4}-\d{4}-\d{3}[\dX])/;

/** `https://orcid.org/0000-0002-1825-0097` -> `0000-0002-1825-0097` */
export function extractOrcidId(value: string | null): string | null {
  if (!value) return null;
  return ORCID_ID_PATTERN.exec(value)?.[1] ?? null;
}

export class OrcidEmailLookup {
  requestsMade = 0;

  constructor(
    private readonly config: PipelineConfig,
    private readonly limiter: RateLimiter,
    private readonly metrics: RunMetrics
  ) {}

  async getEmail(orcid: string | null): Promise<EmailFact | null> {
    const orcidId = extractOrcidId(orcid);
    if (!orcidId) return null;

    const emails = await withRetry(() => this.requestEmails(orcidId), {
      maxRetries: Math.max(0, this.config.retry.maxAttempts - 1),
      baseDelayMs: this.config.retry.backoffBaseMs,
      shouldRetry: isRetryableError,
      onRetry: (error, attempt) => {
        logger.debug('Retrying ORCID lookup', { orcidId, attempt, error: error.message });
      },
    });

    const email = emails.map((value) => value.trim().toLowerCase()).find(isValidEmailAddress);
    if (!email) return null;

    return {
      value: email,
      source: 'orcid',
      confidence: 'high',
      extractedFrom: `https://orcid.org/${orcidId}`,
      extractionMethod: 'orcid_api',
      nameMatchScore: 1,
    };
  }

  private async requestEmails(orcidId: string): Promise<string[]> {
    await this.limiter.wait('orcid');

    const url = `${ORCID_API_BASE}/${orcidId}/email`;
    return fetchWithTimeout(
      url,
      { headers: { Accept: 'application/json', 'User-Agent': this.config.catalogUserAgent } },
      this.config.timeouts.orcid,
      async (response) => {
        this.requestsMade++;

        if (response.status === 404) return [];
        if (response.status === 429) throw new RateLimitError('orcid', parseRetryAfter(response));
        if (!response.ok) throw new HttpStatusError(url, response.status);

        const body: unknown = await response.json();
        const parsed = orcidEmailResponseSchema.safeParse(body);
        if (!parsed.success) {
          throw new ResponseFormatError('orcid', parsed.error.issues[0]?.message ?? 'invalid email list');
        }

        return (parsed.data.email ?? []).flatMap((entry) => (entry.email ? [entry.email] : []));
      }
    );
  }

  /** Look up every record that has an ORCID id and no email yet. */
  async lookupEmails(records: FacultyRecord[]): Promise<{ eligible: number; found: number }> {
    const eligible = records.filter((record) => record.orcidId && record.email === null);
    logger.info('ORCID email lookup', { eligible: eligible.length });

    let found = 0;
    for (const [index, record] of eligible.entries()) {
      try {
        const email = await this.getEmail(record.orcidId);
        if (mergeEmailFact(record, email)) {
          found++;
          logger.debug('ORCID email found', { name: record.name, email: email?.value });
        }
      } catch (error) {
        this.metrics.recordItemError('orcid_emails', 'ORCID lookup failed', {
          name: record.name,
          orcid: record.orcidId,
          error: getErrorMessage(error),
        });
      }

      if ((index + 1) % 100 === 0) {
        logger.info('ORCID lookup progress', { processed: index + 1, total: eligible.length, found });
      }
    }

    logger.info('ORCID email lookup complete', { found, eligible: eligible.length, requests: this.requestsMade });
    return { eligible: eligible.length, found };
  }
}
