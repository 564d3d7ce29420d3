/**
 * Website Email Extractor
 *
 * Pulls a person's address from their discovered page: mailto links, plain
 * addresses in the visible text and de-obfuscated spellings. When nothing
 * convincing turns up, or the host is known to hide addresses on the main
 * page, linked contact pages are fetched as well.
 */

import type { ConfidenceLevel, EmailFact, EmailExtractionMethod, FacultyRecord } from '../types/faculty';
import type { PipelineConfig } from './config';
import {
  extractEmailsFromText,
  extractObfuscatedEmails,
  isAcceptableEmail,
  parseMailtoHref,
} from './email-patterns';
import { getErrorMessage } from './errors';
import { mergeEmailFact } from './fact-merge';
import { type HtmlDocument, loadDocument, pageText } from './html';
import { logger, type RunMetrics } from './monitoring';
import { emailNameScore } from './name-matcher';
import type { PageFetcher } from './page-fetcher';
import { discoverContactPages } from './site-crawler';

export type EmailChannel = Extract<EmailExtractionMethod, 'mailto' | 'regex' | 'obfuscated' | 'contact_page'>;

export interface EmailCandidate {
  email: string;
  method: EmailChannel;
}

export interface ScoredEmail extends EmailCandidate {
  nameScore: number;
  total: number;
}

const METHOD_BONUS: Record<EmailChannel, number> = {
  mailto: 0.3,
  regex: 0.2,
  obfuscated: 0.1,
  contact_page: 0.15,
};

export function mailtoAddresses($: HtmlDocument): string[] {
  const found = new Set<string>();
  $('a[href]').each((_, element) => {
    for (const email of parseMailtoHref($(element).attr('href') ?? '')) {
      found.add(email);
    }
  });
  return [...found];
}

/** Candidates from a main page, tagged with the channel that produced them. */
export function extractPageCandidates($: HtmlDocument): EmailCandidate[] {
  const text = pageText($);
  return [
    ...mailtoAddresses($).map((email) => ({ email, method: 'mailto' as const })),
    ...extractEmailsFromText(text).map((email) => ({ email, method: 'regex' as const })),
    ...extractObfuscatedEmails(text).map((email) => ({ email, method: 'obfuscated' as const })),
  ];
}

/** Contact pages contribute mailto and plain-text addresses only. */
export function extractContactPageCandidates($: HtmlDocument): EmailCandidate[] {
  const emails = [...mailtoAddresses($), ...extractEmailsFromText(pageText($))];
  return emails.map((email) => ({ email, method: 'contact_page' as const }));
}

/**
 * Highest-scoring acceptable candidate. A candidate passes on its name score
 * alone (a lower bar for mailto links) or on name score plus channel bonus.
 */
export function selectBestEmail(
  candidates: EmailCandidate[],
  name: string,
  config: Pick<PipelineConfig, 'institution' | 'thresholds' | 'genericEmailPatterns'>
): ScoredEmail | null {
  const { thresholds } = config;
  let best: ScoredEmail | null = null;

  for (const candidate of candidates) {
    if (!isAcceptableEmail(candidate.email, config.institution.emailDomains, config.genericEmailPatterns)) continue;

    const nameScore = emailNameScore(candidate.email, name);
    const total = nameScore + METHOD_BONUS[candidate.method];
    const minNameScore = candidate.method === 'mailto' ? thresholds.emailAcceptMailtoName : thresholds.emailAcceptName;
    if (nameScore < minNameScore && total < thresholds.emailAcceptCombined) continue;

    if (!best || total > best.total) {
      best = { ...candidate, nameScore, total };
    }
  }

  return best;
}

export class WebsiteEmailExtractor {
  constructor(
    private readonly config: PipelineConfig,
    private readonly fetcher: PageFetcher,
    private readonly metrics: RunMetrics
  ) {}

  shouldSkipSite(url: string): boolean {
    const lower = url.toLowerCase();
    return this.config.institution.skipSites.some((site) => lower.includes(site));
  }

  hidesEmails(url: string): boolean {
    const lower = url.toLowerCase();
    return this.config.institution.contactPageSites.some((site) => lower.includes(site));
  }

  private confidenceFor(score: number): ConfidenceLevel {
    const { emailHigh, emailMedium } = this.config.thresholds;
    if (score >= emailHigh) return 'high';
    if (score >= emailMedium) return 'medium';
    return 'low';
  }

  /**
   * Best address for a person on a page. Throws PageFetchError when the main
   * page cannot be fetched; contact page failures are skipped.
   */
  async extractEmail(url: string, name: string): Promise<EmailFact | null> {
    if (!url) return null;
    if (this.shouldSkipSite(url)) {
      logger.debug('Skipping site without public emails', { url });
      return null;
    }

    const { thresholds, limits } = this.config;
    const page = await this.fetcher.fetchPage(url);
    const $ = loadDocument(page.html);

    const candidates = extractPageCandidates($);
    let best = selectBestEmail(candidates, name, this.config);

    if (!best || best.total < thresholds.emailContactPageTrigger || this.hidesEmails(url)) {
      for (const contactUrl of discoverContactPages($, page.url, limits.maxContactPages)) {
        try {
          const contactPage = await this.fetcher.fetchPage(contactUrl);
          candidates.push(...extractContactPageCandidates(loadDocument(contactPage.html)));
        } catch (error) {
          logger.debug('Contact page unavailable', { url: contactUrl, error: getErrorMessage(error) });
          continue;
        }

        best = selectBestEmail(candidates, name, this.config);
        if (best && best.total >= thresholds.emailStopScore) break;
      }
    }

    if (!best) return null;

    return {
      value: best.email,
      source: 'website',
      confidence: this.confidenceFor(best.total),
      extractedFrom: url,
      extractionMethod: best.method,
      nameMatchScore: best.nameScore,
    };
  }

  /** Records with a website and no email, skipping aggregator pages. */
  async extractEmails(records: FacultyRecord[]): Promise<{ eligible: number; found: number }> {
    const eligible = records.filter(
      (record) => record.website !== null && record.email === null && record.website.pageType !== 'aggregator'
    );
    logger.info('Website email extraction', { eligible: eligible.length });

    let found = 0;
    for (const [index, record] of eligible.entries()) {
      const website = record.website;
      if (!website) continue;

      try {
        const email = await this.extractEmail(website.value, record.name);
        if (mergeEmailFact(record, email)) {
          found++;
          logger.debug('Website email found', { name: record.name, email: email?.value });
        }
      } catch (error) {
        this.metrics.recordItemError('website_emails', 'Page fetch failed', {
          name: record.name,
          url: website.value,
          error: getErrorMessage(error),
        });
      }

      if ((index + 1) % 50 === 0) {
        logger.info('Website email progress', { processed: index + 1, total: eligible.length, found });
      }
    }

    logger.info('Website email extraction complete', { found, eligible: eligible.length });
    return { eligible: eligible.length, found };
  }
}
