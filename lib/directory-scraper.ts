/**
 * Directory Scraper
 * Parses institutional people-listing pages into name -> email and
 * name -> profile URL caches, then answers lookups by name.
 */

import type { ConfidenceLevel, DirectoryCache, EmailFact } from '../types/faculty';
import type { PipelineConfig } from './config';
import { isAcceptableEmail, parseMailtoHref } from './email-patterns';
import { getErrorMessage } from './errors';
import { cleanText, loadDocument, resolveUrl } from './html';
import { logger, type RunMetrics } from './monitoring';
import { generateNameVariations, nameSimilarity, normalizeName } from './name-matcher';
import type { PageFetcher } from './page-fetcher';

export interface DirectoryEntry {
  email?: string;
  website?: string;
}

export interface DirectoryWebsiteMatch {
  url: string;
  confidence: ConfidenceLevel;
  matchScore: number;
}

const CONTAINER_ANCESTORS = 'tr, div, li, article, section';
const PERSON_CONTAINERS = 'div, article, li, tr';
const PERSON_CLASS = /faculty|person|profile|member|staff|people/i;
const PROFILE_LINK_PATTERNS = ['/people/', '/faculty/', '/profile/', '/person/'];
const CONTEXT_WORDS = 6;

/**
 * Extract name -> contact entries from one listing page.
 *
 * Two passes: every mailto link keyed by the first words of its enclosing
 * block, then person-like containers keyed by their heading.
 */
export function parseDirectoryPage(
  html: string,
  pageUrl: string,
  allowedDomains: readonly string[],
  genericPatterns: readonly RegExp[]
): Map<string, DirectoryEntry> {
  const $ = loadDocument(html);
  const entries = new Map<string, DirectoryEntry>();
  const firstAcceptable = (href: string): string | undefined =>
    parseMailtoHref(href).find((email) => isAcceptableEmail(email, allowedDomains, genericPatterns));

  $('a[href]').each((_, anchor) => {
    const email = firstAcceptable($(anchor).attr('href') ?? '');
    if (!email) return;

    const container = $(anchor).closest(CONTAINER_ANCESTORS);
    if (container.length === 0) return;

    const context = cleanText(container.text()).split(' ').slice(0, CONTEXT_WORDS).join(' ');
    const key = normalizeName(context);
    if (key.length > 3) {
      entries.set(key, { email });
    }
  });

  $(PERSON_CONTAINERS)
    .filter((_, element) => PERSON_CLASS.test($(element).attr('class') ?? ''))
    .each((_, element) => {
      const container = $(element);
      const heading = container.find('h2, h3, h4, a, strong').first();
      if (heading.length === 0) return;

      const key = normalizeName(cleanText(heading.text()));
      if (key.length <= 3) return;

      const mailto = container.find('a[href^="mailto:"]').first();
      const email = mailto.length > 0 ? firstAcceptable(mailto.attr('href') ?? '') : undefined;
      if (email) {
        entries.set(key, { ...entries.get(key), email });
      }

      const profileLink = container
        .find('a[href]')
        .toArray()
        .map((link) => $(link).attr('href') ?? '')
        .find((href) => PROFILE_LINK_PATTERNS.some((pattern) => href.includes(pattern)));
      const website = profileLink ? resolveUrl(profileLink, pageUrl) : null;
      if (website) {
        entries.set(key, { ...entries.get(key), website });
      }
    });

  return entries;
}

export class DirectoryScraper {
  private readonly emails = new Map<string, string>();
  private readonly websites = new Map<string, string>();

  constructor(
    private readonly config: PipelineConfig,
    private readonly fetcher: PageFetcher,
    private readonly metrics: RunMetrics
  ) {}

  get emailCount(): number {
    return this.emails.size;
  }

  get websiteCount(): number {
    return this.websites.size;
  }

  /** Fetch and parse every configured listing page once. Failed pages are skipped. */
  async scrapeAll(): Promise<{ pages: number; failed: number }> {
    const { directoryUrls, emailDomains } = this.config.institution;
    if (directoryUrls.length === 0) {
      logger.info('No directories configured', { institution: this.config.institution.key });
      return { pages: 0, failed: 0 };
    }

    let failed = 0;
    for (const [index, url] of directoryUrls.entries()) {
      logger.info('Scraping directory', { page: `${index + 1}/${directoryUrls.length}`, url });
      try {
        const page = await this.fetcher.fetchPage(url);
        const entries = parseDirectoryPage(page.html, page.url, emailDomains, this.config.genericEmailPatterns);
        for (const [key, entry] of entries) {
          if (entry.email) this.emails.set(key, entry.email);
          if (entry.website) this.websites.set(key, entry.website);
        }
        logger.debug('Directory parsed', { url, entries: entries.size });
      } catch (error) {
        failed++;
        this.metrics.recordItemError('directories', 'Directory page failed', { url, error: getErrorMessage(error) });
      }
    }

    logger.info('Directory cache built', { emails: this.emails.size, websites: this.websites.size, failed });
    return { pages: directoryUrls.length, failed };
  }

  private findMatch(cache: Map<string, string>, name: string): { value: string; score: number; exact: boolean } | null {
    for (const variation of generateNameVariations(name)) {
      const hit = cache.get(variation);
      if (hit !== undefined) return { value: hit, score: 1, exact: true };
    }

    let best: { value: string; score: number; exact: boolean } | null = null;
    for (const [cachedName, value] of cache) {
      const score = nameSimilarity(name, cachedName);
      if (score >= this.config.thresholds.fuzzyMatch && score > (best?.score ?? 0)) {
        best = { value, score, exact: false };
      }
    }
    return best;
  }

  /** Exact variation hits are HIGH confidence, fuzzy hits MEDIUM. */
  lookupEmail(name: string): EmailFact | null {
    const match = this.findMatch(this.emails, name);
    if (!match) return null;

    return {
      value: match.value,
      source: 'directory',
      confidence: match.exact ? 'high' : 'medium',
      extractedFrom: 'department_directory',
      extractionMethod: match.exact ? 'directory_exact_match' : 'directory_fuzzy_match',
      nameMatchScore: match.score,
    };
  }

  lookupWebsite(name: string): DirectoryWebsiteMatch | null {
    const match = this.findMatch(this.websites, name);
    if (!match) return null;
    return { url: match.value, confidence: match.exact ? 'high' : 'medium', matchScore: match.score };
  }

  toCache(): DirectoryCache {
    return {
      emails: Object.fromEntries(this.emails),
      websites: Object.fromEntries(this.websites),
    };
  }

  restore(cache: DirectoryCache): void {
    this.emails.clear();
    this.websites.clear();
    for (const [key, email] of Object.entries(cache.emails)) this.emails.set(key, email);
    for (const [key, website] of Object.entries(cache.websites)) this.websites.set(key, website);
  }
}
