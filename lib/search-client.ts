/**
 * Rate-Limited Search Client (Brave Web Search API)
 *
 * States: unauthenticated (no key, never calls out), ready, quota_exhausted
 * (402 seen, never calls out again this run) and auth_failed (401 seen,
 * every further call throws).
 */

import type { PipelineConfig } from './config';
import {
  HttpStatusError,
  QuotaExhaustedError,
  RateLimitError,
  ResponseFormatError,
  SearchAuthError,
  getErrorMessage,
  isRetryableError,
  withRetry,
} from './errors';
import { logger } from './monitoring';
import { fetchWithTimeout, parseRetryAfter } from './page-fetcher';
import type { RateLimiter } from './rate-limiter';
import { searchResponseSchema } from './schemas/api';

export const SEARCH_ENDPOINT = 'https://api.search.brave.com/res/v1/web/search';

export interface SearchResult {
  url: string;
  title: string;
  description: string;
}

export type SearchClientState = 'unauthenticated' | 'ready' | 'quota_exhausted' | 'auth_failed';

/** The part of the client that discovery and fallback search depend on. */
export interface WebSearch {
  readonly quotaExhausted: boolean;
  readonly queriesUsed: number;
  readonly queriesFailed: number;
  readonly rateLimitHits: number;
  search(query: string): Promise<SearchResult[]>;
}

export class BraveSearchClient implements WebSearch {
  private state: SearchClientState;
  queriesUsed = 0;
  queriesFailed = 0;
  rateLimitHits = 0;
  lastError: string | null = null;

  constructor(
    private readonly config: PipelineConfig,
    private readonly limiter: RateLimiter
  ) {
    this.state = config.searchApiKey ? 'ready' : 'unauthenticated';
  }

  get status(): SearchClientState {
    return this.state;
  }

  get quotaExhausted(): boolean {
    return this.state === 'quota_exhausted';
  }

  get hasApiKey(): boolean {
    return this.config.searchApiKey !== null;
  }

  /**
   * Run one query. Returns an empty list when there is no key, the quota is
   * gone, or the query failed after retries. Throws SearchAuthError on 401.
   */
  async search(query: string): Promise<SearchResult[]> {
    switch (this.state) {
      case 'unauthenticated':
      case 'quota_exhausted':
        return [];
      case 'auth_failed':
        throw new SearchAuthError();
      case 'ready':
        break;
    }

    try {
      const results = await withRetry(() => this.request(query), {
        maxRetries: Math.max(0, this.config.retry.maxAttempts - 1),
        baseDelayMs: this.config.retry.backoffBaseMs,
        baseDelayFor: (error) =>
          error instanceof RateLimitError ? this.config.retry.rateLimitBackoffBaseMs : this.config.retry.backoffBaseMs,
        shouldRetry: isRetryableError,
        onRetry: (error, attempt, delayMs) => {
          logger.debug('Search retry', { query, attempt, delayMs, error: error.message });
        },
      });
      this.queriesUsed++;
      return results;
    } catch (error) {
      if (error instanceof SearchAuthError) {
        this.state = 'auth_failed';
        this.lastError = error.message;
        throw error;
      }
      if (error instanceof QuotaExhaustedError) {
        this.state = 'quota_exhausted';
        this.lastError = error.message;
        logger.error('Search quota exhausted (HTTP 402)', error, { queriesUsed: this.queriesUsed });
        return [];
      }

      this.queriesFailed++;
      this.lastError = getErrorMessage(error);
      logger.debug('Search failed, skipping query', { query, error: this.lastError });
      return [];
    }
  }

  private async request(query: string): Promise<SearchResult[]> {
    await this.limiter.wait('search');

    const params = new URLSearchParams({ q: query, count: String(this.config.limits.searchResultCount) });
    return fetchWithTimeout(
      `${SEARCH_ENDPOINT}?${params.toString()}`,
      {
        headers: {
          Accept: 'application/json',
          'X-Subscription-Token': this.config.searchApiKey ?? '',
        },
      },
      this.config.timeouts.search,
      async (response) => {
        switch (response.status) {
          case 401:
            throw new SearchAuthError(401);
          case 402:
            throw new QuotaExhaustedError('search');
          case 429:
            this.rateLimitHits++;
            throw new RateLimitError('search', parseRetryAfter(response));
        }
        if (!response.ok) {
          throw new HttpStatusError(SEARCH_ENDPOINT, response.status);
        }

        let body: unknown;
        try {
          body = await response.json();
        } catch (error) {
          throw new ResponseFormatError('search', getErrorMessage(error));
        }

        const parsed = searchResponseSchema.safeParse(body);
        if (!parsed.success) {
          throw new ResponseFormatError('search', parsed.error.issues[0]?.message ?? 'invalid body');
        }

        return (parsed.data.web?.results ?? []).map((result) => ({
          url: result.url,
          title: result.title ?? '',
          description: result.description ?? '',
        }));
      }
    );
  }
}
