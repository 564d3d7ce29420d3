/**
 * HTTP helpers shared by every external client: fetch with an abort timeout,
 * and an HTML page fetcher with retries and a browser-like identity.
 */

import { HttpStatusError, PageFetchError, TimeoutError, getErrorMessage, isRetryableError, withRetry } from './errors';
import { logger } from './monitoring';
import type { RateLimiter } from './rate-limiter';

/**
 * Fetch with timeout. `read` consumes the response inside the same window, so
 * a body that stalls after the headers arrive still times out. Aborts become
 * TimeoutError so the retry policy can recognise them.
 */
export async function fetchWithTimeout<T>(
  url: string,
  init: RequestInit,
  timeoutMs: number,
  read: (response: Response) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timeout: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeout = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(`GET ${url}`, timeoutMs));
    }, timeoutMs);
  });

  const request = async (): Promise<T> => {
    const response = await fetch(url, { ...init, signal: controller.signal });
    return read(response);
  };

  try {
    return await Promise.race([request(), timeoutPromise]);
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new TimeoutError(`GET ${url}`, timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timeout);
  }
}

/** Seconds from a `Retry-After` header given as a number; undefined otherwise. */
export function parseRetryAfter(response: Response): number | undefined {
  const header = response.headers.get('retry-after');
  if (header === null || header.trim() === '') return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds > 0 ? seconds : undefined;
}

export interface FetchedPage {
  /** Final URL after redirects. */
  url: string;
  html: string;
}

export interface PageFetcherOptions {
  userAgent: string;
  timeoutMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  limiter: RateLimiter;
}

export class PageFetcher {
  constructor(private readonly options: PageFetcherOptions) {}

  /**
   * Fetch an HTML page. Network errors, timeouts and 5xx responses are
   * retried; anything else, or a non-HTML body, raises PageFetchError.
   */
  async fetchPage(url: string): Promise<FetchedPage> {
    try {
      return await withRetry(() => this.fetchOnce(url), {
        maxRetries: Math.max(0, this.options.maxAttempts - 1),
        baseDelayMs: this.options.backoffBaseMs,
        shouldRetry: isRetryableError,
        onRetry: (error, attempt) => {
          logger.debug('Retrying page fetch', { url, attempt, error: error.message });
        },
      });
    } catch (error) {
      if (error instanceof PageFetchError) throw error;
      throw new PageFetchError(url, getErrorMessage(error));
    }
  }

  private async fetchOnce(url: string): Promise<FetchedPage> {
    await this.options.limiter.wait('scrape');

    return fetchWithTimeout(
      url,
      {
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.5',
        },
        redirect: 'follow',
      },
      this.options.timeoutMs,
      async (response) => {
        if (!response.ok) {
          throw new HttpStatusError(url, response.status);
        }

        const contentType = response.headers.get('content-type') ?? '';
        if (contentType && !contentType.includes('html') && !contentType.includes('text/plain')) {
          throw new PageFetchError(url, `unsupported content type ${contentType}`);
        }

        return { url: response.url || url, html: await response.text() };
      }
    );
  }
}
