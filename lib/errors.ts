/**
 * Custom Error Classes for the faculty pipeline
 *
 * Every error carries a severity that tells the orchestrator what to do:
 * - fatal: abort the run (output is still written for what exists)
 * - phase-limiting: stop issuing calls in the current phase, keep going after
 * - recoverable: skip the current record or page
 */

export type ErrorSeverity = 'fatal' | 'phase-limiting' | 'recoverable';

export class AppError extends Error {
  public readonly code: string;
  public readonly severity: ErrorSeverity;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    severity: ErrorSeverity = 'recoverable',
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.severity = severity;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: this.code,
      severity: this.severity,
      message: this.message,
      ...(this.context && { context: this.context }),
    };
  }
}

// Fatal

export class ConfigurationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', 'fatal', context);
  }
}

export class CatalogRequestError extends AppError {
  constructor(url: string, originalError?: Error) {
    super(
      `Catalog request failed: ${originalError?.message || 'Unknown error'}`,
      'CATALOG_REQUEST_FAILED',
      'fatal',
      { url, originalError: originalError?.message }
    );
  }
}

export class SearchAuthError extends AppError {
  constructor(status: number = 401) {
    super(
      'Search API rejected the API key. Check BRAVE_API_KEY or --api-key.',
      'SEARCH_AUTH_FAILED',
      'fatal',
      { status }
    );
  }
}

// Phase-limiting

export class QuotaExhaustedError extends AppError {
  constructor(service: string, status: number = 402) {
    super(`${service} quota exhausted`, 'QUOTA_EXHAUSTED', 'phase-limiting', { service, status });
  }
}

// Recoverable

export class RateLimitError extends AppError {
  public readonly retryAfter?: number;

  constructor(service: string, retryAfter?: number) {
    super(`${service} rate limit exceeded`, 'RATE_LIMIT_EXCEEDED', 'recoverable', { service });
    this.retryAfter = retryAfter;
  }
}

export class HttpStatusError extends AppError {
  public readonly status: number;

  constructor(url: string, status: number) {
    super(`HTTP ${status} from ${url}`, 'HTTP_STATUS', 'recoverable', { url, status });
    this.status = status;
  }
}

export class TimeoutError extends AppError {
  constructor(operation: string, timeoutMs: number) {
    super(`Operation timed out: ${operation}`, 'TIMEOUT', 'recoverable', { operation, timeoutMs });
  }
}

export class PageFetchError extends AppError {
  constructor(url: string, reason: string) {
    super(`Failed to fetch ${url}: ${reason}`, 'PAGE_FETCH_FAILED', 'recoverable', { url, reason });
  }
}

export class ResponseFormatError extends AppError {
  constructor(service: string, detail: string) {
    super(`Unexpected ${service} response: ${detail}`, 'RESPONSE_FORMAT', 'recoverable', { service });
  }
}

export interface RetryOptions {
  /** Retries after the first attempt. */
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  shouldRetry?: (error: Error) => boolean;
  /** Per-error base delay, e.g. a longer one for rate limits. */
  baseDelayFor?: (error: Error) => number;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

/** A server-given Retry-After wins over the exponential schedule. */
function retryDelay(error: Error, attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  if (error instanceof RateLimitError && error.retryAfter !== undefined) {
    return Math.min(error.retryAfter * 1000, maxDelayMs);
  }
  return Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
}

/**
 * Utility: Retry function with exponential backoff
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxRetries = 2,
    baseDelayMs = 1000,
    maxDelayMs = 30000,
    shouldRetry = isRetryableError,
    baseDelayFor,
    onRetry,
  } = options;

  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === maxRetries || !shouldRetry(lastError)) {
        throw lastError;
      }

      const delay = retryDelay(lastError, attempt, baseDelayFor ? baseDelayFor(lastError) : baseDelayMs, maxDelayMs);
      const jitter = delay * 0.1 * Math.random();

      onRetry?.(lastError, attempt + 1, delay);
      if (delay > 0) {
        await new Promise((resolve) => setTimeout(resolve, delay + jitter));
      }
    }
  }

  throw lastError ?? new Error('Retry loop exited without a result');
}

/**
 * Utility: Safe error message extraction
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function isFatalError(error: unknown): error is AppError {
  return error instanceof AppError && error.severity === 'fatal';
}

/**
 * Utility: Check if error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof RateLimitError || error instanceof TimeoutError) return true;
  if (error instanceof HttpStatusError) return error.status >= 500;

  if (error instanceof AppError) {
    return false;
  }

  if (error instanceof Error) {
    // fetch() rejects with a TypeError on network failure
    if (error.name === 'TypeError' && error.message.includes('fetch failed')) return true;

    const retryablePatterns = ['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EAI_AGAIN', 'socket hang up', 'network'];
    return retryablePatterns.some((pattern) => error.message.toLowerCase().includes(pattern.toLowerCase()));
  }

  return false;
}
