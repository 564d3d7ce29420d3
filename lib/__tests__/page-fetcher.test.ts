/**
 * Tests for the HTTP helpers
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { PageFetchError } from '../errors';
import { fetchWithTimeout, parseRetryAfter } from '../page-fetcher';
import { createTestConfig, createTestFetcher, htmlResponse, stubFetch } from './test-utils';

/** Headers arrive, then the body stalls after its first chunk. */
function stalledResponse(): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode('<html><body>Maria'));
    },
  });
  return new Response(body, { status: 200, headers: { 'content-type': 'text/html' } });
}

describe('fetchWithTimeout', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should hand the response to the reader', async () => {
    stubFetch(() => htmlResponse('<p>hello</p>'));

    const text = await fetchWithTimeout('https://example.org/', {}, 1000, (response) => response.text());

    expect(text).toBe('<p>hello</p>');
  });

  it('should time out a body that stops arriving', async () => {
    stubFetch(() => stalledResponse());

    await expect(
      fetchWithTimeout('https://example.org/slow', {}, 50, (response) => response.text())
    ).rejects.toThrow('Operation timed out: GET https://example.org/slow');
  });

  it('should pass the abort signal to fetch', async () => {
    const fetchMock = stubFetch(() => htmlResponse('ok'));

    await fetchWithTimeout('https://example.org/', {}, 1000, (response) => response.text());

    expect(fetchMock.mock.calls[0][1]?.signal).toBeInstanceOf(AbortSignal);
  });
});

describe('parseRetryAfter', () => {
  it('should read whole seconds and ignore dates or blanks', () => {
    const withHeader = (value: string) => new Response('', { status: 429, headers: { 'retry-after': value } });

    expect(parseRetryAfter(withHeader('3'))).toBe(3);
    expect(parseRetryAfter(withHeader('Wed, 21 Oct 2026 07:28:00 GMT'))).toBeUndefined();
    expect(parseRetryAfter(withHeader('0'))).toBeUndefined();
    expect(parseRetryAfter(new Response('', { status: 429 }))).toBeUndefined();
  });
});

describe('PageFetcher', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should return the page HTML with the requested URL', async () => {
    stubFetch(() => htmlResponse('<h1>Maria Garcia</h1>'));
    const fetcher = createTestFetcher(createTestConfig());

    const page = await fetcher.fetchPage('https://chemistry.harvard.edu/people/maria-garcia');

    expect(page).toEqual({ url: 'https://chemistry.harvard.edu/people/maria-garcia', html: '<h1>Maria Garcia</h1>' });
  });

  it('should fail a stalled body after each attempt times out', async () => {
    const fetchMock = stubFetch(() => stalledResponse());
    const fetcher = createTestFetcher(createTestConfig({ overrides: { timeouts: { page: 50 } } }));

    const outcome = fetcher.fetchPage('https://example.org/slow');

    await expect(outcome).rejects.toBeInstanceOf(PageFetchError);
    await expect(outcome).rejects.toThrow(
      'Failed to fetch https://example.org/slow: Operation timed out: GET https://example.org/slow'
    );
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('should not retry a non-HTML response', async () => {
    const fetchMock = stubFetch(
      () => new Response('%PDF-1.4', { status: 200, headers: { 'content-type': 'application/pdf' } })
    );
    const fetcher = createTestFetcher(createTestConfig());

    await expect(fetcher.fetchPage('https://example.org/cv.pdf')).rejects.toThrow(
      'Failed to fetch https://example.org/cv.pdf: unsupported content type application/pdf'
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should retry server errors', async () => {
    let calls = 0;
    const fetchMock = stubFetch(() => {
      calls++;
      return calls === 1 ? new Response('busy', { status: 503 }) : htmlResponse('<p>ok</p>');
    });
    const fetcher = createTestFetcher(createTestConfig());

    expect((await fetcher.fetchPage('https://example.org/')).html).toBe('<p>ok</p>');
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});
