/**
 * Tests for Bibliometric Extractor
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { BibliometricExtractor, parseResearchProfile } from '../bibliometric-extractor';
import { CatalogRequestError } from '../errors';
import { RateLimiter } from '../rate-limiter';
import { catalogAuthorSchema } from '../schemas/api';
import { createTestConfig, jsonResponse, stubFetch } from './test-utils';

function author(overrides: Record<string, unknown>) {
  return {
    id: 'https://openalex.org/A100',
    orcid: null,
    display_name: 'Test Author',
    works_count: 100,
    cited_by_count: 1000,
    summary_stats: { h_index: 25, i10_index: 40 },
    last_known_institutions: [{ display_name: 'Harvard University' }],
    topics: [],
    x_concepts: [],
    ...overrides,
  };
}

const PAGE_ONE = [
  author({
    id: 'https://openalex.org/A1',
    orcid: 'https://orcid.org/0000-0001-2345-6789',
    display_name: 'Maria Garcia',
    summary_stats: { h_index: 50, i10_index: 90 },
    topics: [{ display_name: 'Protein Folding', score: 0.98765 }],
    x_concepts: [
      { display_name: 'Biology', level: 0, score: 0.9 },
      { display_name: 'Biochemistry', level: 1, score: 0.8 },
    ],
  }),
  author({ display_name: 'Low Signal', summary_stats: { h_index: 5, i10_index: 1 }, works_count: 10 }),
  author({ display_name: 'Elsewhere', last_known_institutions: [{ display_name: 'Yale University' }] }),
  author({
    display_name: 'Visiting Everywhere',
    last_known_institutions: Array.from({ length: 16 }, () => ({ display_name: 'Harvard University' })),
  }),
  author({ display_name: 'Chen Wei', summary_stats: { h_index: 12, i10_index: 14 } }),
  { display_name: 42 },
];

const PAGE_TWO = [author({ display_name: 'James Okafor', summary_stats: { h_index: 30, i10_index: 50 } })];

describe('BibliometricExtractor', () => {
  const config = createTestConfig();
  let extractor: BibliometricExtractor;

  beforeEach(() => {
    extractor = new BibliometricExtractor(config, new RateLimiter(config.delays));
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should build page URLs filtered by institution', () => {
    const url = new URL(extractor.pageUrl(2));
    expect(url.origin + url.pathname).toBe('https://api.openalex.org/authors');
    expect(url.searchParams.get('filter')).toBe('last_known_institutions.id:I136199984');
    expect(url.searchParams.get('per_page')).toBe('200');
    expect(url.searchParams.get('page')).toBe('2');
    expect(url.searchParams.get('mailto')).toBe('test@example.org');
  });

  it('should paginate until an empty page and sort by h-index', async () => {
    const fetchMock = stubFetch((url) => {
      const page = new URL(url).searchParams.get('page');
      if (page === '1') return jsonResponse({ results: PAGE_ONE });
      if (page === '2') return jsonResponse({ results: PAGE_TWO });
      return jsonResponse({ results: [] });
    });

    const records = await extractor.extract();

    expect(records.map((record) => record.name)).toEqual(['Maria Garcia', 'James Okafor', 'Chen Wei']);
    expect(fetchMock).toHaveBeenCalledTimes(3);

    const maria = records[0];
    expect(maria.bibliometricId).toBe('https://openalex.org/A1');
    expect(maria.orcidId).toBe('https://orcid.org/0000-0001-2345-6789');
    expect(maria.institution).toBe('Harvard University');
    expect(maria.hIndex).toBe(50);
    expect(maria.i10Index).toBe(90);
    expect(maria.email).toBeNull();
    expect(maria.research).toEqual({
      topics: [{ name: 'Protein Folding', score: 0.988 }],
      concepts: [
        { name: 'Biology', level: 0, score: 0.9 },
        { name: 'Biochemistry', level: 1, score: 0.8 },
      ],
      fields: ['Biology'],
      keywords: ['Protein Folding'],
    });
  });

  it('should stop once the record cap is reached', async () => {
    const fetchMock = stubFetch(() => jsonResponse({ results: PAGE_ONE }));

    const records = await extractor.extract(1);

    expect(records.map((record) => record.name)).toEqual(['Maria Garcia']);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should abort with a fatal error when a later page keeps failing', async () => {
    const fetchMock = stubFetch((url) =>
      new URL(url).searchParams.get('page') === '1'
        ? jsonResponse({ results: PAGE_TWO })
        : new Response('upstream error', { status: 503 })
    );

    await expect(extractor.extract()).rejects.toBeInstanceOf(CatalogRequestError);
    expect(fetchMock).toHaveBeenCalledTimes(4);
  });

  it('should abort with a fatal error when the first page keeps failing', async () => {
    const fetchMock = stubFetch(() => new Response('upstream error', { status: 503 }));

    await expect(extractor.extract()).rejects.toBeInstanceOf(CatalogRequestError);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('should not retry client errors', async () => {
    const fetchMock = stubFetch(() => new Response('bad filter', { status: 400 }));

    await expect(extractor.extract()).rejects.toMatchObject({ severity: 'fatal', code: 'CATALOG_REQUEST_FAILED' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe('parseResearchProfile', () => {
  it('should cap topics and keep keywords from the wider topic list', () => {
    const topics = Array.from({ length: 12 }, (_, i) => ({ display_name: `Topic ${i + 1}`, score: 0.5 }));
    const profile = parseResearchProfile(catalogAuthorSchema.parse(author({ topics })));

    expect(profile.topics).toHaveLength(10);
    expect(profile.keywords).toHaveLength(12);
    expect(profile.keywords[11]).toBe('Topic 12');
  });

  it('should fall back to sub-field concepts for keywords', () => {
    const profile = parseResearchProfile(
      catalogAuthorSchema.parse(
        author({
          x_concepts: [
            { display_name: 'Physics', level: 0, score: 0.7 },
            { display_name: 'Optics', level: 1, score: 0.6 },
            { display_name: 'Lasers', level: 2, score: 0.5 },
            { display_name: null, level: 1, score: 0.4 },
          ],
        })
      )
    );

    expect(profile.fields).toEqual(['Physics']);
    expect(profile.keywords).toEqual(['Optics', 'Lasers']);
    expect(profile.concepts).toHaveLength(3);
  });
});
