/**
 * Tests for Fallback Email Search
 */

import { describe, it, expect } from 'vitest';
import { FallbackEmailSearch, buildFallbackQueries } from '../email-search';
import type { WebsiteFact } from '../../types/faculty';
import { FakeSearch, createTestConfig, makeRecord } from './test-utils';

const WEBSITE: WebsiteFact = {
  value: 'https://scholar.harvard.edu/example',
  source: 'search',
  confidence: 'medium',
  score: 0.4,
  signals: [],
  pageType: 'personal',
};

describe('Fallback Email Search', () => {
  const config = createTestConfig({ overrides: { limits: { maxFallbackSearches: 2 } } });

  it('should build the email and contact queries', () => {
    expect(buildFallbackQueries('Maria Garcia', 'harvard.edu')).toEqual([
      '"Maria Garcia" email site:harvard.edu',
      '"Maria Garcia" contact site:harvard.edu',
    ]);
  });

  it('should accept the first valid address that matches the name', async () => {
    const search = new FakeSearch({
      '"Maria Garcia" email site:harvard.edu': [
        { url: 'https://chemistry.harvard.edu/contact', title: 'Contact', description: 'Write to info@harvard.edu' },
        { url: 'https://example.org/garcia', title: 'Maria Garcia', description: 'mgarcia@example.org' },
      ],
      '"Maria Garcia" contact site:harvard.edu': [
        {
          url: 'https://chemistry.harvard.edu/people/maria-garcia',
          title: 'Maria Garcia | Chemistry',
          description: 'Office 201, mgarcia@fas.harvard.edu, jsmith@harvard.edu',
        },
      ],
    });

    const fact = await new FallbackEmailSearch(config, search).searchEmail('Maria Garcia');

    expect(fact?.value).toBe('mgarcia@fas.harvard.edu');
    expect(fact?.source).toBe('fallback');
    expect(fact?.confidence).toBe('medium');
    expect(fact?.extractionMethod).toBe('fallback_search');
    expect(fact?.extractedFrom).toBe('https://chemistry.harvard.edu/people/maria-garcia');
    expect(fact?.nameMatchScore).toBeCloseTo(0.8);
    expect(search.queries).toHaveLength(2);
  });

  it('should process records by h-index up to the search cap', async () => {
    const search = new FakeSearch({
      '"James Okafor" email site:harvard.edu': [
        { url: 'https://chemistry.harvard.edu/people/james-okafor', title: 'James Okafor', description: 'jokafor@harvard.edu' },
      ],
    });
    const records = [
      makeRecord({ name: 'Chen Wei', hIndex: 15, website: WEBSITE }),
      makeRecord({ name: 'James Okafor', hIndex: 30, website: WEBSITE }),
      makeRecord({ name: 'Maria Garcia', hIndex: 50 }),
      makeRecord({ name: 'Ana Lima', hIndex: 22, website: WEBSITE }),
    ];

    const summary = await new FallbackEmailSearch(config, search).searchEmails(records);

    expect(summary).toEqual({ eligible: 2, searched: 2, found: 1, stoppedForQuota: false });
    expect(records[1].email?.value).toBe('jokafor@harvard.edu');
    expect(search.queries).toEqual([
      '"James Okafor" email site:harvard.edu',
      '"Ana Lima" email site:harvard.edu',
      '"Ana Lima" contact site:harvard.edu',
    ]);
  });

  it('should stop when the quota runs out', async () => {
    const search = new FakeSearch({}, 1);
    const records = [
      makeRecord({ name: 'James Okafor', hIndex: 30, website: WEBSITE }),
      makeRecord({ name: 'Ana Lima', hIndex: 22, website: WEBSITE }),
    ];

    const summary = await new FallbackEmailSearch(config, search).searchEmails(records);

    expect(summary).toEqual({ eligible: 2, searched: 1, found: 0, stoppedForQuota: true });
    expect(search.queries).toEqual(['"James Okafor" email site:harvard.edu', '"James Okafor" contact site:harvard.edu']);
  });
});
