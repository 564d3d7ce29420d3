import { describe, it, expect } from 'vitest';
import { discoverContactPages } from '../site-crawler';
import { loadDocument } from '../html';

const BASE = 'https://chemistry.harvard.edu/people/maria-garcia';

const PAGE = `
  <html><body>
    <a href="/people/maria-garcia">Home</a>
    <a href="/people/maria-garcia/contact">Contact</a>
    <a href="https://other.example.org/contact">Contact elsewhere</a>
    <a href="mailto:mgarcia@harvard.edu">Email me</a>
    <a href="/teaching">Teaching</a>
    <a href="/people/maria-garcia/contact">Contact again</a>
  </body></html>
`;

describe('discoverContactPages', () => {
  it('should keep same-host contact links and append the common locations', () => {
    expect(discoverContactPages(loadDocument(PAGE), BASE, 7)).toEqual([
      'https://chemistry.harvard.edu/people/maria-garcia/contact',
      'https://chemistry.harvard.edu/contact',
      'https://chemistry.harvard.edu/people/maria-garcia?tab=contact',
    ]);
  });

  it('should cap the number of pages', () => {
    expect(discoverContactPages(loadDocument(PAGE), BASE, 2)).toEqual([
      'https://chemistry.harvard.edu/people/maria-garcia/contact',
      'https://chemistry.harvard.edu/contact',
    ]);
  });

  it('should return nothing for an unparseable base url', () => {
    expect(discoverContactPages(loadDocument(PAGE), 'not a url', 7)).toEqual([]);
  });
});
