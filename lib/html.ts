/**
 * HTML loading shared by the directory scraper and the email extractor.
 */

import * as cheerio from 'cheerio';

export type HtmlDocument = cheerio.CheerioAPI;

/**
 * Parse a page for text extraction. Scripts and styles are dropped and every
 * element gets a trailing space, so `.text()` keeps adjacent cells and
 * blocks apart.
 */
export function loadDocument(html: string): HtmlDocument {
  const $ = cheerio.load(html);
  $('script, style, noscript, template').remove();
  $('br').replaceWith(' ');
  $('body *').append(' ');
  return $;
}

export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Visible text of the whole page, whitespace-collapsed. */
export function pageText($: HtmlDocument): string {
  return cleanText($('body').text() || $.root().text());
}

export function resolveUrl(href: string, base: string): string | null {
  try {
    return new URL(href, base).href;
  } catch {
    return null;
  }
}
