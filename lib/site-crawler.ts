/**
 * Site Crawler Module
 * Discovers same-site pages likely to carry contact details for a person.
 */

import type { HtmlDocument } from './html';
import { resolveUrl } from './html';

// Href fragments that suggest a contact or bio page
const CONTACT_LINK_PATTERNS = [
  '/contact', '/about', '/email', '/bio', '/profile',
  '/cv', '/home', 'biography', 'personal',
  '/people/', '/faculty/', '/staff/', '/directory/',
  '/info', '/reach', '/connect',
  '?page=contact', '?view=contact', '?tab=contact',
];

// Link text that suggests the same
const CONTACT_LINK_TEXT = ['contact', 'email', 'reach', 'about me', 'bio'];

function isContactLink(href: string, text: string): boolean {
  const lowerHref = href.toLowerCase();
  const lowerText = text.toLowerCase();
  return CONTACT_LINK_PATTERNS.some((pattern) => lowerHref.includes(pattern)) ||
    CONTACT_LINK_TEXT.some((word) => lowerText.includes(word));
}

/**
 * Common contact locations tried even when the page links to none of them.
 */
function commonContactUrls(base: URL): string[] {
  const basePath = base.pathname.replace(/\/+$/, '');
  return [
    `${base.origin}${basePath}/contact`,
    `${base.origin}/contact`,
    `${base.origin}${basePath}?tab=contact`,
  ];
}

/**
 * Contact-like pages for a fetched page: qualifying links on the same host,
 * then the common locations, deduplicated in order and capped.
 */
export function discoverContactPages($: HtmlDocument, baseUrl: string, maxPages: number): string[] {
  let base: URL;
  try {
    base = new URL(baseUrl);
  } catch {
    return [];
  }

  const found: string[] = [];

  $('a[href]').each((_, element) => {
    const href = $(element).attr('href') ?? '';
    if (!isContactLink(href, $(element).text())) return;

    const resolved = resolveUrl(href, base.href);
    if (!resolved || resolved === baseUrl) return;

    const target = new URL(resolved);
    if (target.protocol !== 'http:' && target.protocol !== 'https:') return;
    if (target.host !== base.host) return;

    found.push(resolved);
  });

  found.push(...commonContactUrls(base));

  return [...new Set(found)].filter((url) => url !== baseUrl).slice(0, maxPages);
}
