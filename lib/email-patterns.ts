/**
 * Email patterns shared by every extraction channel: plain-text matching,
 * de-obfuscation, mailto parsing and the domain/role-address filters.
 */

import { emailAddressSchema } from './schemas/faculty';

export const EMAIL_REGEX = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

/**
 * Rewrites for addresses written out to dodge scrapers, e.g.
 * `maria [at] seas [dot] harvard [dot] edu` or `maria AT harvard DOT edu`.
 * Group 1 is the local part, group 2 the domain with its separators.
 */
const OBFUSCATION_PATTERNS: RegExp[] = [
  /([A-Za-z0-9._%+-]+)\s*\[\s*at\s*\]\s*((?:[A-Za-z0-9-]+(?:\s*\[\s*dot\s*\]\s*|\.))+[A-Za-z]{2,})/gi,
  /([A-Za-z0-9._%+-]+)\s*\(\s*at\s*\)\s*((?:[A-Za-z0-9-]+(?:\s*\(\s*dot\s*\)\s*|\.))+[A-Za-z]{2,})/gi,
  /([A-Za-z0-9._%+-]+)\s+at\s+((?:[A-Za-z0-9-]+(?:\s+dot\s+|\.))+[A-Za-z]{2,})\b/gi,
];

const DOT_SEPARATOR = /\s*[[(]\s*dot\s*[\])]\s*|\s+dot\s+/gi;

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

export function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at === -1 ? '' : email.slice(at + 1).toLowerCase();
}

/** Plain addresses in free text, lowercased, first occurrence order. */
export function extractEmailsFromText(text: string): string[] {
  return unique(Array.from(text.matchAll(EMAIL_REGEX), (match) => match[0].toLowerCase()));
}

/** Addresses recovered from `[at]`/`(at)`/` at ` style spellings. */
export function extractObfuscatedEmails(text: string): string[] {
  const found: string[] = [];
  for (const pattern of OBFUSCATION_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const domain = match[2].replace(DOT_SEPARATOR, '.');
      found.push(`${match[1]}@${domain}`.toLowerCase());
    }
  }
  return unique(found);
}

/**
 * Recipients of a mailto link, lowercased, without the query string.
 * `mailto:Maria@Harvard.edu,lab@harvard.edu?subject=Hi` yields both addresses.
 */
export function parseMailtoHref(href: string): string[] {
  if (!href.toLowerCase().startsWith('mailto:')) return [];

  const recipients = safeDecode(href.slice('mailto:'.length).split('?')[0]);
  return unique(
    recipients
      .split(/[,;]/)
      .map((address) => address.trim().toLowerCase())
      .filter((address) => address.includes('@'))
  );
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/** Address syntax as the checkpoint schema validates it. */
export function isValidEmailAddress(email: string): boolean {
  return emailAddressSchema.safeParse(email).success;
}

/** Domain equals an allowed domain or is a subdomain of one. */
export function isAllowedEmailDomain(email: string, allowedDomains: readonly string[]): boolean {
  const domain = emailDomain(email);
  if (!domain) return false;
  return allowedDomains.some((allowed) => {
    const normalized = allowed.toLowerCase();
    return domain === normalized || domain.endsWith(`.${normalized}`);
  });
}

export function isGenericEmail(email: string, patterns: readonly RegExp[]): boolean {
  const lower = email.toLowerCase();
  return patterns.some((pattern) => pattern.test(lower));
}

/** Valid syntax, allowed domain and not a role address. */
export function isAcceptableEmail(
  email: string,
  allowedDomains: readonly string[],
  genericPatterns: readonly RegExp[]
): boolean {
  return (
    isValidEmailAddress(email) && isAllowedEmailDomain(email, allowedDomains) && !isGenericEmail(email, genericPatterns)
  );
}
