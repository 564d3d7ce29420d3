/**
 * Name Matching Module
 *
 * Normalizes person names, generates lookup variations and scores how well
 * another name or an email local part matches.
 */

export interface NameParts {
  first: string;
  middle: string;
  last: string;
  full: string;
}

const TITLES = ['dr', 'prof', 'professor', 'mr', 'mrs', 'ms', 'phd', 'md', 'jr', 'sr', 'iii', 'ii', 'iv'];
const TITLE_PATTERNS = TITLES.map((title) => new RegExp(`\\b${title}\\.?\\b`, 'g'));

export function normalizeName(name: string): string {
  let normalized = name.toLowerCase().trim();
  for (const pattern of TITLE_PATTERNS) {
    normalized = normalized.replace(pattern, '');
  }
  // Punctuation except hyphens becomes whitespace
  normalized = normalized.replace(/[^\p{L}\p{M}\p{N}_\s-]/gu, ' ');
  return normalized.split(/\s+/).filter(Boolean).join(' ');
}

export function getNameParts(name: string): NameParts {
  const full = normalizeName(name);
  const tokens = full ? full.split(' ') : [];

  if (tokens.length === 0) {
    return { first: '', middle: '', last: '', full: '' };
  }
  if (tokens.length === 1) {
    return { first: tokens[0], middle: '', last: tokens[0], full };
  }
  return {
    first: tokens[0],
    middle: tokens.slice(1, -1).join(' '),
    last: tokens[tokens.length - 1],
    full,
  };
}

function initial(value: string): string {
  return Array.from(value)[0] ?? '';
}

/**
 * Name variations used as exact-match keys into the directory cache.
 * Order is stable and duplicates are removed.
 */
export function generateNameVariations(name: string): string[] {
  const { first, middle, last, full } = getNameParts(name);
  const f = initial(first);

  const variations = [
    full,
    `${first} ${last}`,
    `${last} ${first}`,
    f ? `${f} ${last}` : '',
    f ? `${f}${last}` : '',
    last,
    first,
  ];

  if (middle) {
    const m = initial(middle);
    variations.push(`${first} ${middle} ${last}`, `${first} ${m} ${last}`, f ? `${f} ${m} ${last}` : '');
  }

  if (last.includes('-')) {
    const halves = last.split('-');
    variations.push(halves[0], halves[halves.length - 1]);
  }

  const seen = new Set<string>();
  const result: string[] = [];
  for (const variation of variations) {
    const trimmed = variation.trim();
    if (trimmed && !seen.has(trimmed)) {
      seen.add(trimmed);
      result.push(trimmed);
    }
  }
  return result;
}

// ============ Sequence similarity ============

type Block = [number, number, number];

function findLongestMatch(
  a: string[],
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
  b2j: Map<string, number[]>
): Block {
  let besti = alo;
  let bestj = blo;
  let bestsize = 0;
  let j2len = new Map<number, number>();

  for (let i = alo; i < ahi; i++) {
    const newj2len = new Map<number, number>();
    for (const j of b2j.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (j2len.get(j - 1) ?? 0) + 1;
      newj2len.set(j, k);
      if (k > bestsize) {
        besti = i - k + 1;
        bestj = j - k + 1;
        bestsize = k;
      }
    }
    j2len = newj2len;
  }

  return [besti, bestj, bestsize];
}

/**
 * Ratio of matched characters, 2*M / (|a| + |b|), where M is the size of the
 * recursively found longest common blocks.
 */
export function sequenceRatio(left: string, right: string): number {
  const a = Array.from(left);
  const b = Array.from(right);
  const total = a.length + b.length;
  if (total === 0) return 1;

  const b2j = new Map<string, number[]>();
  b.forEach((char, index) => {
    const indices = b2j.get(char);
    if (indices) indices.push(index);
    else b2j.set(char, [index]);
  });

  let matched = 0;
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) break;
    const [alo, ahi, blo, bhi] = next;
    const [i, j, k] = findLongestMatch(a, alo, ahi, blo, bhi, b2j);
    if (k === 0) continue;

    matched += k;
    if (alo < i && blo < j) queue.push([alo, i, blo, j]);
    if (i + k < ahi && j + k < bhi) queue.push([i + k, ahi, j + k, bhi]);
  }

  return (2 * matched) / total;
}

/**
 * Similarity of two names in [0, 1]: 1 for identical normalized forms, 0.9
 * when one contains the other, otherwise the sequence ratio.
 */
export function nameSimilarity(name1: string, name2: string): number {
  const norm1 = normalizeName(name1);
  const norm2 = normalizeName(name2);

  if (norm1 === norm2) return 1;
  if (!norm1 || !norm2) return 0;
  if (norm1.includes(norm2) || norm2.includes(norm1)) return 0.9;

  return sequenceRatio(norm1, norm2);
}

/**
 * Score how plausibly an email address belongs to a person, from the local
 * part alone.
 */
export function emailNameScore(email: string, name: string): number {
  if (!email || !name) return 0;

  const localPart = email.toLowerCase().split('@')[0];
  const { first, last, full } = getNameParts(name);
  if (!full || !localPart) return 0;

  let score = 0;

  if (last.length > 2 && localPart.includes(last)) score += 0.5;
  if (first.length > 2 && localPart.includes(first)) score += 0.3;

  const f = initial(first);
  const patterns = [
    `${f}${last}`,
    `${f}_${last}`,
    `${f}.${last}`,
    `${last}${f}`,
    `${first}.${last}`,
    `${first}_${last}`,
    `${first}${last}`,
    `${last}.${first}`,
    `${last}_${first}`,
  ];
  if (patterns.some((pattern) => localPart.includes(pattern))) {
    score += 0.2;
  }

  if (nameSimilarity(localPart, `${first}${last}`) > 0.7) {
    score += 0.1;
  }

  return Math.min(score, 1);
}
