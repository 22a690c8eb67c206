/**
 * Title term extraction and keyword filtering for discovery
 */

import type { DocumentRef } from './types.js';

const STOPWORDS = new Set(['the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for', 'of', 'with', 'by']);

/**
 * Significant words of a title, used as search terms.
 * Lowercased words of at least four letters, stopwords and repeats removed,
 * in order of first appearance.
 */
export function titleTerms(title: string, count: number): string[] {
  const words = title.toLowerCase().match(/\b[a-z]{4,}\b/g) ?? [];
  const terms: string[] = [];
  for (const word of words) {
    if (STOPWORDS.has(word) || terms.includes(word)) {
      continue;
    }
    terms.push(word);
    if (terms.length >= count) {
      break;
    }
  }
  return terms;
}

/**
 * Keep candidates whose title contains at least one keyword (case-insensitive).
 * An empty keyword list keeps everything.
 */
export function filterByKeywords<T extends DocumentRef>(candidates: readonly T[], keywords: readonly string[]): T[] {
  const needles = keywords.map(k => k.trim().toLowerCase()).filter(k => k.length > 0);
  if (needles.length === 0) {
    return [...candidates];
  }
  return candidates.filter(candidate => {
    const title = candidate.title.toLowerCase();
    return needles.some(needle => title.includes(needle));
  });
}

/**
 * Parse a comma-separated keyword list
 */
export function parseKeywordList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map(k => k.trim())
    .filter(k => k.length > 0);
}
