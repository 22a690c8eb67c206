/**
 * Best-effort identifier and title recovery from a seed document's text
 */

import { PLACEHOLDER_SEED_ID, PLACEHOLDER_SEED_TITLE, type DocumentRef } from './types.js';

const TITLE_SCAN_LINES = 15;
const TITLE_MIN_LENGTH = 20;
const TITLE_MAX_LENGTH = 200;

// Running headers/footers that precede the real title
const HEADER_MARKERS = ['doi', 'page', 'journal', 'research article'];

const DOI_PATTERN = /(?:doi\.org\/|doi:?\s*)(10\.\d+\/[^\s\]),;"]+)/i;

export function findSeedTitle(text: string): string | undefined {
  const lines = text.split('\n').slice(0, TITLE_SCAN_LINES);
  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (line.length < TITLE_MIN_LENGTH || line.length > TITLE_MAX_LENGTH) {
      continue;
    }
    const lower = line.toLowerCase();
    if (HEADER_MARKERS.some(marker => lower.includes(marker))) {
      continue;
    }
    return line;
  }
  return undefined;
}

export function findDoi(text: string): string | undefined {
  const match = DOI_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }
  return match[1].replace(/\.+$/, '');
}

/**
 * Identify the seed document from its own text, falling back to placeholders
 */
export function identifySeed(text: string): DocumentRef {
  return {
    id: findDoi(text) ?? PLACEHOLDER_SEED_ID,
    title: findSeedTitle(text) ?? PLACEHOLDER_SEED_TITLE,
  };
}

export function isPlaceholderId(id: string): boolean {
  return id === PLACEHOLDER_SEED_ID;
}
