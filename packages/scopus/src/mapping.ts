/**
 * Mapping of Scopus JSON payloads. The API nests inconsistently
 * (single objects where lists are expected, strings where objects are),
 * so everything is read from `unknown` defensively.
 */

import { z } from 'zod';
import type { ScopusAbstract, ScopusPaper } from './types.js';

type JsonRecord = Record<string, unknown>;

const RecordSchema = z.record(z.unknown());

const SearchResponseSchema = z.object({
  'search-results': z
    .object({
      entry: z.union([z.array(z.unknown()), RecordSchema]).optional(),
    })
    .optional(),
});

const ReferencesResponseSchema = z.object({
  'abstract-retrieval-response': z
    .object({
      references: z.union([z.array(z.unknown()), RecordSchema]).nullish(),
    })
    .optional(),
});

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asList(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  return value === undefined || value === null ? [] : [value];
}

function readString(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

function child(value: unknown, key: string): unknown {
  return isRecord(value) ? value[key] : undefined;
}

export function searchEntries(data: unknown): JsonRecord[] {
  const parsed = SearchResponseSchema.safeParse(data);
  if (!parsed.success) return [];
  return asList(parsed.data['search-results']?.entry).filter(isRecord);
}

/**
 * Scopus id of the first search hit, without the SCOPUS_ID: prefix
 */
export function toScopusId(data: unknown): string | undefined {
  const [first] = searchEntries(data);
  const id = readString(first?.['dc:identifier']).replace('SCOPUS_ID:', '');
  return id || undefined;
}

/**
 * Search hits that carry both a DOI and a title
 */
export function toSearchPapers(data: unknown): ScopusPaper[] {
  const papers: ScopusPaper[] = [];
  for (const entry of searchEntries(data)) {
    const doi = readString(entry['prism:doi']);
    const title = readString(entry['dc:title']);
    if (doi && title) {
      papers.push({ doi, title });
    }
  }
  return papers;
}

function referenceDoi(ref: JsonRecord): string {
  const info = ref['ref-info'];
  const fromPublication = readString(child(child(info, 'ref-publicationtitle'), 'prism:doi'));
  if (fromPublication) return fromPublication;

  const direct = readString(ref['prism:doi']);
  if (direct) return direct;

  const itemIds = asList(child(child(info, 'refd-itemidlist'), 'itemid'));
  for (const itemId of itemIds) {
    if (readString(child(itemId, '@idtype')).toUpperCase() === 'DOI') {
      return readString(child(itemId, '$'));
    }
  }
  return '';
}

function referenceTitle(ref: JsonRecord): string {
  const info = ref['ref-info'];
  const refTitle = child(info, 'ref-title');
  const title = isRecord(refTitle) ? readString(refTitle['ref-titletext']) : readString(refTitle);
  return title || readString(child(info, 'ref-titletext')) || readString(ref['title']);
}

/**
 * References with a DOI and a title longer than ten characters, capped at `max`
 */
export function toReferencePapers(data: unknown, max: number): ScopusPaper[] {
  const parsed = ReferencesResponseSchema.safeParse(data);
  if (!parsed.success) return [];

  const section = parsed.data['abstract-retrieval-response']?.references;
  const references = isRecord(section) ? asList(section['reference']) : asList(section);

  const papers: ScopusPaper[] = [];
  for (const ref of references) {
    if (!isRecord(ref)) continue;
    const doi = referenceDoi(ref);
    const title = referenceTitle(ref);
    if (doi && title.length > 10) {
      papers.push({ doi, title });
    }
  }
  return papers.slice(0, max);
}

/**
 * Title and abstract of the first hit, as the text handed to extraction
 */
export function toAbstract(data: unknown): ScopusAbstract | undefined {
  const [first] = searchEntries(data);
  if (!first) return undefined;

  const title = readString(first['dc:title']);
  const description = readString(first['dc:description']);
  const parts: string[] = [];
  if (title) parts.push(`Title: ${title}`);
  if (description) parts.push(`Abstract: ${description}`);

  if (parts.length === 0) return undefined;
  return { title: title || undefined, text: parts.join('\n\n') };
}
