/**
 * Recovery of JSON payloads from free-form model output
 */

import { z } from 'zod';
import type { SpeciesFact } from './types.js';

const FENCE_OPEN = /```(?:json)?\n/g;
const FENCE_CLOSE = /\n```/g;
const EMBEDDED_JSON = /(\[[\s\S]*\]|\{[\s\S]*\})/;

/**
 * Parse the first JSON array or object embedded in `text`.
 * Returns undefined when nothing parses.
 */
export function recoverJson(text: string): unknown {
  const unfenced = text.replace(FENCE_OPEN, '').replace(FENCE_CLOSE, '');
  const match = EMBEDDED_JSON.exec(unfenced);
  const candidate = match ? match[1] : unfenced;
  try {
    return JSON.parse(candidate);
  } catch {
    return undefined;
  }
}

// Model output is loosely typed: numbers, nulls and missing keys all occur
const FieldSchema = z.unknown().transform(value => {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value).trim();
});

const SpeciesItemSchema = z.object({
  species: FieldSchema,
  abundance_or_biomass: FieldSchema,
  number: FieldSchema,
  location: FieldSchema,
});

/**
 * Normalize a parsed payload into species facts.
 * A lone object counts as a one-element list; non-object entries are dropped.
 */
export function toSpeciesFacts(parsed: unknown): SpeciesFact[] {
  const items = Array.isArray(parsed) ? parsed : parsed !== null && typeof parsed === 'object' ? [parsed] : [];
  const facts: SpeciesFact[] = [];

  for (const item of items) {
    if (item === null || typeof item !== 'object' || Array.isArray(item)) {
      continue;
    }
    const result = SpeciesItemSchema.safeParse(item);
    if (!result.success) {
      continue;
    }
    const { species, abundance_or_biomass, number, location } = result.data;
    facts.push({
      species: species ?? 'UNSPECIFIED',
      abundance_or_biomass: abundance_or_biomass ?? 'not specified',
      number: number ?? 'not specified',
      location: location ?? 'UNSPECIFIED',
    });
  }

  return facts;
}
