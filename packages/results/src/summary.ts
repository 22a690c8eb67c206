import type { FactRecord } from '@citewalk/core';
import { UNSPECIFIED } from './csv.js';

export interface ResultSummary {
  entries: number;
  uniqueSpecies: number;
  entriesByDistance: Array<{ distance: number; entries: number }>;
}

/**
 * Counts for the end-of-run report
 */
export function summarizeRecords(records: readonly FactRecord[]): ResultSummary {
  const species = new Set<string>();
  const byDistance = new Map<number, number>();

  for (const record of records) {
    species.add(record.payload.species ?? UNSPECIFIED);
    byDistance.set(record.distance, (byDistance.get(record.distance) ?? 0) + 1);
  }

  return {
    entries: records.length,
    uniqueSpecies: species.size,
    entriesByDistance: [...byDistance.entries()]
      .sort(([a], [b]) => a - b)
      .map(([distance, entries]) => ({ distance, entries })),
  };
}
