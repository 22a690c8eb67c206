/**
 * CSV result sink
 *
 * Every field is double-quoted; embedded quotes are doubled. Record order is
 * preserved and each record fills the fixed column order, missing fields
 * becoming UNSPECIFIED.
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { pino } from 'pino';
import type { FactRecord, ResultSink } from '@citewalk/core';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export const UNSPECIFIED = 'UNSPECIFIED';

export const SPECIES_COLUMNS = [
  'doi',
  'species',
  'abundance_or_biomass',
  'number',
  'location',
  'distance_from_seed',
  'title',
] as const;

export function quoteField(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * Flatten a record into column -> value. Provenance columns come from the
 * record itself and win over payload keys of the same name.
 */
function toRow(record: FactRecord): Record<string, string> {
  return {
    ...record.payload,
    doi: record.sourceId,
    distance_from_seed: String(record.distance),
    title: record.title,
  };
}

export function formatCsv(records: readonly FactRecord[], columns: readonly string[]): string {
  const lines = [columns.map(quoteField).join(',')];
  for (const record of records) {
    const row = toRow(record);
    lines.push(columns.map(column => quoteField(row[column] ?? UNSPECIFIED)).join(','));
  }
  return `${lines.join('\n')}\n`;
}

export function createCsvResultSink(path: string): ResultSink {
  return {
    async write(records: readonly FactRecord[], columns: readonly string[]): Promise<void> {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, formatCsv(records, columns), 'utf8');
      logger.info({ event: 'results.csv.write', path, rows: records.length }, `Wrote ${records.length} rows`);
    },
  };
}
