/**
 * One crawl run from parsed options to the CSV file
 */

import type { Logger } from 'pino';
import { Crawler, type CrawlerDeps, type CrawlReport, type ResultSink } from '@citewalk/core';
import { SPECIES_COLUMNS, createCsvResultSink, summarizeRecords } from '@citewalk/results';
import type { CliOptions } from './options.js';

export interface RunDeps extends Omit<CrawlerDeps, 'logger'> {
  logger: Logger;
  createSink?: (path: string) => ResultSink;
}

export interface RunResult {
  exitCode: number;
  report: CrawlReport;
  written: boolean;
}

export async function runCrawl(
  options: CliOptions,
  outputPath: string,
  deps: RunDeps,
  signal?: AbortSignal
): Promise<RunResult> {
  const { logger, createSink = createCsvResultSink, ...crawlerDeps } = deps;

  logger.info(
    {
      event: 'run.start',
      seedPaper: options.seedPaper,
      outputPath,
      maxPapers: options.maxPapers,
      maxDepth: options.maxDepth,
      keywords: options.keywords,
    },
    'Starting reference-based species extraction'
  );

  const crawler = new Crawler(
    { ...crawlerDeps, logger },
    {
      maxTotal: options.maxPapers,
      maxDepth: options.maxDepth,
      keywords: options.keywords,
      delayMs: options.delayMs,
    }
  );
  const report = await crawler.run(options.seedPaper, signal);

  if (report.status === 'seed_failed') {
    logger.error({ event: 'run.seed.fail', seedPaper: options.seedPaper }, 'Could not extract text from seed paper');
    return { exitCode: 1, report, written: false };
  }

  if (report.records.length === 0) {
    logger.warn(
      { event: 'run.results.empty', processed: report.processed.length },
      'No species data extracted, no output file written'
    );
    return { exitCode: 0, report, written: false };
  }

  await createSink(outputPath).write(report.records, SPECIES_COLUMNS);

  const summary = summarizeRecords(report.records);
  logger.info(
    {
      event: 'run.results.success',
      status: report.status,
      outputPath,
      entries: summary.entries,
      uniqueSpecies: summary.uniqueSpecies,
      entriesByDistance: summary.entriesByDistance,
      papersProcessed: report.processed.length,
      failures: report.failures.length,
    },
    `Saved ${summary.entries} species entries to ${outputPath}`
  );
  for (const { distance, entries } of summary.entriesByDistance) {
    logger.info(`  Distance ${distance}: ${entries} entries`);
  }

  return { exitCode: 0, report, written: true };
}
