/**
 * Breadth-first citation crawler
 *
 * INIT -> SEEDING -> DRAINING -> DONE. One document is processed at a time;
 * collaborator failures reduce output but never abort the run. The only
 * fatal condition is a seed document without text.
 */

import { pino, type Logger } from 'pino';
import { FactCollection } from './collector.js';
import { createDiscoveryStrategies, type DiscoveryStrategy, type DiscoveryStrategyName } from './discovery.js';
import { Frontier } from './frontier.js';
import { filterByKeywords } from './keywords.js';
import { delay, settle } from './outcome.js';
import {
  DEFAULT_CRAWL_OPTIONS,
  type CollaboratorFailure,
  type CrawlOptions,
  type CrawlReport,
  type CrawlState,
  type CrawlStatus,
  type DocumentRef,
  type FactExtractor,
  type FailureStage,
  type ProcessedDocument,
  type ReferenceSource,
  type TextSource,
  type WorkItem,
} from './types.js';

const defaultLogger = pino({ level: process.env.LOG_LEVEL || 'info' });

export interface CrawlerDeps {
  textSource: TextSource;
  extractor: FactExtractor;
  referenceSource: ReferenceSource;
  logger?: Logger;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onStateChange?: (state: CrawlState) => void;
}

interface RunContext {
  frontier: Frontier;
  facts: FactCollection;
  failures: CollaboratorFailure[];
  processed: ProcessedDocument[];
}

interface DiscoveryResult {
  strategy?: DiscoveryStrategyName;
  candidates: DocumentRef[];
}

function isBlank(text: string): boolean {
  return text.trim().length === 0;
}

function shortTitle(title: string): string {
  return title.length > 50 ? `${title.substring(0, 50)}...` : title;
}

export class Crawler {
  private readonly options: CrawlOptions;
  private readonly logger: Logger;
  private readonly strategies: DiscoveryStrategy[];
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(private readonly deps: CrawlerDeps, options: Partial<CrawlOptions> = {}) {
    this.options = { ...DEFAULT_CRAWL_OPTIONS, ...options };
    this.logger = deps.logger ?? defaultLogger;
    this.sleep = deps.sleep ?? delay;
    this.strategies = createDiscoveryStrategies(deps.referenceSource, {
      titleTermCount: this.options.titleTermCount,
      searchLimit: this.options.searchLimit,
    });
  }

  /**
   * Crawl from the seed. Each call owns its own frontier and results.
   */
  async run(seedInput: string, signal?: AbortSignal): Promise<CrawlReport> {
    const { maxTotal, maxDepth } = this.options;
    const ctx: RunContext = {
      frontier: new Frontier(),
      facts: new FactCollection(),
      failures: [],
      processed: [],
    };

    this.transition('INIT');
    this.transition('SEEDING');

    const seedOutcome = await settle(() => this.deps.textSource.fetchSeed(seedInput), seed => isBlank(seed.text));
    if (seedOutcome.kind !== 'ok') {
      const message = seedOutcome.kind === 'failed' ? seedOutcome.error.message : 'Seed document has no text';
      this.recordFailure(ctx, 'seed', seedInput, message);
      this.logger.error({ event: 'crawl.seed.fail', seedInput, error: message }, 'Could not obtain seed document text');
      return this.finish(ctx, 'seed_failed');
    }

    const seed: DocumentRef = { id: seedOutcome.value.id, title: seedOutcome.value.title };
    ctx.frontier.enqueue(seed, 0, seedOutcome.value.text);
    this.logger.info(
      { event: 'crawl.seed.success', id: seed.id, title: seed.title, chars: seedOutcome.value.text.length },
      'Seed document loaded'
    );

    this.transition('DRAINING');

    let processedCount = 0;
    let cancelled = false;

    while (!ctx.frontier.isEmpty && ctx.frontier.hasCapacity(processedCount, maxTotal)) {
      if (signal?.aborted) {
        cancelled = true;
        break;
      }

      const item = ctx.frontier.dequeue();
      if (!item) break;
      processedCount += 1;

      this.logger.info(
        { event: 'crawl.item.start', id: item.ref.id, distance: item.distance, position: processedCount, maxTotal },
        `Processing paper ${processedCount}/${maxTotal} (distance ${item.distance}): ${shortTitle(item.ref.title)}`
      );

      const factCount = await this.extractFacts(ctx, item);
      ctx.processed.push({ id: item.ref.id, title: item.ref.title, distance: item.distance, facts: factCount });

      if (item.distance < maxDepth) {
        await this.expand(ctx, item, processedCount);
      }

      if (!ctx.frontier.isEmpty && ctx.frontier.hasCapacity(processedCount, maxTotal)) {
        this.logger.debug({ event: 'crawl.delay', delayMs: this.options.delayMs }, 'Waiting before next paper');
        await this.sleep(this.options.delayMs, signal);
      }
    }

    // An abort during the final item still counts as a cancelled run
    if (signal?.aborted) {
      cancelled = true;
    }

    if (cancelled) {
      this.logger.warn(
        { event: 'crawl.cancelled', processed: processedCount, pending: ctx.frontier.pendingCount },
        'Crawl cancelled'
      );
    }

    return this.finish(ctx, cancelled ? 'cancelled' : 'completed', seed);
  }

  private async extractFacts(ctx: RunContext, item: WorkItem): Promise<number> {
    const outcome = await settle(() => this.deps.extractor.extract(item.text), payloads => payloads.length === 0);

    if (outcome.kind === 'failed') {
      this.recordFailure(ctx, 'extract', item.ref.id, outcome.error.message);
      this.logger.warn(
        { event: 'crawl.extract.fail', id: item.ref.id, error: outcome.error.message },
        'Fact extraction failed, continuing with zero facts'
      );
      return 0;
    }

    const stamped = outcome.kind === 'ok' ? ctx.facts.append(item, outcome.value) : [];
    this.logger.info(
      { event: 'crawl.extract.success', id: item.ref.id, facts: stamped.length },
      `Found ${stamped.length} facts`
    );
    return stamped.length;
  }

  private async discover(ctx: RunContext, item: WorkItem): Promise<DiscoveryResult> {
    for (const strategy of this.strategies) {
      if (!strategy.applies(item)) {
        this.logger.debug(
          { event: 'crawl.discover.skip', id: item.ref.id, strategy: strategy.name },
          'Strategy not applicable'
        );
        continue;
      }

      const outcome = await settle(() => strategy.discover(item), candidates => candidates.length === 0);
      if (outcome.kind === 'ok') {
        return { strategy: strategy.name, candidates: outcome.value };
      }
      if (outcome.kind === 'failed') {
        this.recordFailure(ctx, 'discover', item.ref.id, `${strategy.name}: ${outcome.error.message}`);
        this.logger.warn(
          { event: 'crawl.discover.fail', id: item.ref.id, strategy: strategy.name, error: outcome.error.message },
          'Discovery failed'
        );
      } else {
        this.logger.info(
          { event: 'crawl.discover.empty', id: item.ref.id, strategy: strategy.name },
          'No candidates found'
        );
      }
    }
    return { candidates: [] };
  }

  private async expand(ctx: RunContext, item: WorkItem, processedCount: number): Promise<void> {
    const { maxTotal, keywords } = this.options;
    const { strategy, candidates } = await this.discover(ctx, item);
    const retained = filterByKeywords(candidates, keywords);

    this.logger.info(
      {
        event: 'crawl.discover.success',
        id: item.ref.id,
        strategy,
        found: candidates.length,
        retained: retained.length,
      },
      `Found ${candidates.length} potential references, ${retained.length} retained`
    );

    let added = 0;
    for (const candidate of retained) {
      if (ctx.frontier.pendingCount + processedCount >= maxTotal) {
        this.logger.info(
          {
            event: 'crawl.enqueue.budget_reached',
            id: item.ref.id,
            pending: ctx.frontier.pendingCount,
            processedCount,
          },
          'Enough papers queued for the budget'
        );
        break;
      }

      if (ctx.frontier.isKnown(candidate.id)) {
        continue;
      }

      const text = await settle(() => this.deps.textSource.fetch(candidate.id), isBlank);
      if (text.kind === 'failed') {
        this.recordFailure(ctx, 'fetch', candidate.id, text.error.message);
        this.logger.warn(
          { event: 'crawl.fetch.fail', id: candidate.id, error: text.error.message },
          'Text fetch failed'
        );
        continue;
      }
      if (text.kind === 'empty') {
        this.logger.info(
          { event: 'crawl.fetch.empty', id: candidate.id },
          `No text available for: ${shortTitle(candidate.title)}`
        );
        continue;
      }

      if (ctx.frontier.enqueue(candidate, item.distance + 1, text.value)) {
        added += 1;
        this.logger.info(
          { event: 'crawl.enqueue.success', id: candidate.id, distance: item.distance + 1 },
          `Added to queue (distance ${item.distance + 1}): ${shortTitle(candidate.title)}`
        );
      }
    }

    this.logger.info({ event: 'crawl.expand.done', id: item.ref.id, added }, `Added ${added} new references to queue`);
  }

  private recordFailure(ctx: RunContext, stage: FailureStage, id: string, message: string): void {
    ctx.failures.push({ stage, id, message });
  }

  private finish(ctx: RunContext, status: CrawlStatus, seed?: DocumentRef): CrawlReport {
    const distanceCounts: Record<number, number> = {};
    for (const doc of ctx.processed) {
      distanceCounts[doc.distance] = (distanceCounts[doc.distance] ?? 0) + 1;
    }

    this.transition('DONE');
    this.logger.info(
      {
        event: 'crawl.done',
        status,
        processed: ctx.processed.length,
        records: ctx.facts.size,
        failures: ctx.failures.length,
      },
      'Crawl finished'
    );

    return {
      status,
      seed,
      records: ctx.facts.records(),
      processed: [...ctx.processed],
      distanceCounts,
      failures: [...ctx.failures],
    };
  }

  private transition(state: CrawlState): void {
    this.deps.onStateChange?.(state);
  }
}
