/**
 * Shared crawl types and collaborator contracts
 */

/**
 * A document in the citation graph. Identity is by `id` (exact string match).
 */
export interface DocumentRef {
  id: string;
  title: string;
}

export type WorkItem = Readonly<{
  ref: Readonly<DocumentRef>;
  distance: number; // BFS depth from the seed, seed = 0
  text: string;
}>;

/**
 * One extracted fact, stamped with the document it came from.
 * `payload` is opaque to the crawler.
 */
export interface FactRecord {
  sourceId: string;
  distance: number;
  title: string;
  payload: Record<string, string>;
}

export interface SeedDocument {
  id: string;
  title: string;
  text: string;
}

/**
 * Resolves document text. An empty string means "unavailable", not an error.
 */
export interface TextSource {
  fetch(id: string): Promise<string>;
  fetchSeed(input: string): Promise<SeedDocument>;
}

/**
 * Turns raw text into fact payloads. Implementations recover from malformed
 * upstream output and resolve to [] rather than rejecting.
 */
export interface FactExtractor {
  extract(text: string): Promise<Array<Record<string, string>>>;
}

/**
 * Lists candidate related documents. "Nothing found" resolves to [];
 * only transport/auth failures reject.
 */
export interface ReferenceSource {
  references(id: string): Promise<DocumentRef[]>;
  searchByTitle(title: string, terms: string[], limit: number): Promise<DocumentRef[]>;
}

export interface ResultSink {
  write(records: readonly FactRecord[], columns: readonly string[]): Promise<void>;
}

export type Outcome<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'empty' }
  | { kind: 'failed'; error: Error };

export type FailureStage = 'seed' | 'extract' | 'discover' | 'fetch';

export interface CollaboratorFailure {
  stage: FailureStage;
  id: string;
  message: string;
}

export type CrawlState = 'INIT' | 'SEEDING' | 'DRAINING' | 'DONE';

export type CrawlStatus = 'completed' | 'seed_failed' | 'cancelled';

export interface ProcessedDocument {
  id: string;
  title: string;
  distance: number;
  facts: number;
}

export interface CrawlReport {
  status: CrawlStatus;
  seed?: DocumentRef;
  records: FactRecord[];
  processed: ProcessedDocument[];
  distanceCounts: Record<number, number>; // processed documents per distance
  failures: CollaboratorFailure[];
}

export interface CrawlOptions {
  maxTotal: number;
  maxDepth: number;
  keywords: string[];
  delayMs: number;
  searchLimit: number;
  titleTermCount: number;
}

export const DEFAULT_CRAWL_OPTIONS: CrawlOptions = {
  maxTotal: 20,
  maxDepth: 2,
  keywords: [],
  delayMs: 3000,
  searchLimit: 15,
  titleTermCount: 3,
};

export const PLACEHOLDER_SEED_ID = 'SEED_PAPER';
export const PLACEHOLDER_SEED_TITLE = 'Seed Paper';
