/**
 * Discovery strategies, tried in order until one yields candidates:
 * the document's own reference list, then a title-term search.
 */

import { titleTerms } from './keywords.js';
import { isPlaceholderId } from './seed.js';
import type { DocumentRef, ReferenceSource, WorkItem } from './types.js';

export type DiscoveryStrategyName = 'references' | 'title-search';

export interface DiscoveryStrategy {
  name: DiscoveryStrategyName;
  applies(item: WorkItem): boolean;
  discover(item: WorkItem): Promise<DocumentRef[]>;
}

export interface DiscoveryOptions {
  titleTermCount: number;
  searchLimit: number;
}

export function referenceListStrategy(source: ReferenceSource): DiscoveryStrategy {
  return {
    name: 'references',
    // A placeholder id has nothing to look up
    applies: item => !isPlaceholderId(item.ref.id),
    discover: item => source.references(item.ref.id),
  };
}

export function titleSearchStrategy(source: ReferenceSource, options: DiscoveryOptions): DiscoveryStrategy {
  return {
    name: 'title-search',
    applies: item => titleTerms(item.ref.title, options.titleTermCount).length > 0,
    discover: item =>
      source.searchByTitle(
        item.ref.title,
        titleTerms(item.ref.title, options.titleTermCount),
        options.searchLimit
      ),
  };
}

export function createDiscoveryStrategies(source: ReferenceSource, options: DiscoveryOptions): DiscoveryStrategy[] {
  return [referenceListStrategy(source), titleSearchStrategy(source, options)];
}
