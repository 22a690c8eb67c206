/**
 * Crawl engine: frontier, crawler and collaborator contracts
 */

export * from './types.js';
export * from './frontier.js';
export * from './keywords.js';
export * from './seed.js';
export * from './outcome.js';
export * from './discovery.js';
export * from './collector.js';
export * from './crawler.js';
