/**
 * Scopus client for reference discovery and abstract lookup
 */

export * from './client.js';
export * from './mapping.js';
export * from './sources.js';
export * from './types.js';
