/**
 * LLM-backed fact extraction
 */

export * from './client.js';
export * from './extractor.js';
export * from './parse.js';
export * from './types.js';
