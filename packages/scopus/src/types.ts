/**
 * Types for the Scopus REST client
 */

export interface ScopusClientConfig {
  apiKey: string;
  baseUrl?: string;
  timeout?: number; // per request, ms
  maxRetries?: number;
  backoffBaseMs?: number;
  referenceCount?: number; // references requested per paper
  maxReferences?: number; // references returned per paper
  fetch?: typeof fetch;
}

export class ScopusError extends Error {
  constructor(
    message: string,
    readonly statusCode?: number,
    readonly responseBody?: string
  ) {
    super(message);
    this.name = 'ScopusError';
  }
}

export interface ScopusPaper {
  doi: string;
  title: string;
}

export interface ScopusAbstract {
  title?: string;
  text: string;
}

export interface ScopusClient {
  findScopusId(doi: string): Promise<string | undefined>;
  getReferences(doi: string): Promise<ScopusPaper[]>;
  searchByTerms(terms: string[], limit: number): Promise<ScopusPaper[]>;
  getAbstract(doi: string): Promise<ScopusAbstract | undefined>;
}
