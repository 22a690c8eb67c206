/**
 * Crawler-facing adapters over the Scopus client
 */

import type { DocumentRef, ReferenceSource } from '@citewalk/core';
import type { ScopusClient, ScopusPaper } from './types.js';

function toRef(paper: ScopusPaper): DocumentRef {
  return { id: paper.doi, title: paper.title };
}

export function createScopusReferenceSource(client: ScopusClient): ReferenceSource {
  return {
    async references(id: string): Promise<DocumentRef[]> {
      const papers = await client.getReferences(id);
      return papers.map(toRef);
    },

    // The title itself is not sent: Scopus matches better on a few significant terms
    async searchByTitle(_title: string, terms: string[], limit: number): Promise<DocumentRef[]> {
      const papers = await client.searchByTerms(terms, limit);
      return papers.map(toRef);
    },
  };
}

/**
 * Abstract text by DOI; empty string when Scopus has nothing
 */
export function createScopusAbstractSource(client: ScopusClient): { fetch(id: string): Promise<string> } {
  return {
    async fetch(id: string): Promise<string> {
      const abstract = await client.getAbstract(id);
      return abstract?.text ?? '';
    },
  };
}
