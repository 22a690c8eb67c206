/**
 * Document text for the crawl: the seed from a local PDF or a DOI, every
 * other paper from its Scopus abstract
 */

import { existsSync } from 'fs';
import { pino } from 'pino';
import { identifySeed, type SeedDocument, type TextSource } from '@citewalk/core';
import type { PdfExtractionResult } from '@citewalk/pdf';
import type { ScopusClient } from '@citewalk/scopus';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export interface TextSourceDeps {
  pdf: { extract(path: string): Promise<PdfExtractionResult> };
  scopus: Pick<ScopusClient, 'getAbstract'>;
  fileExists?: (path: string) => boolean;
}

export function isPdfSeed(input: string, fileExists: (path: string) => boolean = existsSync): boolean {
  return input.toLowerCase().endsWith('.pdf') || fileExists(input);
}

export function createCrawlTextSource(deps: TextSourceDeps): TextSource {
  const fileExists = deps.fileExists ?? existsSync;

  async function abstractText(id: string): Promise<{ title?: string; text: string }> {
    const abstract = await deps.scopus.getAbstract(id);
    return { title: abstract?.title, text: abstract?.text ?? '' };
  }

  return {
    async fetch(id: string): Promise<string> {
      const { text } = await abstractText(id);
      return text;
    },

    async fetchSeed(input: string): Promise<SeedDocument> {
      if (isPdfSeed(input, fileExists)) {
        const { text } = await deps.pdf.extract(input);
        const ref = identifySeed(text);
        logger.info(
          {
            event: 'seed.identify.success',
            source: 'pdf',
            id: ref.id,
            title: ref.title,
            textLength: text.length,
          },
          'Identified seed paper'
        );
        return { ...ref, text };
      }

      const doi = input.trim();
      const { title, text } = await abstractText(doi);
      const seedTitle = title ?? identifySeed(text).title;
      logger.info(
        {
          event: 'seed.identify.success',
          source: 'scopus',
          id: doi,
          title: seedTitle,
          textLength: text.length,
        },
        'Identified seed paper'
      );
      return { id: doi, title: seedTitle, text };
    },
  };
}
