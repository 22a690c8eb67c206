/**
 * Species observation extractor backed by an LLM
 */

import { pino } from 'pino';
import type { FactExtractor } from '@citewalk/core';
import { recoverJson, toSpeciesFacts } from './parse.js';
import type { LlmClient, SpeciesFact } from './types.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export interface SpeciesExtractorOptions {
  maxChars?: number; // paper text sent to the model
  maxTokens?: number;
}

/**
 * Build the extraction prompt
 */
export function buildSpeciesPrompt(text: string, maxChars: number): string {
  return `Extract species information from this research paper. Return ONLY a JSON array.

For each species in the study, extract:
- species: scientific name (Genus species)
- abundance_or_biomass: population data, density, biomass measurements
- number: specimen count or sample size
- location: study location or habitat

Return format:
[
  {
    "species": "Genus species",
    "abundance_or_biomass": "density/biomass data or not specified",
    "number": "count or not specified",
    "location": "location"
  }
]

Text: ${text.substring(0, maxChars)}`;
}

export function createSpeciesExtractor(client: LlmClient, options: SpeciesExtractorOptions = {}): FactExtractor {
  const { maxChars = 40000, maxTokens = 2000 } = options;

  return {
    async extract(text: string): Promise<Array<Record<string, string>>> {
      let reply: string;
      try {
        reply = await client.complete({ prompt: buildSpeciesPrompt(text, maxChars), maxTokens, temperature: 0 });
      } catch (error: unknown) {
        logger.warn(
          {
            event: 'llm.extract.fail',
            reason: 'request',
            error: error instanceof Error ? error.message : String(error),
          },
          'Species extraction request failed'
        );
        return [];
      }

      const parsed = recoverJson(reply);
      if (parsed === undefined) {
        logger.warn(
          { event: 'llm.extract.fail', reason: 'malformed', preview: reply.substring(0, 100) },
          'Model reply held no parseable JSON'
        );
        return [];
      }

      const facts: SpeciesFact[] = toSpeciesFacts(parsed);
      logger.debug({ event: 'llm.extract.success', facts: facts.length }, 'Species facts extracted');
      return facts.map(fact => ({ ...fact }));
    },
  };
}
