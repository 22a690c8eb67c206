/**
 * Command-line options
 */

import { basename, join } from 'path';
import { z } from 'zod';
import { DEFAULT_CRAWL_OPTIONS, parseKeywordList } from '@citewalk/core';

export const USAGE = `Usage: citewalk --seed-paper <pdf|doi> [options]

Crawl the citation graph from a seed paper and extract species observations.
Output columns: doi, species, abundance_or_biomass, number, location, distance_from_seed, title

Options:
  -s,  --seed-paper FILE|DOI   Seed PDF or DOI (required)
  -o,  --output FILE           Output CSV file
       --output-dir DIR        Output directory when --output is not given (default: ./reference_data)
  -ck, --claude-key KEY        Claude API key (default: $ANTHROPIC_API_KEY)
  -sk, --scopus-key KEY        Scopus API key (default: $SCOPUS_API_KEY)
  -mp, --max-papers NUM        Maximum papers to process (default: 20)
  -md, --max-depth NUM         Maximum reference depth (default: 2)
  -kw, --keywords WORDS        Keywords to filter references (comma-separated)
       --delay-ms NUM          Pause between papers in milliseconds (default: 3000)
  -h,  --help                  Show this help

Reference depth:
  Distance 0: Seed paper
  Distance 1: Direct references from seed paper
  Distance 2: References of references

Examples:
  citewalk -s paper.pdf -kw "mammal,wildlife"
  citewalk -s 10.1234/example.5678 -md 3 -mp 50
`;

const FLAGS: Record<string, string> = {
  '--seed-paper': 'seedPaper',
  '-s': 'seedPaper',
  '--output': 'output',
  '-o': 'output',
  '--output-dir': 'outputDir',
  '--claude-key': 'claudeKey',
  '-ck': 'claudeKey',
  '--scopus-key': 'scopusKey',
  '-sk': 'scopusKey',
  '--max-papers': 'maxPapers',
  '-mp': 'maxPapers',
  '--max-depth': 'maxDepth',
  '-md': 'maxDepth',
  '--keywords': 'keywords',
  '-kw': 'keywords',
  '--delay-ms': 'delayMs',
};

const CliOptionsSchema = z.object({
  seedPaper: z
    .string({ required_error: 'Seed paper is required (--seed-paper)' })
    .trim()
    .min(1, 'Seed paper is required (--seed-paper)'),
  output: z.string().trim().min(1, '--output must not be empty').optional(),
  outputDir: z.string().trim().min(1, '--output-dir must not be empty').default('./reference_data'),
  claudeKey: z
    .string({ required_error: 'Claude API key is required (--claude-key or ANTHROPIC_API_KEY)' })
    .trim()
    .min(1, 'Claude API key is required (--claude-key or ANTHROPIC_API_KEY)'),
  scopusKey: z
    .string({ required_error: 'Scopus API key is required (--scopus-key or SCOPUS_API_KEY)' })
    .trim()
    .min(1, 'Scopus API key is required (--scopus-key or SCOPUS_API_KEY)'),
  maxPapers: z.coerce
    .number({ invalid_type_error: '--max-papers must be a number' })
    .int('--max-papers must be a whole number')
    .positive('--max-papers must be at least 1')
    .default(DEFAULT_CRAWL_OPTIONS.maxTotal),
  maxDepth: z.coerce
    .number({ invalid_type_error: '--max-depth must be a number' })
    .int('--max-depth must be a whole number')
    .nonnegative('--max-depth must not be negative')
    .default(DEFAULT_CRAWL_OPTIONS.maxDepth),
  keywords: z.string().default('').transform(parseKeywordList),
  delayMs: z.coerce
    .number({ invalid_type_error: '--delay-ms must be a number' })
    .int('--delay-ms must be a whole number')
    .nonnegative('--delay-ms must not be negative')
    .default(DEFAULT_CRAWL_OPTIONS.delayMs),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export type ParseResult =
  | { kind: 'ok'; options: CliOptions; outputPath: string }
  | { kind: 'help' }
  | { kind: 'error'; message: string };

/**
 * `<output-dir>/<seed basename>_species_data.csv`, spaces turned into
 * underscores and anything outside [A-Za-z0-9_-] removed
 */
export function defaultOutputPath(seedPaper: string, outputDir: string): string {
  const seedName = basename(seedPaper, '.pdf')
    .replace(/ /g, '_')
    .replace(/[^A-Za-z0-9_-]/g, '');
  return join(outputDir, `${seedName || 'seed'}_species_data.csv`);
}

/**
 * Parse argv (without node and script path). API keys fall back to the
 * environment.
 */
export function parseCliArgs(args: readonly string[], env: NodeJS.ProcessEnv = process.env): ParseResult {
  const raw: Record<string, string> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      return { kind: 'help' };
    }
    const key = FLAGS[arg];
    if (!key) {
      return { kind: 'error', message: `Unknown option: ${arg}` };
    }
    const value = args[i + 1];
    if (value === undefined) {
      return { kind: 'error', message: `Missing value for ${arg}` };
    }
    raw[key] = value;
    i++;
  }

  const claudeKey = raw.claudeKey ?? env.ANTHROPIC_API_KEY;
  const scopusKey = raw.scopusKey ?? env.SCOPUS_API_KEY;
  const parsed = CliOptionsSchema.safeParse({ ...raw, claudeKey, scopusKey });
  if (!parsed.success) {
    return { kind: 'error', message: parsed.error.issues[0].message };
  }

  const options = parsed.data;
  return {
    kind: 'ok',
    options,
    outputPath: options.output ?? defaultOutputPath(options.seedPaper, options.outputDir),
  };
}
