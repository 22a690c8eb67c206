import { describe, it, expect } from 'vitest';
import { defaultOutputPath, parseCliArgs } from './options.js';

const KEYS = ['-ck', 'test-claude-key', '-sk', 'test-scopus-key'];

describe('parseCliArgs', () => {
  it('applies defaults and derives the output file from the seed name', () => {
    const result = parseCliArgs(['-s', 'My Paper (2020).pdf', ...KEYS], {});

    expect(result).toEqual({
      kind: 'ok',
      options: {
        seedPaper: 'My Paper (2020).pdf',
        outputDir: './reference_data',
        claudeKey: 'test-claude-key',
        scopusKey: 'test-scopus-key',
        maxPapers: 20,
        maxDepth: 2,
        keywords: [],
        delayMs: 3000,
      },
      outputPath: 'reference_data/My_Paper_2020_species_data.csv',
    });
  });

  it('reads long flags, numbers and the keyword list', () => {
    const result = parseCliArgs(
      [
        '--seed-paper',
        'seed.pdf',
        '--output',
        'out/moths.csv',
        '--max-papers',
        '50',
        '--max-depth',
        '3',
        '--keywords',
        'mammal, wildlife,,',
        '--delay-ms',
        '0',
        '--claude-key',
        'test-claude-key',
        '--scopus-key',
        'test-scopus-key',
      ],
      {}
    );

    expect(result.kind).toBe('ok');
    if (result.kind !== 'ok') return;
    expect(result.options).toMatchObject({ maxPapers: 50, maxDepth: 3, keywords: ['mammal', 'wildlife'], delayMs: 0 });
    expect(result.outputPath).toBe('out/moths.csv');
  });

  it('falls back to API keys from the environment, flags first', () => {
    const env = { ANTHROPIC_API_KEY: 'env-claude-key', SCOPUS_API_KEY: 'env-scopus-key' };

    const fromEnv = parseCliArgs(['-s', 'seed.pdf'], env);
    const fromFlag = parseCliArgs(['-s', 'seed.pdf', '-sk', 'test-scopus-key'], env);

    expect(fromEnv.kind === 'ok' && [fromEnv.options.claudeKey, fromEnv.options.scopusKey]).toEqual([
      'env-claude-key',
      'env-scopus-key',
    ]);
    expect(fromFlag.kind === 'ok' && fromFlag.options.scopusKey).toBe('test-scopus-key');
  });

  it('returns help when asked', () => {
    expect(parseCliArgs(['-s', 'seed.pdf', '-h'], {})).toEqual({ kind: 'help' });
    expect(parseCliArgs(['--help'], {})).toEqual({ kind: 'help' });
  });

  const invalid: Array<[string[], string]> = [
    [[...KEYS], 'Seed paper is required (--seed-paper)'],
    [['-s', 'seed.pdf', '-sk', 'test-scopus-key'], 'Claude API key is required (--claude-key or ANTHROPIC_API_KEY)'],
    [['-s', 'seed.pdf', '-ck', 'test-claude-key'], 'Scopus API key is required (--scopus-key or SCOPUS_API_KEY)'],
    [['-s', 'seed.pdf', '--verbose', 'yes'], 'Unknown option: --verbose'],
    [['-s'], 'Missing value for -s'],
    [['-s', 'seed.pdf', ...KEYS, '-mp', 'many'], '--max-papers must be a number'],
    [['-s', 'seed.pdf', ...KEYS, '-mp', '0'], '--max-papers must be at least 1'],
    [['-s', 'seed.pdf', ...KEYS, '-md', '1.5'], '--max-depth must be a whole number'],
    [['-s', 'seed.pdf', ...KEYS, '--delay-ms', '-1'], '--delay-ms must not be negative'],
  ];

  it.each(invalid)('rejects %j', (args, message) => {
    expect(parseCliArgs(args, {})).toEqual({ kind: 'error', message });
  });
});

describe('defaultOutputPath', () => {
  it('strips the directory and .pdf extension', () => {
    expect(defaultOutputPath('/data/papers/seed-2021.pdf', 'out')).toBe('out/seed-2021_species_data.csv');
  });

  it('falls back to a fixed name when nothing survives sanitizing', () => {
    expect(defaultOutputPath('???.pdf', 'out')).toBe('out/seed_species_data.csv');
  });
});
