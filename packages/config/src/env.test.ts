import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { findRepoRoot, maskValue, optionalEnv, validateRequiredEnv } from './env.js';

describe('findRepoRoot', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'citewalk-env-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('returns the nearest directory whose package.json declares workspaces', () => {
    writeFileSync(join(root, 'package.json'), JSON.stringify({ name: 'x', workspaces: ['packages/*'] }));
    const nested = join(root, 'packages', 'core', 'src');
    mkdirSync(nested, { recursive: true });
    writeFileSync(join(root, 'packages', 'core', 'package.json'), JSON.stringify({ name: '@x/core' }));

    expect(findRepoRoot(nested)).toBe(root);
  });

  it('skips package.json files that cannot be parsed', () => {
    mkdirSync(join(root, '.git'));
    const nested = join(root, 'app');
    mkdirSync(nested);
    writeFileSync(join(nested, 'package.json'), '{ not json');

    expect(findRepoRoot(nested)).toBe(root);
  });
});

describe('maskValue', () => {
  it('fully masks short values', () => {
    expect(maskValue('abc')).toBe('***');
  });

  it('keeps the first and last four characters of long values', () => {
    expect(maskValue('test-secret-value')).toBe('test...alue');
  });
});

describe('required env helpers', () => {
  const keys = ['CITEWALK_TEST_A', 'CITEWALK_TEST_B'];

  afterEach(() => {
    for (const key of keys) {
      delete process.env[key];
    }
  });

  it('reports blank variables as missing', () => {
    process.env.CITEWALK_TEST_A = 'value';
    process.env.CITEWALK_TEST_B = '   ';

    expect(validateRequiredEnv(keys)).toEqual({ valid: false, missing: ['CITEWALK_TEST_B'] });
  });

  it('optionalEnv returns undefined for blank values', () => {
    process.env.CITEWALK_TEST_A = ' ';

    expect(optionalEnv('CITEWALK_TEST_A')).toBeUndefined();
    expect(optionalEnv('CITEWALK_TEST_B')).toBeUndefined();
  });
});
