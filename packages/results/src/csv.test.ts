import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { FactRecord } from '@citewalk/core';
import { SPECIES_COLUMNS, createCsvResultSink, formatCsv, quoteField } from './csv.js';

const beetle: FactRecord = {
  sourceId: '10.1/seed',
  distance: 0,
  title: 'Forest Canopy Arthropod Diversity',
  payload: { species: 'Carabus violaceus', abundance_or_biomass: 'abundance', number: '12', location: 'Kielder' },
};

describe('quoteField', () => {
  it('wraps in quotes and doubles embedded quotes', () => {
    expect(quoteField('plain')).toBe('"plain"');
    expect(quoteField('the "violet" ground beetle')).toBe('"the ""violet"" ground beetle"');
    expect(quoteField('')).toBe('""');
  });
});

describe('formatCsv', () => {
  it('writes a header and one quoted row per record', () => {
    expect(formatCsv([beetle], SPECIES_COLUMNS)).toBe(
      '"doi","species","abundance_or_biomass","number","location","distance_from_seed","title"\n' +
        '"10.1/seed","Carabus violaceus","abundance","12","Kielder","0","Forest Canopy Arthropod Diversity"\n'
    );
  });

  it('fills missing payload fields with UNSPECIFIED', () => {
    const partial: FactRecord = { sourceId: '10.1/a', distance: 1, title: 'Beetles, again', payload: { species: 'Nebria brevicollis' } };

    expect(formatCsv([partial], SPECIES_COLUMNS).split('\n')[1]).toBe(
      '"10.1/a","Nebria brevicollis","UNSPECIFIED","UNSPECIFIED","UNSPECIFIED","1","Beetles, again"'
    );
  });

  it('keeps record order and duplicates', () => {
    const second: FactRecord = { ...beetle, distance: 1, sourceId: '10.1/b' };
    const lines = formatCsv([second, beetle, second], ['doi']).trimEnd().split('\n');

    expect(lines).toEqual(['"doi"', '"10.1/b"', '"10.1/seed"', '"10.1/b"']);
  });

  it('uses record provenance over payload keys of the same name', () => {
    const record: FactRecord = { ...beetle, payload: { doi: 'payload-doi', title: 'payload title' } };

    expect(formatCsv([record], ['doi', 'title']).split('\n')[1]).toBe(
      '"10.1/seed","Forest Canopy Arthropod Diversity"'
    );
  });
});

describe('createCsvResultSink', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  it('creates the output directory and writes UTF-8', async () => {
    dir = mkdtempSync(join(tmpdir(), 'citewalk-results-'));
    const path = join(dir, 'nested', 'out.csv');
    const record: FactRecord = { ...beetle, payload: { ...beetle.payload, location: 'Białowieża' } };

    await createCsvResultSink(path).write([record], ['doi', 'location']);

    expect(readFileSync(path, 'utf8')).toBe('"doi","location"\n"10.1/seed","Białowieża"\n');
  });
});
