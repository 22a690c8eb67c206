import { describe, it, expect } from 'vitest';
import { toAbstract, toReferencePapers, toScopusId, toSearchPapers } from './mapping.js';

describe('toScopusId', () => {
  it('strips the SCOPUS_ID prefix', () => {
    const data = { 'search-results': { entry: [{ 'dc:identifier': 'SCOPUS_ID:85012345678' }] } };
    expect(toScopusId(data)).toBe('85012345678');
  });

  it('returns undefined for an empty result set', () => {
    const data = { 'search-results': { entry: [{ '@_fa': 'true', error: 'Result set was empty' }] } };
    expect(toScopusId(data)).toBeUndefined();
    expect(toScopusId({})).toBeUndefined();
  });
});

describe('toSearchPapers', () => {
  it('keeps entries with both DOI and title, accepting a single entry object', () => {
    expect(
      toSearchPapers({ 'search-results': { entry: { 'prism:doi': '10.1/x', 'dc:title': 'Moth Light Traps' } } })
    ).toEqual([{ doi: '10.1/x', title: 'Moth Light Traps' }]);

    expect(
      toSearchPapers({
        'search-results': {
          entry: [
            { 'prism:doi': '10.1/a', 'dc:title': 'Ant Colonies' },
            { 'dc:title': 'No DOI here' },
            { 'prism:doi': '10.1/c' },
          ],
        },
      })
    ).toEqual([{ doi: '10.1/a', title: 'Ant Colonies' }]);
  });
});

describe('toReferencePapers', () => {
  const response = (references: unknown) => ({
    'abstract-retrieval-response': { references: { reference: references } },
  });

  it('reads DOI and title from the nested ref-info shapes', () => {
    const data = response([
      {
        'ref-info': {
          'ref-publicationtitle': { 'prism:doi': '10.1/one' },
          'ref-title': { 'ref-titletext': 'Beetle assemblages in old-growth forest' },
        },
      },
      {
        'ref-info': {
          'refd-itemidlist': { itemid: [{ '@idtype': 'SGR', $: '123' }, { '@idtype': 'DOI', $: '10.1/two' }] },
          'ref-title': 'Spiders of temperate grasslands',
        },
      },
      {
        'prism:doi': '10.1/three',
        'ref-info': { 'ref-titletext': 'Pollinator decline across Europe' },
      },
    ]);

    expect(toReferencePapers(data, 10)).toEqual([
      { doi: '10.1/one', title: 'Beetle assemblages in old-growth forest' },
      { doi: '10.1/two', title: 'Spiders of temperate grasslands' },
      { doi: '10.1/three', title: 'Pollinator decline across Europe' },
    ]);
  });

  it('drops references without DOI or with short titles, and caps the list', () => {
    const many = Array.from({ length: 12 }, (_, i) => ({
      'prism:doi': `10.1/r${i}`,
      'ref-info': { 'ref-title': { 'ref-titletext': `A sufficiently long title ${i}` } },
    }));
    const data = response([
      { 'ref-info': { 'ref-title': { 'ref-titletext': 'A title but no identifier' } } },
      { 'prism:doi': '10.1/short', 'ref-info': { 'ref-title': 'Too short' } },
      ...many,
    ]);

    const papers = toReferencePapers(data, 10);
    expect(papers).toHaveLength(10);
    expect(papers[0]).toEqual({ doi: '10.1/r0', title: 'A sufficiently long title 0' });
  });

  it('accepts a single reference object and a missing section', () => {
    expect(
      toReferencePapers(response({ 'prism:doi': '10.1/solo', 'ref-info': { 'ref-title': 'Solitary bee nesting' } }), 10)
    ).toEqual([{ doi: '10.1/solo', title: 'Solitary bee nesting' }]);
    expect(toReferencePapers({ 'abstract-retrieval-response': { references: null } }, 10)).toEqual([]);
  });
});

describe('toAbstract', () => {
  it('joins title and abstract', () => {
    const data = {
      'search-results': { entry: [{ 'dc:title': 'Bat Echolocation', 'dc:description': 'We recorded 14 species.' }] },
    };
    expect(toAbstract(data)).toEqual({
      title: 'Bat Echolocation',
      text: 'Title: Bat Echolocation\n\nAbstract: We recorded 14 species.',
    });
  });

  it('returns undefined when there is nothing to read', () => {
    expect(toAbstract({ 'search-results': { entry: [{ error: 'Result set was empty' }] } })).toBeUndefined();
  });
});
