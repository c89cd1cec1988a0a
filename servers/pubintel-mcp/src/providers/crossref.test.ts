import { describe, expect, it } from 'vitest';
import { FetchError, type QuerySpec } from '@pubintel/core';
import {
  buildFilterString,
  buildWorksUrl,
  dateFromParts,
  normalizeCrossrefItem,
  parseWorksPage,
  stripMarkup
} from './crossref.js';

const spec: QuerySpec = {
  queryText: '"silicon photonics"',
  fromDate: '2020-01-01',
  untilDate: '2024-12-31',
  docTypes: ['journal-article', 'proceedings-article'],
  publisherFilter: ['SPIE'],
  prefixes: ['10.1117'],
  maxRecords: 100,
  rows: 100,
  cursor: null
};

describe('buildFilterString', () => {
  it('contains dates, every type and prefix, and no publisher name', () => {
    const value = buildFilterString(spec);
    expect(value).toBe(
      'from-pub-date:2020-01-01,until-pub-date:2024-12-31,type:journal-article,type:proceedings-article,prefix:10.1117'
    );
    expect(value).not.toContain('publisher-name');
  });
});

describe('buildWorksUrl', () => {
  it('starts deep paging with the * cursor', () => {
    const url = new URL(buildWorksUrl(spec, 'ops@example.com'));
    expect(url.pathname).toBe('/works');
    expect(url.searchParams.get('cursor')).toBe('*');
    expect(url.searchParams.get('rows')).toBe('100');
    expect(url.searchParams.get('query')).toBe('"silicon photonics"');
    expect(url.searchParams.get('mailto')).toBe('ops@example.com');
  });

  it('passes a continuation cursor through', () => {
    const url = new URL(buildWorksUrl({ ...spec, cursor: 'AoJ+abc' }));
    expect(url.searchParams.get('cursor')).toBe('AoJ+abc');
    expect(url.searchParams.has('mailto')).toBe(false);
  });
});

describe('dateFromParts', () => {
  it('pads partial dates with the first month and day', () => {
    expect(dateFromParts({ 'date-parts': [[2021]] })).toBe('2021-01-01');
    expect(dateFromParts({ 'date-parts': [[2021, 7]] })).toBe('2021-07-01');
    expect(dateFromParts({ 'date-parts': [[2021, 7, 9]] })).toBe('2021-07-09');
  });

  it('rejects missing and impossible dates', () => {
    expect(dateFromParts(undefined)).toBeUndefined();
    expect(dateFromParts({ 'date-parts': [[null]] })).toBeUndefined();
    expect(dateFromParts({ 'date-parts': [[2021, 2, 30]] })).toBeUndefined();
  });
});

describe('stripMarkup', () => {
  it('removes JATS tags and decodes entities', () => {
    expect(stripMarkup('<jats:p>Low-loss &amp; compact <jats:italic>waveguides</jats:italic></jats:p>')).toBe(
      'Low-loss & compact waveguides'
    );
  });
});

describe('normalizeCrossrefItem', () => {
  it('maps a Crossref work to a raw record', () => {
    const record = normalizeCrossrefItem({
      DOI: '10.1117/12.2000001',
      title: ['Silicon photonics platform'],
      publisher: 'SPIE',
      type: 'proceedings-article',
      abstract: '<jats:p>Ring resonators.</jats:p>',
      'container-title': ['Proc. SPIE'],
      author: [
        { given: 'Ada', family: 'Lovelace', affiliation: [] },
        { given: 'Alan', family: 'Turing', affiliation: [{ name: 'Univ. of Manchester, UK' }] }
      ],
      issued: { 'date-parts': [[2022, 3, 4]] },
      created: { 'date-parts': [[2022, 1, 10]] },
      accepted: { 'date-parts': [[2022, 2, 1]] }
    });

    expect(record).toEqual({
      doi: '10.1117/12.2000001',
      title: 'Silicon photonics platform',
      publisher: 'SPIE',
      type: 'proceedings-article',
      publishedDate: '2022-03-04',
      createdDate: '2022-01-10',
      acceptedDate: '2022-02-01',
      abstract: 'Ring resonators.',
      authors: [
        { name: 'Ada Lovelace', affiliation: undefined },
        { name: 'Alan Turing', affiliation: 'Univ. of Manchester, UK' }
      ],
      containerTitle: 'Proc. SPIE'
    });
  });

  it('falls back to online, then created, for the publication date', () => {
    const online = normalizeCrossrefItem({ DOI: '10.1/a', 'published-online': { 'date-parts': [[2020, 5]] } });
    expect(online?.publishedDate).toBe('2020-05-01');
    const created = normalizeCrossrefItem({ DOI: '10.1/b', created: { 'date-parts': [[2019, 12, 31]] } });
    expect(created?.publishedDate).toBe('2019-12-31');
  });

  it('drops items without a DOI and lower-cases the rest', () => {
    expect(normalizeCrossrefItem({ title: ['No DOI'] })).toBeNull();
    expect(normalizeCrossrefItem({ DOI: '10.1364/OE.1' })?.doi).toBe('10.1364/oe.1');
  });
});

describe('parseWorksPage', () => {
  it('reads items and the next cursor', () => {
    const page = parseWorksPage(
      { status: 'ok', message: { items: [{ DOI: '10.1/x', title: ['X'] }], 'next-cursor': 'abc' } },
      'https://api.crossref.org/works'
    );
    expect(page.nextCursor).toBe('abc');
    expect(page.records.map((r) => r.doi)).toEqual(['10.1/x']);
  });

  it('treats a missing cursor as the end of results', () => {
    const page = parseWorksPage({ status: 'ok', message: { items: [] } }, 'u');
    expect(page).toEqual({ records: [], nextCursor: null });
  });

  it('raises a non-retryable FetchError for a malformed payload', () => {
    let caught: unknown;
    try {
      parseWorksPage({ message: 'nope' }, 'u');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(FetchError);
    expect(caught).toMatchObject({ retryable: false });
  });

  it('drops a nonconforming item and keeps the rest of the page', () => {
    const page = parseWorksPage(
      {
        status: 'ok',
        message: {
          items: [
            { DOI: '10.1/good', title: ['Good'] },
            { DOI: '10.1/bad', issued: { 'date-parts': [['2021']] } },
            { DOI: '10.1/also-good', title: ['Also good'] }
          ],
          'next-cursor': 'next'
        }
      },
      'u'
    );
    expect(page.records.map((r) => r.doi)).toEqual(['10.1/good', '10.1/also-good']);
    expect(page.nextCursor).toBe('next');
  });
});
