import { describe, expect, it } from 'vitest';
import { InputError, type TopicDefinition } from '@pubintel/core';
import { buildQuery, normalizeDate, pageSize, topicQueryText } from './query.js';
import { PublisherRegistry } from './registry.js';

const topic: TopicDefinition = {
  key: 'silicon_photonics',
  name: 'Silicon Photonics',
  keywords: ['silicon photonics'],
  synonyms: ['photonic integrated circuit', 'Silicon Photonics', 'SiPh'],
  negativeKeywords: ['silicon solar']
};

const publishers = PublisherRegistry.create([
  { name: 'SPIE', aliases: [], prefixes: ['10.1117'] },
  { name: 'Optica Publishing Group', aliases: ['Optica'], prefixes: ['10.1364'] }
]);

const defaults = { maxRecordsDefault: 2000, rowsPerRequest: 200 };

describe('topicQueryText', () => {
  it('ORs keywords then synonyms, quoting phrases and dropping duplicates', () => {
    expect(topicQueryText(topic)).toBe('"silicon photonics" OR "photonic integrated circuit" OR SiPh');
  });
});

describe('normalizeDate', () => {
  it('pads single-digit parts', () => {
    expect(normalizeDate('2021-3-7', 'fromPubDate')).toBe('2021-03-07');
  });

  it('rejects malformed and impossible dates', () => {
    expect(() => normalizeDate('March 2021', 'fromPubDate')).toThrow(InputError);
    expect(() => normalizeDate('2021-02-29', 'fromPubDate')).toThrow('not a valid calendar date');
  });
});

describe('pageSize', () => {
  it('never exceeds the record cap or the upstream row limit', () => {
    expect(pageSize(50, 200)).toBe(50);
    expect(pageSize(5000, 2000)).toBe(1000);
    expect(pageSize(5000, 200)).toBe(200);
  });
});

describe('buildQuery', () => {
  it('builds a topic query without negative keywords', () => {
    const built = buildQuery(
      { topic, fromDate: '2020-01-01', untilDate: '2024-12-31', docTypes: ['journal-article'] },
      defaults,
      publishers
    );

    expect(built.spec).toEqual({
      queryText: '"silicon photonics" OR "photonic integrated circuit" OR SiPh',
      fromDate: '2020-01-01',
      untilDate: '2024-12-31',
      docTypes: ['journal-article'],
      publisherFilter: [],
      prefixes: [],
      maxRecords: 2000,
      rows: 200,
      cursor: null
    });
    expect(built.spec.queryText).not.toContain('solar');
    expect(built.exclusions).toEqual(['silicon solar']);
    expect(Object.isFrozen(built.spec)).toBe(true);
  });

  it('resolves publisher aliases to names, prefixes and match terms', () => {
    const built = buildQuery(
      {
        adHocQuery: 'metalens',
        fromDate: '2020-01-01',
        untilDate: '2020-12-31',
        publishers: ['optica', 'SPIE', 'Acme Press'],
        doiPrefixes: ['10.9999']
      },
      defaults,
      publishers
    );

    expect(built.topic).toBeNull();
    expect(built.spec.queryText).toBe('metalens');
    expect(built.spec.publisherFilter).toEqual(['Optica Publishing Group', 'SPIE', 'Acme Press']);
    expect(built.spec.prefixes).toEqual(['10.1117', '10.1364', '10.9999']);
    expect(built.publisherTerms).toEqual(['optica publishing group', 'optica', 'spie', 'acme press']);
  });

  it('requires exactly one of topic and ad-hoc text', () => {
    const base = { fromDate: '2020-01-01', untilDate: '2020-12-31' };
    expect(() => buildQuery(base, defaults, publishers)).toThrow('A topic or an ad-hoc query is required');
    expect(() => buildQuery({ ...base, adHocQuery: '   ' }, defaults, publishers)).toThrow(InputError);
    expect(() => buildQuery({ ...base, topic, adHocQuery: 'lidar' }, defaults, publishers)).toThrow(
      'Provide either a topic or an ad-hoc query, not both'
    );
  });

  it('rejects inverted date ranges and non-positive caps', () => {
    expect(() =>
      buildQuery({ topic, fromDate: '2024-01-01', untilDate: '2020-01-01' }, defaults, publishers)
    ).toThrow('fromPubDate (2024-01-01) is after untilPubDate (2020-01-01)');
    expect(() =>
      buildQuery({ topic, fromDate: '2020-01-01', untilDate: '2024-01-01', maxRecords: 0 }, defaults, publishers)
    ).toThrow('maxRecords must be a positive integer, got 0');
    expect(() =>
      buildQuery({ topic, fromDate: '2020-01-01', untilDate: '2024-01-01', rowsPerRequest: -5 }, defaults, publishers)
    ).toThrow(InputError);
  });
});
