import { describe, expect, it } from 'vitest';
import { record } from '../testing/fakes.js';
import { PublisherRegistry } from '../engine/registry.js';
import { comparePublishers } from './publishers.js';

const registry = PublisherRegistry.create([
  { name: 'SPIE', aliases: [], prefixes: ['10.1117'] },
  { name: 'Optica Publishing Group', aliases: ['Optica'], prefixes: ['10.1364'] }
]);

const records = [
  record('10.1117/1', { publisher: 'SPIE', publishedDate: '2020-01-01' }),
  record('10.1364/2', { publisher: 'Optica Publishing Group', publishedDate: '2020-03-01' }),
  record('10.1016/3', { publisher: 'Elsevier BV', publishedDate: '2020-05-01' }),
  record('10.1016/4', { publisher: 'Elsevier BV', publishedDate: '2020-07-01' }),
  record('10.1117/5', { publisher: 'SPIE', publishedDate: '2021-01-01' }),
  record('10.1117/6', { publisher: 'SPIE', publishedDate: '2021-02-01' })
];

describe('comparePublishers', () => {
  it('measures each publisher against every matched record of the year', () => {
    const comparison = comparePublishers(records, ['SPIE', 'optica'], registry);

    expect(comparison.totalsPerYear).toEqual({ 2020: 4, 2021: 2 });
    expect(comparison.publishers).toEqual([
      { name: 'SPIE', total: 3, perYear: { 2020: 1, 2021: 2 }, marketShare: { 2020: 0.25, 2021: 1 }, growth: 1 },
      {
        name: 'Optica Publishing Group',
        total: 1,
        perYear: { 2020: 1 },
        marketShare: { 2020: 0.25, 2021: 0 },
        growth: null
      }
    ]);
  });

  it('keeps every share within [0, 1]', () => {
    const comparison = comparePublishers(records, ['SPIE', 'Optica', 'Elsevier'], registry);
    const shares = comparison.publishers.flatMap((p) => Object.values(p.marketShare));
    expect(shares.every((share) => share >= 0 && share <= 1)).toBe(true);
  });

  it('matches unknown publishers by name', () => {
    const [elsevier] = comparePublishers(records, ['Elsevier'], registry).publishers;
    expect(elsevier.total).toBe(2);
    expect(elsevier.marketShare).toEqual({ 2020: 0.5, 2021: 0 });
  });
});
