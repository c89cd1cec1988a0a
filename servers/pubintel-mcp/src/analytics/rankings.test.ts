import { describe, expect, it } from 'vitest';
import { record } from '../testing/fakes.js';
import { extractCountry, normalizeInstitution, rankInstitutions, rankJournals } from './rankings.js';

describe('rankJournals', () => {
  it('ranks container titles by volume with name as the tie-break', () => {
    const ranked = rankJournals(
      [
        record('10.1/a', { containerTitle: 'Proc. SPIE', publisher: 'SPIE', publishedDate: '2021-01-01' }),
        record('10.1/b', { containerTitle: 'Optics Express', publisher: 'Optica Publishing Group', publishedDate: '2020-01-01' }),
        record('10.1/c', { containerTitle: 'Proc. SPIE', publisher: 'SPIE', publishedDate: '2021-06-01' }),
        record('10.1/d', { containerTitle: 'Optics Express', publisher: 'Optica Publishing Group', publishedDate: '2021-01-01' }),
        record('10.1/e', { containerTitle: 'Applied Optics', publisher: 'Optica Publishing Group' }),
        record('10.1/f', { publisher: 'IEEE' })
      ],
      2
    );

    expect(ranked).toEqual([
      { journal: 'Optics Express', publisher: 'Optica Publishing Group', count: 2, perYear: { 2020: 1, 2021: 1 } },
      { journal: 'Proc. SPIE', publisher: 'SPIE', count: 2, perYear: { 2021: 2 } }
    ]);
  });
});

describe('institution helpers', () => {
  it('normalizes case, punctuation and spacing', () => {
    expect(normalizeInstitution('MIT, Cambridge,  USA')).toBe('mit cambridge usa');
  });

  it('takes a short trailing segment as the country', () => {
    expect(extractCountry('Dept. of Physics, MIT, USA')).toBe('USA');
    expect(extractCountry('Stanford University')).toBeNull();
    expect(extractCountry('Lab, Institute of Optics and Fine Mechanics')).toBeNull();
  });
});

describe('rankInstitutions', () => {
  it('ranks first affiliations and rolls countries up once per record', () => {
    const breakdown = rankInstitutions(
      [
        record('10.1/a', { authors: [{ affiliation: 'MIT, USA' }, { affiliation: 'ETH Zurich, Switzerland' }] }),
        record('10.1/b', { authors: [{ name: 'No affiliation' }, { affiliation: 'mit,  USA' }] }),
        record('10.1/c', { authors: [{ affiliation: 'ETH Zurich, Switzerland' }, { affiliation: 'EPFL, Switzerland' }] }),
        record('10.1/d')
      ],
      10
    );

    expect(breakdown.topInstitutions).toEqual([
      { institution: 'MIT, USA', count: 2 },
      { institution: 'ETH Zurich, Switzerland', count: 1 }
    ]);
    expect(breakdown.countryRollups).toEqual([
      { country: 'Switzerland', count: 2 },
      { country: 'USA', count: 2 }
    ]);
  });
});
