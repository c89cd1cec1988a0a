import { describe, expect, it } from 'vitest';
import { record } from '../testing/fakes.js';
import { daysBetween, timeToPublication } from './lag.js';

describe('daysBetween', () => {
  it('counts calendar days', () => {
    expect(daysBetween('2021-01-01', '2021-03-02')).toBe(60);
    expect(daysBetween('2021-01-01', 'soon')).toBeNull();
  });
});

describe('timeToPublication', () => {
  it('averages each lag over the records that carry both dates', () => {
    const result = timeToPublication([
      record('10.1/a', { publishedDate: '2021-03-02', createdDate: '2021-01-01', acceptedDate: '2021-02-01' }),
      record('10.1/b', { publishedDate: '2021-06-01', createdDate: '2021-05-02' }),
      record('10.1/c', { publishedDate: '2022-01-11', createdDate: '2022-01-01', acceptedDate: '2022-01-12' }),
      record('10.1/d', { createdDate: '2022-01-01' })
    ]);

    expect(result.metrics.createdToPublishedDays).toBeCloseTo(100 / 3, 10);
    expect(result.metrics.acceptedToPublishedDays).toBe(29);
    expect(result.coverage).toEqual({ createdToPublishedRate: 0.75, acceptedToPublishedRate: 0.25 });
    expect(result.trend).toEqual({
      createdToPublished: { 2021: 45, 2022: 10 },
      acceptedToPublished: { 2021: 29 }
    });
  });

  it('reports nothing for an empty set', () => {
    const result = timeToPublication([]);
    expect(result.metrics).toEqual({ createdToPublishedDays: null, acceptedToPublishedDays: null });
    expect(result.coverage).toEqual({ createdToPublishedRate: 0, acceptedToPublishedRate: 0 });
  });
});
