import type { RawRecord } from '@pubintel/core';

export type YearCounts = Record<number, number>;

export interface YearlyGrowthPoint {
  year: number;
  count: number;
  /** Change against the previous listed year; null for the first year */
  yoy: number | null;
}

export function publicationYear(record: RawRecord): number | null {
  if (!record.publishedDate) return null;
  const year = Number(record.publishedDate.slice(0, 4));
  return Number.isInteger(year) ? year : null;
}

/** Builds a year → value record with keys inserted in ascending order. */
export function sortedYears<T>(byYear: Map<number, T>): Record<number, T> {
  return Object.fromEntries([...byYear.entries()].sort((a, b) => a[0] - b[0]));
}

export function yearKeys(counts: YearCounts): number[] {
  return Object.keys(counts).map(Number).sort((a, b) => a - b);
}

/** Records without a publication date are left out of this view. */
export function perYearCounts(records: RawRecord[]): YearCounts {
  const byYear = new Map<number, number>();
  for (const record of records) {
    const year = publicationYear(record);
    if (year === null) continue;
    byYear.set(year, (byYear.get(year) ?? 0) + 1);
  }
  return sortedYears(byYear);
}

export function yearlyGrowth(counts: YearCounts): YearlyGrowthPoint[] {
  const years = yearKeys(counts);
  return years.map((year, i) => {
    const count = counts[year];
    const prev = i > 0 ? counts[years[i - 1]] : 0;
    return { year, count, yoy: prev > 0 ? (count - prev) / prev : null };
  });
}

/** `(last / first)^(1 / periods) - 1`, or null when undefined. */
export function growthRate(first: number, last: number, periods: number): number | null {
  if (first <= 0 || last <= 0 || periods <= 0) return null;
  return (last / first) ** (1 / periods) - 1;
}

/**
 * Compound annual growth between the first and last years with a non-zero
 * count. Null when fewer than two such years exist.
 */
export function cagr(counts: YearCounts): number | null {
  const years = yearKeys(counts).filter((year) => counts[year] > 0);
  if (years.length < 2) return null;
  const y0 = years[0];
  const y1 = years[years.length - 1];
  return growthRate(counts[y0], counts[y1], y1 - y0);
}

export interface RankedCount {
  name: string;
  count: number;
}

/** Count descending, then name ascending; the first `topN`. */
export function rankCounts(counts: Map<string, number>, topN: number): RankedCount[] {
  return [...counts.entries()]
    .map(([name, count]) => ({ name, count }))
    .sort((a, b) => b.count - a.count || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .slice(0, Math.max(0, topN));
}

export function publisherName(record: RawRecord): string {
  return record.publisher?.trim() || 'Unknown';
}

export interface PublisherTrend {
  name: string;
  count: number;
  cagr: number | null;
  perYear: YearCounts;
}

export interface TopicOverview {
  /** Records with a publication date; only these enter the per-year view */
  datedRecordCount: number;
  perYear: YearCounts;
  yearlyGrowth: YearlyGrowthPoint[];
  cagr: number | null;
  topPublishers: PublisherTrend[];
}

export function topicOverview(records: RawRecord[], topN: number): TopicOverview {
  const perYear = perYearCounts(records);
  const byPublisher = new Map<string, number>();
  const publisherYears = new Map<string, Map<number, number>>();

  for (const record of records) {
    const year = publicationYear(record);
    if (year === null) continue;
    const name = publisherName(record);
    byPublisher.set(name, (byPublisher.get(name) ?? 0) + 1);
    const years = publisherYears.get(name) ?? new Map<number, number>();
    years.set(year, (years.get(year) ?? 0) + 1);
    publisherYears.set(name, years);
  }

  const topPublishers = rankCounts(byPublisher, topN).map(({ name, count }) => {
    const years = sortedYears(publisherYears.get(name) ?? new Map<number, number>());
    return { name, count, cagr: cagr(years), perYear: years };
  });

  return {
    datedRecordCount: Object.values(perYear).reduce((sum, count) => sum + count, 0),
    perYear,
    yearlyGrowth: yearlyGrowth(perYear),
    cagr: cagr(perYear),
    topPublishers
  };
}
