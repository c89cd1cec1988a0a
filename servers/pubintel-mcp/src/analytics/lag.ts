import type { RawRecord } from '@pubintel/core';
import { publicationYear, sortedYears } from './trend.js';

const DAY_MS = 86_400_000;

/** Lags outside this window are treated as metadata errors. */
const MAX_LAG_DAYS = 5000;

export function daysBetween(start: string, end: string): number | null {
  const from = Date.parse(`${start}T00:00:00Z`);
  const to = Date.parse(`${end}T00:00:00Z`);
  if (Number.isNaN(from) || Number.isNaN(to)) return null;
  return Math.round((to - from) / DAY_MS);
}

function mean(values: number[]): number | null {
  return values.length ? values.reduce((sum, value) => sum + value, 0) / values.length : null;
}

export interface TimeToPublication {
  metrics: {
    createdToPublishedDays: number | null;
    acceptedToPublishedDays: number | null;
  };
  coverage: {
    createdToPublishedRate: number;
    acceptedToPublishedRate: number;
  };
  trend: {
    createdToPublished: Record<number, number | null>;
    acceptedToPublished: Record<number, number | null>;
  };
}

class LagSeries {
  readonly values: number[] = [];
  private readonly byYear = new Map<number, number[]>();

  add(lag: number, year: number): void {
    this.values.push(lag);
    const bucket = this.byYear.get(year) ?? [];
    bucket.push(lag);
    this.byYear.set(year, bucket);
  }

  trend(): Record<number, number | null> {
    const means = new Map<number, number | null>();
    for (const [year, values] of this.byYear) {
      means.set(year, mean(values));
    }
    return sortedYears(means);
  }
}

/**
 * Mean publication lag in days for created→published and
 * accepted→published. A record missing either date of a pair is left out of
 * that pair only.
 */
export function timeToPublication(records: RawRecord[]): TimeToPublication {
  const created = new LagSeries();
  const accepted = new LagSeries();

  for (const record of records) {
    const year = publicationYear(record);
    if (!record.publishedDate || year === null) continue;

    for (const [start, series] of [[record.createdDate, created], [record.acceptedDate, accepted]] as const) {
      if (!start) continue;
      const lag = daysBetween(start, record.publishedDate);
      if (lag !== null && lag >= 0 && lag <= MAX_LAG_DAYS) {
        series.add(lag, year);
      }
    }
  }

  const total = records.length;
  return {
    metrics: {
      createdToPublishedDays: mean(created.values),
      acceptedToPublishedDays: mean(accepted.values)
    },
    coverage: {
      createdToPublishedRate: total ? created.values.length / total : 0,
      acceptedToPublishedRate: total ? accepted.values.length / total : 0
    },
    trend: {
      createdToPublished: created.trend(),
      acceptedToPublished: accepted.trend()
    }
  };
}
