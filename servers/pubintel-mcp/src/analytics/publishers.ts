import type { RawRecord } from '@pubintel/core';
import { publisherMatches, type PublisherRegistry } from '../engine/registry.js';
import { cagr, perYearCounts, publicationYear, sortedYears, yearKeys, type YearCounts } from './trend.js';

export interface PublisherShare {
  name: string;
  total: number;
  perYear: YearCounts;
  /** Per year: this publisher's records over all matched records of that year */
  marketShare: Record<number, number>;
  growth: number | null;
}

export interface PublisherComparison {
  totalsPerYear: YearCounts;
  publishers: PublisherShare[];
}

/**
 * Market share of each requested publisher within the whole matched record
 * set, not within the requested subset; shares need not sum to one.
 */
export function comparePublishers(
  records: RawRecord[],
  selected: string[],
  registry: PublisherRegistry
): PublisherComparison {
  const totalsPerYear = perYearCounts(records);
  const years = yearKeys(totalsPerYear);
  const names = registry.resolve(selected).names;

  const publishers = names.map((name): PublisherShare => {
    const terms = registry.termsFor(name);
    const byYear = new Map<number, number>();
    for (const record of records) {
      const year = publicationYear(record);
      if (year === null || !publisherMatches(record.publisher, terms)) continue;
      byYear.set(year, (byYear.get(year) ?? 0) + 1);
    }

    const perYear = sortedYears(byYear);
    const share = new Map<number, number>();
    for (const year of years) {
      share.set(year, (byYear.get(year) ?? 0) / totalsPerYear[year]);
    }

    return {
      name,
      total: [...byYear.values()].reduce((sum, count) => sum + count, 0),
      perYear,
      marketShare: sortedYears(share),
      growth: cagr(perYear)
    };
  });

  return { totalsPerYear, publishers };
}
