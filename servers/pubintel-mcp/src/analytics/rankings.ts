import type { RawRecord } from '@pubintel/core';
import { publicationYear, publisherName, rankCounts, sortedYears, type YearCounts } from './trend.js';

export interface JournalRanking {
  journal: string;
  publisher: string;
  count: number;
  perYear: YearCounts;
}

/** Records without a container title are not ranked. */
export function rankJournals(records: RawRecord[], topN: number): JournalRanking[] {
  const counts = new Map<string, number>();
  const publishers = new Map<string, string>();
  const years = new Map<string, Map<number, number>>();

  for (const record of records) {
    const journal = record.containerTitle?.trim();
    if (!journal) continue;
    counts.set(journal, (counts.get(journal) ?? 0) + 1);
    if (!publishers.has(journal)) publishers.set(journal, publisherName(record));
    const year = publicationYear(record);
    if (year !== null) {
      const byYear = years.get(journal) ?? new Map<number, number>();
      byYear.set(year, (byYear.get(year) ?? 0) + 1);
      years.set(journal, byYear);
    }
  }

  return rankCounts(counts, topN).map(({ name, count }) => ({
    journal: name,
    publisher: publishers.get(name) ?? 'Unknown',
    count,
    perYear: sortedYears(years.get(name) ?? new Map<number, number>())
  }));
}

export function firstAffiliation(record: RawRecord): string | undefined {
  return record.authors.find((author) => Boolean(author.affiliation?.trim()))?.affiliation?.trim();
}

/** Case, punctuation and spacing differences collapse to one institution. */
export function normalizeInstitution(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9 ]+/g, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Trailing comma-separated part of an affiliation, when it is short enough
 * to be a country ("Dept. of Physics, MIT, USA" → "USA").
 */
export function extractCountry(affiliation: string): string | null {
  const parts = affiliation.split(',').map((part) => part.trim()).filter(Boolean);
  if (parts.length < 2) return null;
  const last = parts[parts.length - 1];
  return last.split(/\s+/).length <= 3 ? last : null;
}

export interface InstitutionRanking {
  institution: string;
  count: number;
}

export interface CountryRollup {
  country: string;
  count: number;
}

export interface InstitutionsBreakdown {
  topInstitutions: InstitutionRanking[];
  countryRollups: CountryRollup[];
}

/**
 * Ranks institutions by each record's first-listed affiliation. Country
 * roll-ups count each record once per distinct country among all its
 * affiliations.
 */
export function rankInstitutions(records: RawRecord[], topN: number): InstitutionsBreakdown {
  const counts = new Map<string, number>();
  const displayNames = new Map<string, string>();
  const countries = new Map<string, number>();

  for (const record of records) {
    const affiliation = firstAffiliation(record);
    if (affiliation) {
      const key = normalizeInstitution(affiliation);
      if (key) {
        if (!displayNames.has(key)) displayNames.set(key, affiliation);
        const name = displayNames.get(key) ?? affiliation;
        counts.set(name, (counts.get(name) ?? 0) + 1);
      }
    }

    const recordCountries = new Set<string>();
    for (const author of record.authors) {
      const country = author.affiliation ? extractCountry(author.affiliation) : null;
      if (country) recordCountries.add(country);
    }
    for (const country of recordCountries) {
      countries.set(country, (countries.get(country) ?? 0) + 1);
    }
  }

  return {
    topInstitutions: rankCounts(counts, topN).map(({ name, count }) => ({ institution: name, count })),
    countryRollups: rankCounts(countries, topN).map(({ name, count }) => ({ country: name, count }))
  };
}
