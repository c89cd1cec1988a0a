import type { CoverageMetrics, RawRecord } from '@pubintel/core';

export function hasAffiliation(record: RawRecord): boolean {
  return record.authors.some((author) => Boolean(author.affiliation));
}

function rate(records: RawRecord[], present: (record: RawRecord) => boolean): number {
  if (records.length === 0) return 0;
  return records.filter(present).length / records.length;
}

export function coverageMetrics(records: RawRecord[]): CoverageMetrics {
  return {
    abstractRate: rate(records, (r) => Boolean(r.abstract)),
    affiliationRate: rate(records, hasAffiliation),
    acceptedDateRate: rate(records, (r) => Boolean(r.acceptedDate))
  };
}

export type CoverageField = keyof CoverageMetrics;

const LOW_COVERAGE_MESSAGES: Record<CoverageField, string> = {
  abstractRate: 'Low abstract coverage; topic relevance may be undercounted.',
  affiliationRate: 'Low affiliation coverage; institution rankings may be incomplete.',
  acceptedDateRate: 'Low accepted-date coverage; accepted-to-published lag may be unstable.'
};

/**
 * One warning per listed field whose rate is below `threshold`. An empty
 * record set yields no coverage warnings; it is reported on its own.
 */
export function coverageWarnings(
  coverage: CoverageMetrics,
  recordCount: number,
  threshold: number,
  fields: CoverageField[] = ['abstractRate', 'affiliationRate', 'acceptedDateRate']
): string[] {
  if (recordCount === 0) return [];
  return fields
    .filter((field) => coverage[field] < threshold)
    .map((field) => LOW_COVERAGE_MESSAGES[field]);
}
