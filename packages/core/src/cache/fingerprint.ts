import { createHash } from 'crypto';
import type { QuerySpec } from '../types.js';

function canonicalSet(values: string[]): string[] {
  return [...new Set(values.map((value) => value.trim().toLowerCase()).filter(Boolean))].sort();
}

export function canonicalQueryText(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Canonical form of everything that changes the content of one upstream page.
 * `maxRecords` is left out: it bounds pagination, not a page.
 */
export function canonicalizeQuery(spec: QuerySpec): string {
  return JSON.stringify({
    q: canonicalQueryText(spec.queryText),
    from: spec.fromDate,
    until: spec.untilDate,
    types: canonicalSet(spec.docTypes),
    publishers: canonicalSet(spec.publisherFilter),
    prefixes: canonicalSet(spec.prefixes),
    rows: spec.rows,
    cursor: spec.cursor
  });
}

export function fingerprint(spec: QuerySpec): string {
  return createHash('sha256').update(canonicalizeQuery(spec)).digest('hex');
}
