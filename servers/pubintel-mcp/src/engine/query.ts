import { InputError } from '@pubintel/core';
import type { QuerySpec, TopicDefinition } from '@pubintel/core';
import { CROSSREF_MAX_ROWS } from '../providers/crossref.js';
import type { PublisherRegistry } from './registry.js';

export interface QueryInput {
  topic?: Readonly<TopicDefinition> | null;
  adHocQuery?: string | null;
  fromDate: string;
  untilDate: string;
  docTypes?: string[];
  publishers?: string[];
  doiPrefixes?: string[];
  maxRecords?: number;
  rowsPerRequest?: number;
}

export interface QueryDefaults {
  maxRecordsDefault: number;
  rowsPerRequest: number;
}

export interface BuiltQuery {
  spec: Readonly<QuerySpec>;
  topic: Readonly<TopicDefinition> | null;
  /** Negative keywords, enforced locally by the matcher and never sent upstream */
  exclusions: string[];
  /** Lower-cased publisher names and aliases for the local post-filter */
  publisherTerms: string[];
}

const DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:$|T)/;

/** Validates a calendar date and renders it as `YYYY-MM-DD`. */
export function normalizeDate(value: string, field: string): string {
  const match = DATE_PATTERN.exec(value.trim());
  if (!match) {
    throw new InputError(`${field} must be a date in YYYY-MM-DD form, got '${value}'`);
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    throw new InputError(`${field} is not a valid calendar date: '${value}'`);
  }
  return date.toISOString().slice(0, 10);
}

function formatTerm(term: string): string {
  const cleaned = term.replace(/"/g, '').trim();
  return /\s/.test(cleaned) ? `"${cleaned}"` : cleaned;
}

/** Keywords then synonyms, deduplicated case-insensitively, joined with OR. */
export function topicQueryText(topic: Readonly<TopicDefinition>): string {
  const seen = new Set<string>();
  const terms: string[] = [];
  for (const term of [...topic.keywords, ...topic.synonyms]) {
    const key = term.trim().toLowerCase();
    if (!key || seen.has(key)) continue;
    seen.add(key);
    terms.push(formatTerm(term));
  }
  return terms.join(' OR ');
}

function uniqueTrimmed(values: string[]): string[] {
  return [...new Set(values.map((value) => value.trim()).filter(Boolean))];
}

export function pageSize(maxRecords: number, rowsPerRequest: number): number {
  return Math.max(1, Math.min(rowsPerRequest, CROSSREF_MAX_ROWS, maxRecords));
}

export function buildQuery(
  input: QueryInput,
  defaults: QueryDefaults,
  publishers: PublisherRegistry
): BuiltQuery {
  const topic = input.topic ?? null;
  const adHoc = input.adHocQuery?.trim() ?? '';

  if (topic && adHoc) {
    throw new InputError('Provide either a topic or an ad-hoc query, not both');
  }
  if (!topic && !adHoc) {
    throw new InputError('A topic or an ad-hoc query is required');
  }

  const fromDate = normalizeDate(input.fromDate, 'fromPubDate');
  const untilDate = normalizeDate(input.untilDate, 'untilPubDate');
  if (fromDate > untilDate) {
    throw new InputError(`fromPubDate (${fromDate}) is after untilPubDate (${untilDate})`);
  }

  const maxRecords = input.maxRecords ?? defaults.maxRecordsDefault;
  if (!Number.isInteger(maxRecords) || maxRecords <= 0) {
    throw new InputError(`maxRecords must be a positive integer, got ${maxRecords}`);
  }

  const rowsPerRequest = input.rowsPerRequest ?? defaults.rowsPerRequest;
  if (!Number.isInteger(rowsPerRequest) || rowsPerRequest <= 0) {
    throw new InputError(`rowsPerRequest must be a positive integer, got ${rowsPerRequest}`);
  }

  const resolved = publishers.resolve(input.publishers ?? []);
  const prefixes = uniqueTrimmed([...resolved.prefixes, ...(input.doiPrefixes ?? []).map((p) => p.toLowerCase())]).sort();

  const spec: QuerySpec = {
    queryText: topic ? topicQueryText(topic) : adHoc,
    fromDate,
    untilDate,
    docTypes: uniqueTrimmed(input.docTypes ?? []),
    publisherFilter: resolved.names,
    prefixes,
    maxRecords,
    rows: pageSize(maxRecords, rowsPerRequest),
    cursor: null
  };

  return {
    spec: Object.freeze(spec),
    topic,
    exclusions: topic ? [...topic.negativeKeywords] : [],
    publisherTerms: resolved.matchTerms
  };
}
