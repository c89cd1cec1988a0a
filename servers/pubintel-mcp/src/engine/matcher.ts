import type { MatchedRecord, RawRecord, TopicDefinition } from '@pubintel/core';
import { publisherMatches } from './registry.js';

export function recordText(record: RawRecord): string {
  return [record.title, record.abstract, record.containerTitle]
    .filter((part): part is string => Boolean(part))
    .join(' ')
    .toLowerCase();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * `term` occurs in the lower-cased `haystack` bounded by non-alphanumerics
 * (or the ends of the text) on both sides.
 */
export function containsWholeWord(haystack: string, term: string): boolean {
  const needle = term.trim().toLowerCase();
  if (!needle) return false;
  const pattern = new RegExp(`(?:^|[^\\p{L}\\p{N}])${escapeRegExp(needle)}(?:$|[^\\p{L}\\p{N}])`, 'u');
  return pattern.test(haystack);
}

export function isMatch(record: RawRecord, topic: Readonly<TopicDefinition>): boolean {
  const haystack = recordText(record);
  const positive = [...topic.keywords, ...topic.synonyms].some((term) => containsWholeWord(haystack, term));
  if (!positive) return false;
  return !topic.negativeKeywords.some((term) => containsWholeWord(haystack, term));
}

/**
 * Tags every record with its match decision. Ad-hoc queries (no topic) accept
 * everything: the upstream query text was the filter.
 */
export function tagRecords(records: RawRecord[], topic: Readonly<TopicDefinition> | null): MatchedRecord[] {
  return records.map((record) => ({
    ...record,
    topicKey: topic?.key ?? null,
    matched: topic ? isMatch(record, topic) : true
  }));
}

export function matchRecords(records: RawRecord[], topic: Readonly<TopicDefinition> | null): MatchedRecord[] {
  return tagRecords(records, topic).filter((record) => record.matched);
}

export interface PostFilter {
  docTypes?: string[];
  /** Lower-cased publisher names and aliases */
  publisherTerms?: string[];
  prefixes?: string[];
  containerTitles?: string[];
}

/**
 * Local filters for constraints the upstream applies loosely or not at all.
 * Empty lists leave the corresponding dimension unfiltered.
 */
export function postFilterRecords(records: RawRecord[], filter: PostFilter): RawRecord[] {
  const docTypes = new Set((filter.docTypes ?? []).map((t) => t.toLowerCase()));
  const publisherTerms = filter.publisherTerms ?? [];
  const prefixes = (filter.prefixes ?? []).map((p) => p.toLowerCase());
  const containers = (filter.containerTitles ?? []).map((c) => c.trim().toLowerCase()).filter(Boolean);

  return records.filter((record) => {
    if (docTypes.size && !docTypes.has((record.type ?? '').toLowerCase())) return false;
    if (!publisherMatches(record.publisher, publisherTerms)) return false;
    if (prefixes.length) {
      const doi = record.doi.toLowerCase();
      if (!prefixes.some((prefix) => doi.startsWith(`${prefix}/`))) return false;
    }
    if (containers.length) {
      const container = (record.containerTitle ?? '').toLowerCase();
      if (!containers.some((term) => container.includes(term))) return false;
    }
    return true;
  });
}
