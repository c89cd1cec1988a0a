import type { GapThresholds, RawRecord, TopicDefinition } from '@pubintel/core';
import { publisherMatches, type PublisherRegistry } from '../engine/registry.js';
import { cagr, perYearCounts, publicationYear, yearKeys } from './trend.js';

export type RecordsByTopic = ReadonlyMap<string, RawRecord[]>;

export interface SparkPoint {
  year: number;
  count: number;
}

export interface EmergingTopic {
  topicKey: string;
  topicName: string;
  totalVolume: number;
  growthRate: number | null;
  sparkline: SparkPoint[];
}

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Ranks topics by growth over the last `lookbackYears` ending at each topic's
 * latest publication year. Topics without a defined growth rate sort last;
 * ties go to the larger volume.
 */
export function emergingTopics(
  recordsByTopic: RecordsByTopic,
  topics: ReadonlyArray<Readonly<TopicDefinition>>,
  lookbackYears: number
): EmergingTopic[] {
  const ranking: EmergingTopic[] = [];

  for (const topic of topics) {
    const records = recordsByTopic.get(topic.key);
    if (!records) continue;
    const perYear = perYearCounts(records);
    const years = yearKeys(perYear);
    if (years.length === 0) {
      ranking.push({ topicKey: topic.key, topicName: topic.name, totalVolume: records.length, growthRate: null, sparkline: [] });
      continue;
    }

    const latest = years[years.length - 1];
    const cutoff = latest - Math.max(1, lookbackYears) + 1;
    const recent: Record<number, number> = {};
    const sparkline: SparkPoint[] = [];
    for (let year = cutoff; year <= latest; year++) {
      const count = perYear[year] ?? 0;
      recent[year] = count;
      sparkline.push({ year, count });
    }

    ranking.push({
      topicKey: topic.key,
      topicName: topic.name,
      totalVolume: records.length,
      growthRate: cagr(recent),
      sparkline
    });
  }

  return ranking.sort((a, b) => {
    if (a.growthRate === null || b.growthRate === null) {
      if (a.growthRate !== b.growthRate) return a.growthRate === null ? 1 : -1;
    } else if (a.growthRate !== b.growthRate) {
      return b.growthRate - a.growthRate;
    }
    return b.totalVolume - a.totalVolume || compareKeys(a.topicKey, b.topicKey);
  });
}

/** High growth where the target is under-represented scores highest. */
export function opportunityScore(overallGrowth: number, targetShare: number): number {
  return overallGrowth * (1 - targetShare);
}

export interface GapOpportunity {
  topicKey: string;
  topicName: string;
  overallGrowth: number;
  targetShare: number;
  latestYear: number;
  topicVolume: number;
  opportunityScore: number;
  isOpportunity: boolean;
  explanation: string;
}

export interface SkippedTopic {
  topicKey: string;
  reason: string;
}

export interface GapAnalysis {
  targetPublisher: string;
  opportunities: GapOpportunity[];
  skipped: SkippedTopic[];
}

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

export function gapAnalysis(
  recordsByTopic: RecordsByTopic,
  topics: ReadonlyArray<Readonly<TopicDefinition>>,
  targetPublisher: string,
  registry: PublisherRegistry,
  thresholds: GapThresholds
): GapAnalysis {
  const terms = registry.termsFor(targetPublisher);
  const target = registry.lookup(targetPublisher)?.name ?? targetPublisher;
  const opportunities: GapOpportunity[] = [];
  const skipped: SkippedTopic[] = [];

  for (const topic of topics) {
    const records = recordsByTopic.get(topic.key);
    if (!records) continue;

    const perYear = perYearCounts(records);
    const overallGrowth = cagr(perYear);
    if (overallGrowth === null) {
      skipped.push({ topicKey: topic.key, reason: 'Growth is undefined: fewer than two years with publications.' });
      continue;
    }

    const years = yearKeys(perYear);
    const latestYear = years[years.length - 1];
    const latest = records.filter((record) => publicationYear(record) === latestYear);
    const targetCount = latest.filter((record) => publisherMatches(record.publisher, terms)).length;
    const targetShare = latest.length ? targetCount / latest.length : 0;
    const score = opportunityScore(overallGrowth, targetShare);

    const isOpportunity =
      overallGrowth >= thresholds.minTopicCagr &&
      targetShare <= thresholds.maxTargetShare &&
      records.length >= thresholds.minTopicVolume;

    opportunities.push({
      topicKey: topic.key,
      topicName: topic.name,
      overallGrowth,
      targetShare,
      latestYear,
      topicVolume: records.length,
      opportunityScore: score,
      isOpportunity,
      explanation: `Growth ${percent(overallGrowth)} with ${target} share ${percent(targetShare)} in ${latestYear}.`
    });
  }

  opportunities.sort((a, b) =>
    b.opportunityScore - a.opportunityScore || b.topicVolume - a.topicVolume || compareKeys(a.topicKey, b.topicKey)
  );

  return { targetPublisher: target, opportunities, skipped };
}
