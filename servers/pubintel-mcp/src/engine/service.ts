import { InputError } from '@pubintel/core';
import type { AnalysisResult, AppSettings, MatchedRecord, QuerySpec, RawRecord, TopicDefinition } from '@pubintel/core';
import {
  comparePublishers,
  coverageMetrics,
  coverageWarnings,
  emergingTopics,
  gapAnalysis,
  rankInstitutions,
  rankJournals,
  timeToPublication,
  topicOverview,
  type CoverageField,
  type EmergingTopic,
  type GapAnalysis,
  type InstitutionsBreakdown,
  type JournalRanking,
  type PublisherComparison,
  type TimeToPublication,
  type TopicOverview
} from '../analytics/index.js';
import { matchRecords, postFilterRecords } from './matcher.js';
import type { FetchOrchestrator } from './orchestrator.js';
import { buildQuery, normalizeDate } from './query.js';
import type { PublisherRegistry, TopicRegistry } from './registry.js';
import { FetchStats } from './stats.js';

export interface AnalyzeRequest {
  topicKey?: string | null;
  adHocQuery?: string | null;
  fromPubDate: string;
  untilPubDate: string;
  docTypes?: string[];
  publishers?: string[];
  containerTitles?: string[];
  doiPrefixes?: string[];
  maxRecords?: number;
  rowsPerRequest?: number;
  refreshCache?: boolean;
}

export interface TopicSweepRequest {
  fromPubDate: string;
  untilPubDate: string;
  docTypes?: string[];
  /** Defaults to every configured topic */
  topicKeys?: string[];
  lookbackYears?: number;
  maxRecordsPerTopic?: number;
  refreshCache?: boolean;
}

export interface GapAnalysisRequest extends TopicSweepRequest {
  targetPublisher: string;
}

export interface AnalysisDeps {
  settings: AppSettings;
  topics: TopicRegistry;
  publishers: PublisherRegistry;
  orchestrator: FetchOrchestrator;
  now?: () => Date;
}

interface FetchedSet {
  spec: Readonly<QuerySpec>;
  records: MatchedRecord[];
}

export type TopicAnalysis = AnalysisResult<{ query: Readonly<QuerySpec>; overview: TopicOverview; journals: JournalRanking[] }>;
export type PublisherAnalysis = AnalysisResult<{ query: Readonly<QuerySpec>; comparison: PublisherComparison }>;
export type InstitutionAnalysis = AnalysisResult<{ query: Readonly<QuerySpec>; institutions: InstitutionsBreakdown }>;
export type LagAnalysis = AnalysisResult<{ query: Readonly<QuerySpec>; timeToPublication: TimeToPublication }>;
export type EmergingAnalysis = AnalysisResult<{ rankedTopics: EmergingTopic[] }>;
export type GapResult = AnalysisResult<{ gap: GapAnalysis }>;

/**
 * Runs one dashboard action end to end: query building, cached pagination,
 * local filtering and matching, then the analytics for that action. Every
 * call gets its own FetchStats; only InputError escapes.
 */
export class AnalysisService {
  private readonly now: () => Date;

  constructor(private readonly deps: AnalysisDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  private resolveTopic(topicKey: string | null | undefined): Readonly<TopicDefinition> | null {
    if (!topicKey) return null;
    const topic = this.deps.topics.getByKey(topicKey);
    if (!topic) {
      throw new InputError(`Unknown topic key: ${topicKey}`);
    }
    return topic;
  }

  private async fetchMatched(
    request: AnalyzeRequest,
    stats: FetchStats,
    topic: Readonly<TopicDefinition> | null
  ): Promise<FetchedSet> {
    const { settings, publishers, orchestrator } = this.deps;
    const built = buildQuery(
      {
        topic,
        adHocQuery: request.adHocQuery,
        fromDate: request.fromPubDate,
        untilDate: request.untilPubDate,
        docTypes: request.docTypes,
        publishers: request.publishers,
        doiPrefixes: request.doiPrefixes,
        maxRecords: request.maxRecords,
        rowsPerRequest: request.rowsPerRequest
      },
      settings,
      publishers
    );

    const raw = await orchestrator.collect(built.spec, { refresh: request.refreshCache ?? false, stats });
    const filtered = postFilterRecords(raw, {
      docTypes: built.spec.docTypes,
      publisherTerms: built.publisherTerms,
      prefixes: built.spec.prefixes,
      containerTitles: request.containerTitles
    });

    return { spec: built.spec, records: matchRecords(filtered, built.topic) };
  }

  private finish<T extends object>(
    records: RawRecord[],
    stats: FetchStats,
    payload: T,
    coverageFields: CoverageField[]
  ): AnalysisResult<T> {
    const coverage = coverageMetrics(records);
    if (records.length === 0) {
      stats.warn('No records matched the query.');
    }
    for (const warning of coverageWarnings(coverage, records.length, this.deps.settings.lowCoverageThreshold, coverageFields)) {
      stats.warn(warning);
    }
    return {
      recordCount: records.length,
      coverage,
      meta: stats.toMeta(this.now()),
      ...payload
    };
  }

  async analyzeTopic(request: AnalyzeRequest): Promise<TopicAnalysis> {
    const stats = new FetchStats();
    const { spec, records } = await this.fetchMatched(request, stats, this.resolveTopic(request.topicKey));
    const overview = topicOverview(records, this.deps.settings.topN);
    if (records.length > 0 && overview.cagr === null) {
      stats.warn('CAGR is undefined: fewer than two years with publications.');
    }
    return this.finish(records, stats, {
      query: spec,
      overview,
      journals: rankJournals(records, this.deps.settings.topN)
    }, ['abstractRate', 'affiliationRate']);
  }

  /**
   * Shares are taken against the whole matched set, so the publisher list
   * only selects what to report and is not sent upstream.
   */
  async comparePublishers(request: AnalyzeRequest): Promise<PublisherAnalysis> {
    const selected = (request.publishers ?? []).filter((name) => name.trim());
    if (selected.length === 0) {
      throw new InputError('At least one publisher is required for a comparison');
    }
    const stats = new FetchStats();
    const { spec, records } = await this.fetchMatched(
      { ...request, publishers: [], doiPrefixes: [] },
      stats,
      this.resolveTopic(request.topicKey)
    );
    return this.finish(records, stats, {
      query: spec,
      comparison: comparePublishers(records, selected, this.deps.publishers)
    }, []);
  }

  async institutions(request: AnalyzeRequest): Promise<InstitutionAnalysis> {
    const stats = new FetchStats();
    const { spec, records } = await this.fetchMatched(request, stats, this.resolveTopic(request.topicKey));
    return this.finish(records, stats, {
      query: spec,
      institutions: rankInstitutions(records, this.deps.settings.topN)
    }, ['affiliationRate']);
  }

  async timeToPublication(request: AnalyzeRequest): Promise<LagAnalysis> {
    const stats = new FetchStats();
    const { spec, records } = await this.fetchMatched(request, stats, this.resolveTopic(request.topicKey));
    return this.finish(records, stats, {
      query: spec,
      timeToPublication: timeToPublication(records)
    }, ['acceptedDateRate']);
  }

  private sweepTopics(request: TopicSweepRequest): ReadonlyArray<Readonly<TopicDefinition>> {
    if (!request.topicKeys || request.topicKeys.length === 0) {
      return this.deps.topics.topics;
    }
    return request.topicKeys.map((key) => {
      const topic = this.resolveTopic(key);
      if (!topic) throw new InputError('Topic keys must not be empty');
      return topic;
    });
  }

  /** Runs the pipeline once per topic, each with its own record cap. */
  private async collectPerTopic(
    request: TopicSweepRequest,
    stats: FetchStats
  ): Promise<{ topics: ReadonlyArray<Readonly<TopicDefinition>>; byTopic: Map<string, MatchedRecord[]>; all: MatchedRecord[] }> {
    const topics = this.sweepTopics(request);
    if (topics.length === 0) {
      throw new InputError('No topics are configured');
    }
    const fromDate = normalizeDate(request.fromPubDate, 'fromPubDate');
    const untilDate = normalizeDate(request.untilPubDate, 'untilPubDate');
    if (fromDate > untilDate) {
      throw new InputError(`fromPubDate (${fromDate}) is after untilPubDate (${untilDate})`);
    }

    const byTopic = new Map<string, MatchedRecord[]>();
    const union = new Map<string, MatchedRecord>();
    for (const topic of topics) {
      const { records } = await this.fetchMatched(
        {
          fromPubDate: fromDate,
          untilPubDate: untilDate,
          docTypes: request.docTypes,
          maxRecords: request.maxRecordsPerTopic ?? this.deps.settings.maxRecordsPerTopic,
          refreshCache: request.refreshCache
        },
        stats,
        topic
      );
      byTopic.set(topic.key, records);
      for (const record of records) {
        if (!union.has(record.doi)) union.set(record.doi, record);
      }
    }
    return { topics, byTopic, all: [...union.values()] };
  }

  async emergingTopics(request: TopicSweepRequest): Promise<EmergingAnalysis> {
    const stats = new FetchStats();
    const { topics, byTopic, all } = await this.collectPerTopic(request, stats);
    const rankedTopics = emergingTopics(byTopic, topics, request.lookbackYears ?? this.deps.settings.lookbackYears);
    for (const topic of rankedTopics) {
      if (topic.growthRate === null) {
        stats.warn(`Growth is undefined for ${topic.topicKey}: too few years with publications.`);
      }
    }
    return this.finish(all, stats, { rankedTopics }, []);
  }

  async gapAnalysis(request: GapAnalysisRequest): Promise<GapResult> {
    if (!request.targetPublisher.trim()) {
      throw new InputError('A target publisher is required');
    }
    const stats = new FetchStats();
    const { topics, byTopic, all } = await this.collectPerTopic(request, stats);
    const gap = gapAnalysis(byTopic, topics, request.targetPublisher.trim(), this.deps.publishers, this.deps.settings.gap);
    for (const skipped of gap.skipped) {
      stats.warn(`Skipped ${skipped.topicKey}: ${skipped.reason}`);
    }
    return this.finish(all, stats, { gap }, []);
  }

  describeConfig() {
    const { settings, topics, publishers } = this.deps;
    return {
      app: {
        name: settings.appName,
        version: settings.version,
        maxRecordsDefault: settings.maxRecordsDefault,
        rowsPerRequest: settings.rowsPerRequest,
        lowCoverageThreshold: settings.lowCoverageThreshold
      },
      topics: topics.topics,
      publishers: publishers.publishers
    };
  }
}
