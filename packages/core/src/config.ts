import { readFileSync } from 'fs';
import { join } from 'path';
import { parse } from 'yaml';
import { z } from 'zod';
import type { PublisherDefinition, TopicDefinition } from './types.js';

const termList = z.array(z.string().trim().min(1)).default([]);

export const topicDefinitionSchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  keywords: termList,
  synonyms: termList,
  negative_keywords: termList
}).transform((topic): TopicDefinition => ({
  key: topic.key,
  name: topic.name,
  keywords: topic.keywords,
  synonyms: topic.synonyms,
  negativeKeywords: topic.negative_keywords
}));

export const publisherDefinitionSchema = z.object({
  name: z.string().min(1),
  aliases: termList,
  prefixes: termList
});

const gapSchema = z.object({
  min_topic_cagr: z.number().default(0.08),
  max_target_share: z.number().min(0).max(1).default(0.12),
  min_topic_volume: z.number().int().min(0).default(40)
}).default({});

export const appSectionSchema = z.object({
  name: z.string().default('Publishing Intelligence'),
  version: z.coerce.string().default('0.1.0'),
  contact_email: z.string().optional(),
  cache_ttl_hours: z.number().min(0).default(24),
  request_timeout_sec: z.number().positive().default(30),
  max_retries: z.number().int().min(0).default(4),
  backoff_base_ms: z.number().min(0).default(800),
  min_call_interval_ms: z.number().min(0).default(100),
  max_pages: z.number().int().positive().default(50),
  max_records_default: z.number().int().positive().default(2000),
  max_records_per_topic: z.number().int().positive().default(1200),
  rows_per_request: z.number().int().positive().default(200),
  low_coverage_threshold: z.number().min(0).max(1).default(0.25),
  top_n: z.number().int().positive().default(15),
  lookback_years: z.number().int().positive().default(5),
  gap_analysis: gapSchema
}).default({});

export interface GapThresholds {
  minTopicCagr: number;
  maxTargetShare: number;
  minTopicVolume: number;
}

export interface AppSettings {
  appName: string;
  version: string;
  contactEmail?: string;
  cacheTtlHours: number;
  requestTimeoutSec: number;
  maxRetries: number;
  backoffBaseMs: number;
  minCallIntervalMs: number;
  maxPages: number;
  maxRecordsDefault: number;
  maxRecordsPerTopic: number;
  rowsPerRequest: number;
  lowCoverageThreshold: number;
  topN: number;
  lookbackYears: number;
  gap: GapThresholds;
}

export interface LoadedConfig {
  settings: AppSettings;
  topics: TopicDefinition[];
  publishers: PublisherDefinition[];
}

export function parseAppSettings(raw: unknown): AppSettings {
  const app = appSectionSchema.parse(raw ?? undefined);
  return {
    appName: app.name,
    version: app.version,
    contactEmail: app.contact_email,
    cacheTtlHours: app.cache_ttl_hours,
    requestTimeoutSec: app.request_timeout_sec,
    maxRetries: app.max_retries,
    backoffBaseMs: app.backoff_base_ms,
    minCallIntervalMs: app.min_call_interval_ms,
    maxPages: app.max_pages,
    maxRecordsDefault: app.max_records_default,
    maxRecordsPerTopic: app.max_records_per_topic,
    rowsPerRequest: app.rows_per_request,
    lowCoverageThreshold: app.low_coverage_threshold,
    topN: app.top_n,
    lookbackYears: app.lookback_years,
    gap: {
      minTopicCagr: app.gap_analysis.min_topic_cagr,
      maxTargetShare: app.gap_analysis.max_target_share,
      minTopicVolume: app.gap_analysis.min_topic_volume
    }
  };
}

const appFileSchema = z.object({ app: z.unknown().optional() }).passthrough();
const topicsFileSchema = z.object({ topics: z.array(topicDefinitionSchema).default([]) });
const publishersFileSchema = z.object({ publishers: z.array(publisherDefinitionSchema).default([]) });

export function loadYaml(filePath: string): unknown {
  const content = readFileSync(filePath, 'utf-8');
  const parsed: unknown = parse(content);
  return parsed ?? {};
}

/**
 * Reads `app.yaml`, `topics.yaml` and `publishers.yaml` from `configDir`.
 * Unreadable or invalid files are fatal: the engine cannot run without them.
 */
export function loadConfig(configDir: string): LoadedConfig {
  const appFile = appFileSchema.parse(loadYaml(join(configDir, 'app.yaml')));
  const topicsFile = topicsFileSchema.parse(loadYaml(join(configDir, 'topics.yaml')));
  const publishersFile = publishersFileSchema.parse(loadYaml(join(configDir, 'publishers.yaml')));

  return {
    settings: parseAppSettings(appFile.app),
    topics: topicsFile.topics,
    publishers: publishersFile.publishers
  };
}
