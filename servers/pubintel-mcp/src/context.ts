import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { FileCache, loadConfig, type CacheStore, type LoadedConfig } from '@pubintel/core';
import { FetchOrchestrator } from './engine/orchestrator.js';
import { PublisherRegistry, TopicRegistry } from './engine/registry.js';
import { ResponseCache } from './engine/response_cache.js';
import { AnalysisService } from './engine/service.js';
import { CrossrefWorksSource, type WorksSource } from './providers/crossref.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_CONFIG_DIR = join(__dirname, '..', 'config');
export const DEFAULT_CACHE_DIR = join(__dirname, '..', '.cache');

export interface ServiceOverrides {
  store?: CacheStore;
  source?: WorksSource;
}

/** Wires the engine from parsed configuration. */
export function createService(config: LoadedConfig, overrides: ServiceOverrides = {}): AnalysisService {
  const { settings } = config;
  const contactEmail = process.env.CONTACT_EMAIL || settings.contactEmail;

  const source = overrides.source ?? new CrossrefWorksSource({
    contactEmail,
    timeoutMs: settings.requestTimeoutSec * 1000
  });
  const store = overrides.store ?? new FileCache(process.env.PUBINTEL_CACHE_DIR || DEFAULT_CACHE_DIR);

  const cache = new ResponseCache(store, source, {
    maxAgeMs: settings.cacheTtlHours > 0 ? settings.cacheTtlHours * 3_600_000 : undefined
  });

  const orchestrator = new FetchOrchestrator(cache, {
    retry: {
      maxAttempts: settings.maxRetries + 1,
      baseDelayMs: settings.backoffBaseMs,
      maxDelayMs: 30_000
    },
    maxPages: settings.maxPages,
    minCallIntervalMs: settings.minCallIntervalMs
  });

  return new AnalysisService({
    settings,
    topics: TopicRegistry.create(config.topics),
    publishers: PublisherRegistry.create(config.publishers),
    orchestrator
  });
}

export function loadServiceFromEnv(): { service: AnalysisService; config: LoadedConfig } {
  const config = loadConfig(process.env.PUBINTEL_CONFIG_DIR || DEFAULT_CONFIG_DIR);
  console.error(`[pubintel-mcp] loaded ${config.topics.length} topics, ${config.publishers.length} publishers`);
  return { service: createService(config), config };
}
