import { DEFAULT_RETRY_POLICY, FetchError, Throttle, errorMessage, withRetry } from '@pubintel/core';
import type { QuerySpec, RawRecord, RetryPolicy, Sleep } from '@pubintel/core';
import type { CachedPage, ResponseCache } from './response_cache.js';
import type { FetchStats } from './stats.js';

export interface OrchestratorOptions {
  retry?: RetryPolicy;
  /** Guards against an upstream that keeps handing out cursors */
  maxPages?: number;
  /** Minimum spacing between consecutive live calls */
  minCallIntervalMs?: number;
  sleep?: Sleep;
  now?: () => number;
}

export interface CollectOptions {
  refresh: boolean;
  stats: FetchStats;
}

export const DEFAULT_MAX_PAGES = 50;

/**
 * Walks the upstream cursor chain through the response cache and merges the
 * pages into one DOI-unique record list of at most `spec.maxRecords`.
 *
 * Page failures never throw: once retries are exhausted the records gathered
 * so far are returned and the truncation is reported on `stats.warnings`.
 * Each cursor is requested at most once per run.
 */
export class FetchOrchestrator {
  private readonly retry: RetryPolicy;
  private readonly maxPages: number;
  private readonly throttle: Throttle;
  private readonly sleep?: Sleep;

  constructor(
    private readonly cache: ResponseCache,
    options: OrchestratorOptions = {}
  ) {
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
    this.sleep = options.sleep;
    this.throttle = new Throttle(options.minCallIntervalMs ?? 0, options.now, options.sleep);
  }

  async collect(spec: Readonly<QuerySpec>, options: CollectOptions): Promise<RawRecord[]> {
    const { stats } = options;
    const records: RawRecord[] = [];
    const seen = new Set<string>();
    let cursor = spec.cursor;
    let pages = 0;
    let moreAvailable = false;
    const visited = new Set<string | null>([cursor]);

    while (records.length < spec.maxRecords) {
      if (pages >= this.maxPages) {
        stats.warn(`Stopped after the ${this.maxPages}-page limit with ${records.length} records; results are incomplete.`);
        break;
      }

      const pageSpec: QuerySpec = { ...spec, cursor };
      let page: CachedPage;
      try {
        page = await withRetry(
          () => this.cache.getOrFetch(pageSpec, {
            refresh: options.refresh,
            stats,
            beforeLiveCall: () => this.throttle.wait()
          }),
          this.retry,
          {
            sleep: this.sleep,
            onRetry: (error, attempt, delayMs) => {
              console.error(`[orchestrator] page ${pages + 1} attempt ${attempt} failed (${errorMessage(error)}), retrying in ${delayMs}ms`);
            }
          }
        );
      } catch (error) {
        if (!(error instanceof FetchError)) throw error;
        stats.warn(
          `Upstream fetch failed on page ${pages + 1} (${error.message}); returning ${records.length} records collected before the failure.`
        );
        break;
      }
      pages++;

      const { entry } = page;
      moreAvailable = false;
      for (const record of entry.records) {
        const doi = record.doi.toLowerCase();
        if (seen.has(doi)) continue;
        if (records.length >= spec.maxRecords) {
          moreAvailable = true;
          break;
        }
        seen.add(doi);
        records.push(record);
      }

      if (entry.records.length === 0 || !entry.nextCursor) {
        break;
      }
      if (visited.has(entry.nextCursor)) {
        stats.warn(`Upstream repeated a pagination cursor after page ${pages}; stopped with ${records.length} records.`);
        break;
      }
      visited.add(entry.nextCursor);
      moreAvailable = true;
      cursor = entry.nextCursor;
    }

    if (records.length >= spec.maxRecords && moreAvailable) {
      stats.warn(`Record cap of ${spec.maxRecords} reached; upstream has more matching records.`);
    }

    console.error(`[orchestrator] collected ${records.length} records over ${pages} page(s)`);
    return records;
  }
}
