import { CacheError, errorMessage, fingerprint } from '@pubintel/core';
import type { CacheEntry, CacheStore, QuerySpec } from '@pubintel/core';
import type { WorksSource } from '../providers/crossref.js';
import type { FetchStats } from './stats.js';

export interface ResponseCacheOptions {
  /** Entries older than this are treated as absent. Unset: never stale. */
  maxAgeMs?: number;
  now?: () => Date;
}

export interface GetOrFetchOptions {
  refresh: boolean;
  stats: FetchStats;
  /** Runs immediately before a live call, never on a hit */
  beforeLiveCall?: () => Promise<void>;
}

export interface CachedPage {
  entry: CacheEntry;
  fromCache: boolean;
}

export class ResponseCache {
  private readonly now: () => Date;

  constructor(
    private readonly store: CacheStore,
    private readonly source: WorksSource,
    private readonly options: ResponseCacheOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  private isFresh(entry: CacheEntry): boolean {
    if (this.options.maxAgeMs === undefined) return true;
    const fetchedAt = Date.parse(entry.fetchedAt);
    if (Number.isNaN(fetchedAt)) return false;
    return this.now().getTime() - fetchedAt <= this.options.maxAgeMs;
  }

  private lookup(key: string): CacheEntry | null {
    try {
      const entry = this.store.get(key);
      return entry && this.isFresh(entry) ? entry : null;
    } catch (error) {
      if (!(error instanceof CacheError)) throw error;
      console.error(`[response-cache] read failed for ${key.slice(0, 12)}, refetching: ${error.message}`);
      return null;
    }
  }

  /**
   * Serves one page for `spec`: from the store unless `refresh` is set or the
   * entry is missing or stale, otherwise from exactly one upstream call whose
   * result then replaces the stored entry. A failed call writes nothing.
   */
  async getOrFetch(spec: QuerySpec, options: GetOrFetchOptions): Promise<CachedPage> {
    const key = fingerprint(spec);

    if (!options.refresh) {
      const cached = this.lookup(key);
      if (cached) {
        options.stats.recordHit();
        return { entry: cached, fromCache: true };
      }
    }

    await options.beforeLiveCall?.();
    const calledAt = this.now();
    const page = await this.source.searchPage(spec);
    options.stats.recordLive(calledAt);

    const entry: CacheEntry = {
      records: page.records,
      nextCursor: page.nextCursor,
      fetchedAt: calledAt.toISOString()
    };

    try {
      this.store.set(key, entry);
    } catch (error) {
      console.error(`[response-cache] write failed for ${key.slice(0, 12)}: ${errorMessage(error)}`);
    }

    return { entry, fromCache: false };
  }
}
