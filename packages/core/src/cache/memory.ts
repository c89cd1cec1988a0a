import type { CacheEntry } from '../types.js';
import type { CacheStore } from './store.js';

export class MemoryCache implements CacheStore {
  private cache = new Map<string, CacheEntry>();

  get(key: string): CacheEntry | null {
    return this.cache.get(key) ?? null;
  }

  set(key: string, entry: CacheEntry): void {
    this.cache.set(key, entry);
  }
}
