import { mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { randomUUID } from 'crypto';
import { CacheError } from '../errors.js';
import type { CacheEntry } from '../types.js';
import { cacheEntrySchema, type CacheStore } from './store.js';

const KEY_PATTERN = /^[a-z0-9]+$/;

/**
 * Durable cache: one JSON file per key under `dir`.
 *
 * Writes go to a uniquely named temporary file that is then renamed over the
 * target, so a concurrent reader never observes a partially written entry.
 */
export class FileCache implements CacheStore {
  constructor(private readonly dir: string) {
    mkdirSync(dir, { recursive: true });
  }

  private pathFor(key: string): string {
    if (!KEY_PATTERN.test(key)) {
      throw new CacheError(`Invalid cache key: ${key}`);
    }
    return join(this.dir, `${key}.json`);
  }

  get(key: string): CacheEntry | null {
    const path = this.pathFor(key);
    let content: string;
    try {
      content = readFileSync(path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw new CacheError(`Failed to read cache entry ${key}`, { cause: error });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new CacheError(`Corrupt cache entry ${key}`, { cause: error });
    }

    const parsed = cacheEntrySchema.safeParse(raw);
    if (!parsed.success) {
      throw new CacheError(`Corrupt cache entry ${key}: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
    }
    return parsed.data;
  }

  set(key: string, entry: CacheEntry): void {
    const path = this.pathFor(key);
    const tmp = join(this.dir, `.${key}.${randomUUID()}.tmp`);
    try {
      writeFileSync(tmp, JSON.stringify(entry), 'utf-8');
      renameSync(tmp, path);
    } catch (error) {
      rmSync(tmp, { force: true });
      throw new CacheError(`Failed to write cache entry ${key}`, { cause: error });
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
