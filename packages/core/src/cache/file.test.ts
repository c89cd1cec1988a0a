import { mkdtempSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CacheError } from '../errors.js';
import type { CacheEntry } from '../types.js';
import { FileCache } from './file.js';

const entry: CacheEntry = {
  records: [{ doi: '10.1117/12.1', title: 'Silicon photonics platform', authors: [{ affiliation: 'MIT, USA' }] }],
  nextCursor: 'next',
  fetchedAt: '2024-01-01T00:00:00.000Z'
};

describe('FileCache', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'pubintel-cache-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns null for a missing key', () => {
    expect(new FileCache(dir).get('abc123')).toBeNull();
  });

  it('persists entries across instances', () => {
    new FileCache(dir).set('abc123', entry);
    expect(new FileCache(dir).get('abc123')).toEqual(entry);
  });

  it('overwrites an existing entry', () => {
    const cache = new FileCache(dir);
    cache.set('abc123', entry);
    cache.set('abc123', { ...entry, nextCursor: null });
    expect(cache.get('abc123')?.nextCursor).toBeNull();
    expect(readdirSync(dir)).toEqual(['abc123.json']);
  });

  it('throws CacheError for a corrupt entry', () => {
    const cache = new FileCache(dir);
    writeFileSync(join(dir, 'abc123.json'), '{not json', 'utf-8');
    expect(() => cache.get('abc123')).toThrow(CacheError);
  });

  it('throws CacheError for an entry with the wrong shape', () => {
    const cache = new FileCache(dir);
    writeFileSync(join(dir, 'abc123.json'), JSON.stringify({ records: 'nope' }), 'utf-8');
    expect(() => cache.get('abc123')).toThrow(CacheError);
  });

  it('rejects keys that are not fingerprints', () => {
    expect(() => new FileCache(dir).get('../escape')).toThrow(CacheError);
  });
});
