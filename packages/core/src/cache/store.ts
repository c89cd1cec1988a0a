import { z } from 'zod';
import type { CacheEntry } from '../types.js';

/**
 * Key/value persistence for cached upstream pages.
 *
 * Implementations must write each entry atomically; readers either see the
 * previous entry or the new one. `get` throws CacheError for an entry that
 * exists but cannot be read back.
 */
export interface CacheStore {
  get(key: string): CacheEntry | null;
  set(key: string, entry: CacheEntry): void;
}

const rawAuthorSchema = z.object({
  name: z.string().optional(),
  affiliation: z.string().optional()
});

export const rawRecordSchema = z.object({
  doi: z.string().min(1),
  title: z.string(),
  publisher: z.string().optional(),
  type: z.string().optional(),
  publishedDate: z.string().optional(),
  createdDate: z.string().optional(),
  acceptedDate: z.string().optional(),
  abstract: z.string().optional(),
  authors: z.array(rawAuthorSchema),
  containerTitle: z.string().optional()
});

export const cacheEntrySchema = z.object({
  records: z.array(rawRecordSchema),
  nextCursor: z.string().nullable(),
  fetchedAt: z.string()
});
