export * from './types.js';
export * from './errors.js';
export * from './http.js';
export * from './config.js';
export * from './transport.js';
export { MemoryCache } from './cache/memory.js';
export { FileCache } from './cache/file.js';
export { cacheEntrySchema, rawRecordSchema, type CacheStore } from './cache/store.js';
export { canonicalizeQuery, canonicalQueryText, fingerprint } from './cache/fingerprint.js';
