/**
 * Audit Cache
 *
 * Fingerprint index, per-tool result store, and dependency-keyed pattern
 * cache, all persisted under one cache directory inside the project root.
 */

export * from './types.js';
export * from './layout.js';
export * from './change-set.js';
export { FingerprintIndex, type FingerprintIndexOptions, type FingerprintIndexStats } from './fingerprint-index.js';
export { ResultStore, type ResultStoreOptions } from './result-store.js';
export { PatternCache, DEFAULT_PATTERN_MAX_AGE_MS, type PatternCacheOptions } from './pattern-cache.js';
