/**
 * Cache Types
 *
 * Type definitions and persisted-artifact schemas for the fingerprint
 * index, the result store, and the pattern cache.
 */

import { z } from 'zod';

// ============================================================================
// JSON values
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

/** A single finding reported by a tool; opaque to the cache layer */
export type Finding = JsonValue;

/** Findings grouped by POSIX project-relative path */
export type PerFileFindings = Record<string, Finding[]>;

// ============================================================================
// Lookups
// ============================================================================

export type CacheMissReason = 'missing' | 'corrupt' | 'expired' | 'dependencies-changed';

export type CacheLookup<T> = { hit: true; value: T } | { hit: false; reason: CacheMissReason };

// ============================================================================
// Fingerprint index
// ============================================================================

export interface FileRecord {
  path: string;
  /** SHA-256 of the content, hex, first 16 chars */
  fingerprint: string;
  /** ISO timestamp of the commit that last saw the file */
  lastSeen: string;
}

export interface ChangeSet {
  added: string[];
  modified: string[];
  removed: string[];
  unchanged: string[];
}

export const CACHE_VERSION = 1;

export const indexArtifactSchema = z.object({
  version: z.literal(CACHE_VERSION),
  projectRoot: z.string(),
  lastUpdated: z.string(),
  totalFiles: z.number().int().min(0),
  files: z.record(
    z.object({
      fingerprint: z.string().min(1),
      lastSeen: z.string(),
    })
  ),
});

export type PersistedIndex = z.infer<typeof indexArtifactSchema>;

// ============================================================================
// Result store
// ============================================================================

export const resultArtifactSchema = z.object({
  version: z.literal(CACHE_VERSION),
  tool: z.string(),
  timestamp: z.string(),
  perFileFindings: z.record(z.array(jsonValueSchema)),
  aggregate: jsonValueSchema,
});

export type ToolCacheEntry = z.infer<typeof resultArtifactSchema>;

export interface ToolCacheEntrySummary {
  tool: string;
  timestamp: string;
  filesCached: number;
  findings: number;
}

// ============================================================================
// Pattern cache
// ============================================================================

export const patternArtifactSchema = z.object({
  version: z.literal(CACHE_VERSION),
  tool: z.string(),
  /** Epoch milliseconds */
  timestamp: z.number(),
  createdAt: z.string(),
  dependencyFingerprints: z.record(z.string()),
  payload: jsonValueSchema,
});

export type PatternCacheEntry = z.infer<typeof patternArtifactSchema>;

export interface PatternCacheEntrySummary {
  tool: string;
  createdAt: string;
  ageMs: number;
  filesTracked: number;
  /** Within max age; dependency fingerprints are not rechecked here */
  valid: boolean;
}

// ============================================================================
// Reducer strategies
// ============================================================================

/**
 * Per-tool rules for splitting a payload into per-file findings and
 * rebuilding the aggregate. `reduce` must be pure and total.
 */
export interface ReducerStrategy {
  extract(payload: JsonValue, projectRoot: string): PerFileFindings;
  reduce(perFileFindings: PerFileFindings): JsonValue;
}

export type StrategyTable = Readonly<Record<string, ReducerStrategy>>;
