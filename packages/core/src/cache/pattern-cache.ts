/**
 * Pattern Cache
 *
 * Whole-payload cache for tools whose findings cannot be attributed to
 * single files. An entry stays valid while it is younger than `maxAgeMs`
 * and the files matched by the tool's dependency patterns still carry the
 * fingerprints recorded when it was stored.
 */

import { getLogger, type Logger } from '../utils/logger.js';
import { readJsonFile, removeFile, writeJsonAtomic } from '../utils/atomic-write.js';
import { fingerprintFiles, matchPatterns, DEFAULT_EXCLUDE_DIRS } from '../discovery/file-walker.js';
import {
  assertToolName,
  isValidToolName,
  listToolArtifacts,
  resolveCacheLayout,
  toolArtifactPath,
  type CacheLayout,
} from './layout.js';
import {
  CACHE_VERSION,
  patternArtifactSchema,
  type CacheLookup,
  type JsonValue,
  type PatternCacheEntry,
  type PatternCacheEntrySummary,
} from './types.js';

export const DEFAULT_PATTERN_MAX_AGE_MS = 60 * 60 * 1000; // 1 hour

export interface PatternCacheOptions {
  projectRoot: string;
  cacheDir?: string;
  maxAgeMs?: number;
  excludeDirs?: readonly string[];
  /** Root-relative ignore globs, e.g. the cache directory */
  ignore?: readonly string[];
  logger?: Logger;
  /** Epoch milliseconds */
  clock?: () => number;
}

function sameFingerprints(a: Record<string, string>, b: Record<string, string>): boolean {
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) {
    return false;
  }
  return aKeys.every((key) => Object.hasOwn(b, key) && a[key] === b[key]);
}

export class PatternCache {
  readonly layout: CacheLayout;
  readonly maxAgeMs: number;
  private excludeDirs: readonly string[];
  private ignore: readonly string[];
  private logger: Logger;
  private clock: () => number;

  constructor(options: PatternCacheOptions) {
    this.layout = resolveCacheLayout(options.projectRoot, options.cacheDir);
    this.maxAgeMs = options.maxAgeMs ?? DEFAULT_PATTERN_MAX_AGE_MS;
    this.excludeDirs = options.excludeDirs ?? DEFAULT_EXCLUDE_DIRS;
    this.ignore = options.ignore ?? [];
    this.logger = options.logger ?? getLogger('pattern-cache');
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Look up a tool's payload. Never throws; every failure is a miss.
   */
  async get(tool: string, patterns: readonly string[]): Promise<CacheLookup<JsonValue>> {
    if (!isValidToolName(tool)) {
      this.logger.warn('Pattern cache lookup with invalid tool name', { tool });
      return { hit: false, reason: 'missing' };
    }

    try {
      const artifactPath = this.artifactPath(tool);
      const result = await readJsonFile(artifactPath, patternArtifactSchema);

      if (!result.ok) {
        if (result.reason === 'corrupt') {
          this.logger.warn('Ignoring corrupt pattern cache entry', { tool, path: artifactPath, detail: result.detail });
        } else {
          this.logger.debug('No pattern cache entry', { tool });
        }
        return { hit: false, reason: result.reason };
      }

      const entry = result.value;
      if (entry.tool !== tool) {
        this.logger.warn('Ignoring pattern cache entry written for another tool', { tool, storedTool: entry.tool });
        return { hit: false, reason: 'corrupt' };
      }

      const ageMs = this.clock() - entry.timestamp;
      if (ageMs > this.maxAgeMs) {
        this.logger.debug('Pattern cache entry expired', { tool, ageMs });
        return { hit: false, reason: 'expired' };
      }

      const current = await this.dependencyFingerprints(patterns);
      if (!sameFingerprints(current, entry.dependencyFingerprints)) {
        this.logger.debug('Pattern cache dependencies changed', { tool });
        return { hit: false, reason: 'dependencies-changed' };
      }

      this.logger.info('Using cached result', { tool, ageMs });
      return { hit: true, value: entry.payload };
    } catch (error) {
      this.logger.warn('Pattern cache lookup failed', {
        tool,
        reason: error instanceof Error ? error.message : String(error),
      });
      return { hit: false, reason: 'corrupt' };
    }
  }

  /**
   * Store a fresh payload with the current dependency fingerprints
   */
  async put(tool: string, patterns: readonly string[], payload: JsonValue): Promise<void> {
    assertToolName(tool, 'PatternCache', 'put');

    const timestamp = this.clock();
    const entry: PatternCacheEntry = {
      version: CACHE_VERSION,
      tool,
      timestamp,
      createdAt: new Date(timestamp).toISOString(),
      dependencyFingerprints: await this.dependencyFingerprints(patterns),
      payload,
    };

    await writeJsonAtomic(this.artifactPath(tool), entry);
    this.logger.debug('Stored pattern cache entry', {
      tool,
      filesTracked: Object.keys(entry.dependencyFingerprints).length,
    });
  }

  async invalidate(tool: string): Promise<boolean> {
    assertToolName(tool, 'PatternCache', 'invalidate');
    const removed = await removeFile(this.artifactPath(tool));
    if (removed) {
      this.logger.info('Invalidated pattern cache entry', { tool });
    }
    return removed;
  }

  async clearAll(): Promise<number> {
    let cleared = 0;
    for (const tool of await listToolArtifacts(this.layout.patternsDir)) {
      if (await removeFile(this.artifactPath(tool))) {
        cleared++;
      }
    }
    this.logger.info('Cleared pattern cache', { cleared });
    return cleared;
  }

  async list(): Promise<PatternCacheEntrySummary[]> {
    const now = this.clock();
    const summaries: PatternCacheEntrySummary[] = [];

    for (const tool of await listToolArtifacts(this.layout.patternsDir)) {
      const result = await readJsonFile(this.artifactPath(tool), patternArtifactSchema);
      if (!result.ok) {
        continue;
      }
      const ageMs = now - result.value.timestamp;
      summaries.push({
        tool,
        createdAt: result.value.createdAt,
        ageMs,
        filesTracked: Object.keys(result.value.dependencyFingerprints).length,
        valid: ageMs <= this.maxAgeMs,
      });
    }
    return summaries;
  }

  private async dependencyFingerprints(patterns: readonly string[]): Promise<Record<string, string>> {
    const files = await matchPatterns(this.layout.projectRoot, patterns, this.excludeDirs, this.ignore);
    const fingerprints = await fingerprintFiles(this.layout.projectRoot, files, this.logger);
    return Object.fromEntries(fingerprints);
  }

  private artifactPath(tool: string): string {
    return toolArtifactPath(this.layout.patternsDir, tool);
  }
}
