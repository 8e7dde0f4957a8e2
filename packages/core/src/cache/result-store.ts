/**
 * Result Store
 *
 * Per-tool findings keyed by file, with the aggregate derived from them
 * through the tool's reducer strategy. Incremental runs merge fresh
 * findings for changed files into the stored map and re-reduce it, so the
 * aggregate always matches what a full run over the same files produces.
 */

import { ConfigError } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { readJsonFile, removeFile, writeJsonAtomic } from '../utils/atomic-write.js';
import {
  assertToolName,
  listToolArtifacts,
  resolveCacheLayout,
  toolArtifactPath,
  type CacheLayout,
} from './layout.js';
import {
  CACHE_VERSION,
  resultArtifactSchema,
  type JsonValue,
  type PerFileFindings,
  type ReducerStrategy,
  type StrategyTable,
  type ToolCacheEntry,
  type ToolCacheEntrySummary,
} from './types.js';

export interface ResultStoreOptions {
  projectRoot: string;
  cacheDir?: string;
  /** Reducer per file-decomposable tool */
  strategies: StrategyTable;
  logger?: Logger;
  now?: () => Date;
}

export class ResultStore {
  readonly layout: CacheLayout;
  private strategies: StrategyTable;
  private logger: Logger;
  private now: () => Date;

  constructor(options: ResultStoreOptions) {
    this.layout = resolveCacheLayout(options.projectRoot, options.cacheDir);
    this.strategies = options.strategies;
    this.logger = options.logger ?? getLogger('result-store');
    this.now = options.now ?? (() => new Date());
  }

  has(tool: string): boolean {
    return Object.hasOwn(this.strategies, tool);
  }

  /**
   * Reducer strategy for a tool; unknown tools are a configuration error
   */
  strategyFor(tool: string): ReducerStrategy {
    const strategy = this.has(tool) ? this.strategies[tool] : undefined;
    if (!strategy) {
      throw new ConfigError(`No reducer strategy registered for tool "${tool}"`, {
        component: 'ResultStore',
        operation: 'strategyFor',
        configKey: tool,
        recoveryHint: 'Register the tool as file-decomposable with a strategy, or use the pattern cache',
      });
    }
    return strategy;
  }

  /**
   * Load a tool's entry; missing or corrupt yields null
   */
  async load(tool: string): Promise<ToolCacheEntry | null> {
    assertToolName(tool, 'ResultStore', 'load');
    const artifactPath = this.artifactPath(tool);
    const result = await readJsonFile(artifactPath, resultArtifactSchema);

    if (!result.ok) {
      if (result.reason === 'corrupt') {
        this.logger.warn('Ignoring corrupt result cache entry', { tool, path: artifactPath, detail: result.detail });
      }
      return null;
    }

    if (result.value.tool !== tool) {
      this.logger.warn('Ignoring result cache entry written for another tool', {
        tool,
        storedTool: result.value.tool,
      });
      return null;
    }

    return result.value;
  }

  /**
   * Merge fresh findings for `changedFiles` into the stored map, drop
   * `removedFiles`, re-reduce, and persist. Returns the new aggregate.
   */
  async merge(
    tool: string,
    freshPerFileFindings: PerFileFindings,
    changedFiles: readonly string[],
    removedFiles: readonly string[]
  ): Promise<JsonValue> {
    this.strategyFor(tool);

    const stored = await this.load(tool);
    const merged: PerFileFindings = { ...(stored?.perFileFindings ?? {}) };

    for (const file of removedFiles) {
      delete merged[file];
    }

    for (const file of changedFiles) {
      const fresh = Object.hasOwn(freshPerFileFindings, file) ? freshPerFileFindings[file] : undefined;
      if (fresh && fresh.length > 0) {
        merged[file] = fresh;
      } else {
        delete merged[file];
      }
    }

    this.logger.debug('Merging findings', {
      tool,
      changed: changedFiles.length,
      removed: removedFiles.length,
      filesCached: Object.keys(merged).length,
    });

    return this.save(tool, merged);
  }

  /**
   * Replace a tool's entry wholesale. The aggregate defaults to the
   * reducer's output over `perFileFindings`.
   */
  async save(tool: string, perFileFindings: PerFileFindings, aggregate?: JsonValue): Promise<JsonValue> {
    assertToolName(tool, 'ResultStore', 'save');
    const strategy = this.strategyFor(tool);
    const finalAggregate = aggregate ?? strategy.reduce(perFileFindings);

    const entry: ToolCacheEntry = {
      version: CACHE_VERSION,
      tool,
      timestamp: this.now().toISOString(),
      perFileFindings,
      aggregate: finalAggregate,
    };

    await writeJsonAtomic(this.artifactPath(tool), entry);
    this.logger.debug('Saved result cache entry', { tool, filesCached: Object.keys(perFileFindings).length });
    return finalAggregate;
  }

  async invalidate(tool: string): Promise<boolean> {
    assertToolName(tool, 'ResultStore', 'invalidate');
    const removed = await removeFile(this.artifactPath(tool));
    if (removed) {
      this.logger.info('Invalidated result cache entry', { tool });
    }
    return removed;
  }

  /**
   * Delete every result artifact; returns how many were removed
   */
  async clearAll(): Promise<number> {
    let cleared = 0;
    for (const tool of await listToolArtifacts(this.layout.resultsDir)) {
      if (await removeFile(this.artifactPath(tool))) {
        cleared++;
      }
    }
    this.logger.info('Cleared result cache', { cleared });
    return cleared;
  }

  async list(): Promise<ToolCacheEntrySummary[]> {
    const summaries: ToolCacheEntrySummary[] = [];
    for (const tool of await listToolArtifacts(this.layout.resultsDir)) {
      const entry = await this.load(tool);
      if (!entry) {
        continue;
      }
      const lists = Object.values(entry.perFileFindings);
      summaries.push({
        tool,
        timestamp: entry.timestamp,
        filesCached: lists.length,
        findings: lists.reduce((sum, list) => sum + list.length, 0),
      });
    }
    return summaries;
  }

  private artifactPath(tool: string): string {
    return toolArtifactPath(this.layout.resultsDir, tool);
  }
}
