/**
 * Incremental Coordinator
 *
 * Runs an audit end to end: scan and diff the project, pick full or
 * incremental mode, build one cache-guarded orchestrator task per tool, run
 * them, then commit the new fingerprint index. File-decomposable tools
 * re-analyze only changed files and merge the fresh findings into their
 * stored per-file map; whole-project tools are served from the pattern
 * cache while their dependencies are unchanged.
 */

import { getLogger, type Logger } from '../utils/logger.js';
import { getProjectLock, type ProjectLock } from '../utils/project-lock.js';
import type { FailureRecord } from '../utils/errors.js';
import { FingerprintIndex } from '../cache/fingerprint-index.js';
import { ResultStore } from '../cache/result-store.js';
import { PatternCache, DEFAULT_PATTERN_MAX_AGE_MS } from '../cache/pattern-cache.js';
import { assertToolName } from '../cache/layout.js';
import { changedFiles, hasChanges, summarizeChangeSet, type ChangeSetSummary } from '../cache/change-set.js';
import type { ChangeSet, JsonValue, PerFileFindings } from '../cache/types.js';
import { TaskOrchestrator } from '../orchestrator/task-orchestrator.js';
import type { CacheGuard, OrchestratorTask, ToolStatus } from '../orchestrator/types.js';
import type { FileDecomposableTool, ToolDefinition, ToolRegistry, WholeProjectTool } from './tool-registry.js';

export const DEFAULT_TOOL_TIMEOUT_MS = 300_000; // 5 minutes
export const DEFAULT_LOCK_TIMEOUT_MS = 30_000;

export type AuditMode = 'full' | 'incremental';

export interface IncrementalCoordinatorOptions {
  projectRoot: string;
  registry: ToolRegistry;
  /** Relative to the project root (default: .audit) */
  cacheDir?: string;
  includeExtensions?: readonly string[];
  extraExcludeDirs?: readonly string[];
  patternMaxAgeMs?: number;
  /** Default per-tool timeout; a tool's own `timeoutMs` wins */
  toolTimeoutMs?: number;
  /** Default run-wide limit; unset means unbounded */
  runTimeoutMs?: number;
  maxConcurrency?: number;
  lockTimeoutMs?: number;
  lock?: ProjectLock;
  logger?: Logger;
  /** Epoch milliseconds */
  clock?: () => number;
}

export interface AuditOptions {
  /** Re-run every tool over the whole project */
  forceFull?: boolean;
  signal?: AbortSignal;
  /** Run-wide limit */
  timeoutMs?: number;
  /** Tools reported as skipped */
  exclude?: readonly string[];
  maxConcurrency?: number;
}

export type ToolResult =
  | { status: 'succeeded'; payload: JsonValue; cached: boolean }
  | { status: 'failed'; error: FailureRecord }
  | { status: 'cancelled'; reason: string }
  | { status: 'skipped' };

export interface AuditResult {
  runId: string;
  mode: AuditMode;
  perToolResult: Record<string, ToolResult>;
  perToolDurationMs: Record<string, number>;
  perToolStatus: Record<string, ToolStatus>;
  changeSetSummary: ChangeSetSummary;
  durationMs: number;
}

export interface ToolCacheStats {
  tool: string;
  store: 'result' | 'pattern';
  timestamp: string;
  ageMs: number;
  filesCached: number;
  valid: boolean;
}

export interface CoordinatorStats {
  projectRoot: string;
  cacheRoot: string;
  trackedFiles: number;
  lastUpdated: string | null;
  tools: ToolCacheStats[];
}

interface AuditPlan {
  mode: AuditMode;
  changeSet: ChangeSet;
  changed: string[];
  /** Files the index tracks; findings elsewhere are never stored */
  scanned: ReadonlySet<string>;
}

/**
 * Keep only findings on files the fingerprint index tracks, so a full run
 * and an incremental run store the same domain
 */
function restrictToScanned(perFile: PerFileFindings, scanned: ReadonlySet<string>): PerFileFindings {
  const kept: PerFileFindings = {};
  for (const [file, findings] of Object.entries(perFile)) {
    if (scanned.has(file)) {
      kept[file] = findings;
    }
  }
  return kept;
}

export class IncrementalCoordinator {
  readonly index: FingerprintIndex;
  readonly resultStore: ResultStore;
  readonly patternCache: PatternCache;
  private registry: ToolRegistry;
  private orchestrator: TaskOrchestrator;
  private lock: ProjectLock;
  private lockTimeoutMs: number;
  private maxConcurrency?: number;
  private runTimeoutMs?: number;
  private logger: Logger;
  private clock: () => number;

  constructor(options: IncrementalCoordinatorOptions) {
    this.logger = options.logger ?? getLogger('incremental');
    this.clock = options.clock ?? Date.now;
    this.registry = options.registry;
    this.lock = options.lock ?? getProjectLock();
    this.lockTimeoutMs = options.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
    this.maxConcurrency = options.maxConcurrency;
    this.runTimeoutMs = options.runTimeoutMs;

    this.index = new FingerprintIndex({
      projectRoot: options.projectRoot,
      cacheDir: options.cacheDir,
      includeExtensions: options.includeExtensions,
      extraExcludeDirs: options.extraExcludeDirs,
      logger: this.logger.child('index'),
      now: () => new Date(this.clock()),
    });
    this.resultStore = new ResultStore({
      projectRoot: options.projectRoot,
      cacheDir: options.cacheDir,
      strategies: this.registry.strategies(),
      logger: this.logger.child('results'),
      now: () => new Date(this.clock()),
    });
    this.patternCache = new PatternCache({
      projectRoot: options.projectRoot,
      cacheDir: options.cacheDir,
      maxAgeMs: options.patternMaxAgeMs ?? DEFAULT_PATTERN_MAX_AGE_MS,
      excludeDirs: this.index.excludeDirs,
      ignore: this.index.ignoreGlobs,
      logger: this.logger.child('patterns'),
      clock: this.clock,
    });
    this.orchestrator = new TaskOrchestrator({
      logger: this.logger.child('orchestrator'),
      defaultTaskTimeoutMs: options.toolTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS,
    });
  }

  get projectRoot(): string {
    return this.index.layout.projectRoot;
  }

  /**
   * Run the given tools (default: every registered tool)
   */
  async runAudit(tools?: readonly string[], options: AuditOptions = {}): Promise<AuditResult> {
    const toolNames = [...new Set(tools ?? this.registry.names())];
    const definitions = toolNames.map((name) => this.registry.get(name));

    return this.lock.withLock(this.projectRoot, this.lockTimeoutMs, async () => {
      const start = this.clock();

      const current = await this.logger.timed('scan', () => this.index.scan(), { root: this.projectRoot });
      const previous = await this.index.load();
      const changeSet = this.index.diff(current, previous);
      const mode: AuditMode = previous === null || options.forceFull ? 'full' : 'incremental';
      const plan: AuditPlan = {
        mode,
        changeSet,
        changed: changedFiles(changeSet),
        scanned: new Set(current.keys()),
      };
      const changeSetSummary = summarizeChangeSet(changeSet);

      this.logger.info('Starting audit', {
        mode,
        tools: toolNames.length,
        changes: changeSetSummary.description,
      });

      const run = await this.orchestrator.run(
        definitions.map((definition) => this.buildTask(definition, plan)),
        {
          signal: options.signal,
          timeoutMs: options.timeoutMs ?? this.runTimeoutMs,
          exclude: options.exclude,
          maxConcurrency: options.maxConcurrency ?? this.maxConcurrency,
        }
      );

      await this.invalidateStaleResults(run.results, plan);
      await this.index.commit(current);

      const perToolResult: Record<string, ToolResult> = {};
      const perToolDurationMs: Record<string, number> = {};
      for (const [name, outcome] of Object.entries(run.results)) {
        perToolResult[name] =
          outcome.status === 'succeeded'
            ? { status: 'succeeded', payload: outcome.value, cached: outcome.cached }
            : outcome;
        perToolDurationMs[name] = run.statuses[name]?.durationMs ?? 0;
      }

      const durationMs = this.clock() - start;
      this.logger.info('Audit finished', { runId: run.runId, mode, durationMs });

      return {
        runId: run.runId,
        mode,
        perToolResult,
        perToolDurationMs,
        perToolStatus: run.statuses,
        changeSetSummary,
        durationMs,
      };
    });
  }

  /**
   * Remove one tool's result and pattern artifacts, or every artifact
   * including the index. Returns the number of files removed.
   */
  async clearCache(tool?: string): Promise<number> {
    return this.lock.withLock(this.projectRoot, this.lockTimeoutMs, async () => {
      if (tool !== undefined) {
        assertToolName(tool, 'IncrementalCoordinator', 'clearCache');
        const removed = [await this.resultStore.invalidate(tool), await this.patternCache.invalidate(tool)];
        return removed.filter(Boolean).length;
      }

      const results = await this.resultStore.clearAll();
      const patterns = await this.patternCache.clearAll();
      const index = (await this.index.clear()) ? 1 : 0;
      return results + patterns + index;
    });
  }

  async stats(): Promise<CoordinatorStats> {
    const now = this.clock();
    const indexStats = await this.index.stats();

    const results: ToolCacheStats[] = (await this.resultStore.list()).map((entry) => ({
      tool: entry.tool,
      store: 'result',
      timestamp: entry.timestamp,
      ageMs: Math.max(0, now - Date.parse(entry.timestamp)),
      filesCached: entry.filesCached,
      valid: true,
    }));
    const patterns: ToolCacheStats[] = (await this.patternCache.list()).map((entry) => ({
      tool: entry.tool,
      store: 'pattern',
      timestamp: entry.createdAt,
      ageMs: entry.ageMs,
      filesCached: entry.filesTracked,
      valid: entry.valid,
    }));

    return {
      projectRoot: this.projectRoot,
      cacheRoot: this.index.layout.cacheRoot,
      trackedFiles: indexStats.trackedFiles,
      lastUpdated: indexStats.lastUpdated,
      tools: [...results, ...patterns],
    };
  }

  private buildTask(definition: ToolDefinition, plan: AuditPlan): OrchestratorTask<JsonValue> {
    return definition.kind === 'file-decomposable'
      ? this.buildDecomposableTask(definition, plan)
      : this.buildWholeProjectTask(definition, plan);
  }

  private buildDecomposableTask(tool: FileDecomposableTool, plan: AuditPlan): OrchestratorTask<JsonValue> {
    const { name, strategy } = tool;
    const { changeSet, changed } = plan;
    const projectRoot = this.projectRoot;

    // Decided by the lookup: merge a changed subset into the stored entry,
    // or analyze everything and replace it
    let subset = false;

    const cache: CacheGuard<JsonValue> = {
      store: async (raw) => {
        const extracted = strategy.extract(raw, projectRoot);
        const perFile = restrictToScanned(extracted, plan.scanned);
        const outside = Object.keys(extracted).length - Object.keys(perFile).length;
        if (outside > 0) {
          this.logger.debug('Ignoring findings on untracked files', { tool: name, files: outside });
        }
        return subset
          ? this.resultStore.merge(name, perFile, changed, changeSet.removed)
          : this.resultStore.save(name, perFile);
      },
    };

    if (plan.mode === 'incremental') {
      cache.lookup = async () => {
        const stored = await this.resultStore.load(name);
        if (!stored) {
          this.logger.info('No stored results, analyzing whole project', { tool: name });
          return { hit: false, reason: 'missing' };
        }

        if (changed.length === 0) {
          const value =
            changeSet.removed.length > 0
              ? await this.resultStore.merge(name, {}, [], changeSet.removed)
              : stored.aggregate;
          return { hit: true, value };
        }

        subset = tool.honorsFileSubset !== false;
        this.logger.info('Re-analyzing changed files', {
          tool: name,
          files: subset ? changed.length : 'all',
        });
        return { hit: false, reason: 'dependencies-changed' };
      };
    }

    return {
      name,
      timeoutMs: tool.timeoutMs,
      cache,
      execute: (signal) => tool.analyze(subset ? { projectRoot, files: changed, signal } : { projectRoot, signal }),
    };
  }

  private buildWholeProjectTask(tool: WholeProjectTool, plan: AuditPlan): OrchestratorTask<JsonValue> {
    const { name, patterns } = tool;
    const projectRoot = this.projectRoot;
    const task: OrchestratorTask<JsonValue> = {
      name,
      timeoutMs: tool.timeoutMs,
      execute: (signal) => tool.analyze({ projectRoot, signal }),
    };

    if (patterns) {
      const cache: CacheGuard<JsonValue> = {
        store: async (raw) => {
          await this.patternCache.put(name, patterns, raw);
          return raw;
        },
      };
      if (plan.mode === 'incremental') {
        cache.lookup = () => this.patternCache.get(name, patterns);
      }
      task.cache = cache;
    }

    return task;
  }

  /**
   * After the index moves forward, a stored entry is only trustworthy for
   * tools that succeeded in this run. Failed or cancelled tools always lose
   * theirs; skipped and unrequested tools lose theirs when files changed.
   */
  private async invalidateStaleResults(
    results: Record<string, { status: string }>,
    plan: AuditPlan
  ): Promise<void> {
    const changed = hasChanges(plan.changeSet);

    for (const definition of this.registry.list()) {
      if (definition.kind !== 'file-decomposable') {
        continue;
      }
      const status = results[definition.name]?.status;
      const stale = status === 'failed' || status === 'cancelled' || (status !== 'succeeded' && changed);
      if (stale && (await this.resultStore.invalidate(definition.name))) {
        this.logger.info('Dropped stale results', { tool: definition.name, status: status ?? 'not run' });
      }
    }
  }
}
