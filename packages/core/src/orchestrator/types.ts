/**
 * Orchestrator Types
 */

import type { CacheLookup } from '../cache/types.js';
import type { FailureRecord } from '../utils/errors.js';

export type TaskState = 'pending' | 'running' | 'succeeded' | 'failed' | 'cancelled' | 'skipped';

export type TerminalState = Exclude<TaskState, 'pending' | 'running'>;

/**
 * Cache in front of a task. A hit returns without executing; on a miss the
 * raw result goes through `store`, whose return value is what gets reported.
 * Without `lookup` the task always executes.
 */
export interface CacheGuard<T> {
  lookup?(): Promise<CacheLookup<T>>;
  store(raw: T): Promise<T>;
}

export interface OrchestratorTask<T> {
  name: string;
  execute(signal: AbortSignal): Promise<T>;
  cache?: CacheGuard<T>;
  /** Per-task limit; overrides the orchestrator default */
  timeoutMs?: number;
}

export interface RunOptions {
  /** Aborting cancels every pending and in-flight task */
  signal?: AbortSignal;
  /** Run-wide limit; on expiry behaves like an abort */
  timeoutMs?: number;
  /** Task names reported as skipped without running */
  exclude?: readonly string[];
  maxConcurrency?: number;
}

export interface ToolStatus {
  state: TaskState;
  durationMs: number;
  cached: boolean;
  startedAt?: string;
  finishedAt?: string;
  error?: FailureRecord;
}

export type TaskOutcome<T> =
  | { status: 'succeeded'; value: T; cached: boolean }
  | { status: 'failed'; error: FailureRecord }
  | { status: 'cancelled'; reason: string }
  | { status: 'skipped' };

export interface AuditRunResult<T> {
  runId: string;
  results: Record<string, TaskOutcome<T>>;
  statuses: Record<string, ToolStatus>;
  durationMs: number;
}
