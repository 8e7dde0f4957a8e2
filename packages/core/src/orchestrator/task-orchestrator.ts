/**
 * Task Orchestrator
 *
 * Fans a set of named tasks out concurrently and waits for all of them.
 * Each task fails in isolation: a throw, a rejection, or a per-task timeout
 * marks only that task failed. Aborting the run (signal or run-wide
 * timeout) aborts every in-flight task's signal and reports the unfinished
 * tasks as cancelled.
 */

import { OperationCancelledError, TimeoutError, toFailureRecord, toError } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';
import { Semaphore } from '../utils/concurrency.js';
import { abortReason, createLinkedController, raceAbort, withTimeout } from '../utils/timeout.js';
import { AuditRun } from './audit-run.js';
import type { CacheLookup } from '../cache/types.js';
import type { AuditRunResult, OrchestratorTask, RunOptions, TaskOutcome } from './types.js';

const COMPONENT = 'TaskOrchestrator';

/** Cache lookup or store currently running for a task; either may write */
interface InFlightCacheOp {
  pending?: Promise<unknown>;
}

export interface TaskOrchestratorOptions {
  logger?: Logger;
  /** Per-task timeout for tasks that declare none; unset means unbounded */
  defaultTaskTimeoutMs?: number;
}

export class TaskOrchestrator {
  private logger: Logger;
  private defaultTaskTimeoutMs?: number;

  constructor(options: TaskOrchestratorOptions = {}) {
    this.logger = options.logger ?? getLogger('orchestrator');
    this.defaultTaskTimeoutMs = options.defaultTaskTimeoutMs;
  }

  async run<T>(tasks: readonly OrchestratorTask<T>[], options: RunOptions = {}): Promise<AuditRunResult<T>> {
    const start = performance.now();

    const unique = new Map<string, OrchestratorTask<T>>();
    for (const task of tasks) {
      if (unique.has(task.name)) {
        this.logger.warn('Duplicate task ignored', { task: task.name });
        continue;
      }
      unique.set(task.name, task);
    }

    const run = new AuditRun([...unique.keys()], { logger: this.logger.child('run') });
    const group = this.logger.group(`audit run ${run.id}`);
    const results: Record<string, TaskOutcome<T>> = {};

    const excluded = new Set(options.exclude ?? []);
    const scheduled: OrchestratorTask<T>[] = [];
    for (const task of unique.values()) {
      if (excluded.has(task.name)) {
        run.transition(task.name, 'skipped');
        results[task.name] = { status: 'skipped' };
      } else {
        scheduled.push(task);
      }
    }

    const { controller, dispose } = createLinkedController(options.signal);
    const runTimeoutMs = options.timeoutMs;
    const runTimer =
      runTimeoutMs !== undefined
        ? setTimeout(() => {
            this.logger.warn('Run timed out, cancelling unfinished tasks', { runId: run.id, timeoutMs: runTimeoutMs });
            controller.abort(
              new TimeoutError(`Audit run timed out after ${runTimeoutMs}ms`, {
                component: COMPONENT,
                operation: 'run',
                timeoutMs: runTimeoutMs,
                elapsed: Math.round(performance.now() - start),
              })
            );
          }, runTimeoutMs)
        : undefined;

    const semaphore = options.maxConcurrency !== undefined ? new Semaphore(options.maxConcurrency) : null;

    try {
      await Promise.all(
        scheduled.map(async (task) => {
          const outcome = await this.runTask(task, run, controller.signal, semaphore);
          results[task.name] = outcome;
          group.addOperation(task.name, run.status(task.name).durationMs, outcome.status === 'succeeded');
        })
      );
    } finally {
      if (runTimer) {
        clearTimeout(runTimer);
      }
      dispose();
    }

    group.end(!controller.signal.aborted);

    return {
      runId: run.id,
      results,
      statuses: run.snapshot(),
      durationMs: Math.round(performance.now() - start),
    };
  }

  private async runTask<T>(
    task: OrchestratorTask<T>,
    run: AuditRun,
    runSignal: AbortSignal,
    semaphore: Semaphore | null
  ): Promise<TaskOutcome<T>> {
    if (semaphore) {
      await semaphore.acquire();
    }

    try {
      if (runSignal.aborted) {
        run.transition(task.name, 'cancelled');
        return { status: 'cancelled', reason: abortReason(runSignal) };
      }

      run.transition(task.name, 'running');
      const { controller, dispose } = createLinkedController(runSignal);
      const inFlight: InFlightCacheOp = {};

      try {
        const { value, cached } = await raceAbort(this.execute(task, controller, inFlight), runSignal, {
          component: COMPONENT,
          operation: task.name,
        });
        run.transition(task.name, 'succeeded', { cached });
        this.logger.debug('Task succeeded', { task: task.name, cached });
        return { status: 'succeeded', value, cached };
      } catch (error) {
        if (runSignal.aborted) {
          // Cache writes already under way finish before the run reports back
          if (inFlight.pending) {
            await Promise.allSettled([inFlight.pending]);
          }
          run.transition(task.name, 'cancelled');
          this.logger.info('Task cancelled', { task: task.name });
          return { status: 'cancelled', reason: abortReason(runSignal) };
        }

        const failure = toFailureRecord(task.name, error);
        run.transition(task.name, 'failed', { error: failure });
        this.logger.error('Task failed', toError(error), { task: task.name, code: failure.code });
        return { status: 'failed', error: failure };
      } finally {
        dispose();
      }
    } finally {
      semaphore?.release();
    }
  }

  /**
   * Cache lookup, then execution under the task timeout, then cache store
   */
  private async execute<T>(
    task: OrchestratorTask<T>,
    controller: AbortController,
    inFlight: InFlightCacheOp
  ): Promise<{ value: T; cached: boolean }> {
    const guard = task.cache;
    const lookupFn = guard?.lookup;
    if (guard && lookupFn) {
      const looking = this.lookup(task.name, () => lookupFn.call(guard));
      inFlight.pending = looking;
      const lookup = await looking;
      inFlight.pending = undefined;
      if (lookup.hit) {
        return { value: lookup.value, cached: true };
      }
    }

    const signal = controller.signal;
    const timeoutMs = task.timeoutMs ?? this.defaultTaskTimeoutMs;
    const raw =
      timeoutMs !== undefined
        ? await withTimeout(() => task.execute(signal), timeoutMs, { component: COMPONENT, operation: task.name }, () =>
            controller.abort(new Error(`Task "${task.name}" timed out after ${timeoutMs}ms`))
          )
        : await task.execute(signal);

    // A late result from an abandoned task must not reach the cache
    if (signal.aborted) {
      throw new OperationCancelledError(`Task "${task.name}" was cancelled`, {
        component: COMPONENT,
        operation: task.name,
        reason: abortReason(signal),
      });
    }

    if (!guard) {
      return { value: raw, cached: false };
    }
    const storing = guard.store(raw);
    inFlight.pending = storing;
    return { value: await storing, cached: false };
  }

  /**
   * Lookup errors count as a miss
   */
  private async lookup<T>(name: string, lookup: () => Promise<CacheLookup<T>>): Promise<CacheLookup<T>> {
    try {
      const result = await lookup();
      if (!result.hit) {
        this.logger.debug('Cache miss', { task: name, reason: result.reason });
      }
      return result;
    } catch (error) {
      this.logger.warn('Cache lookup failed, executing task', {
        task: name,
        reason: error instanceof Error ? error.message : String(error),
      });
      return { hit: false, reason: 'corrupt' };
    }
  }
}
