/**
 * Tests for TaskOrchestrator
 */

import { describe, it, expect, vi } from 'vitest';
import { TaskOrchestrator } from '../task-orchestrator.js';
import type { CacheGuard, OrchestratorTask } from '../types.js';
import { Logger } from '../../utils/logger.js';
import { ToolExecutionError } from '../../utils/errors.js';

const logger = new Logger({ enableConsole: false });

function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(new Error('aborted'));
      },
      { once: true }
    );
  });
}

function task(name: string, value: number, ms = 0): OrchestratorTask<number> {
  return {
    name,
    execute: vi.fn(async (signal: AbortSignal) => {
      await delay(ms, signal);
      return value;
    }),
  };
}

describe('TaskOrchestrator', () => {
  it('should run every task and collect results', async () => {
    const orchestrator = new TaskOrchestrator({ logger });

    const result = await orchestrator.run([task('a', 1, 10), task('b', 2), task('c', 3, 5)]);

    expect(result.results).toEqual({
      a: { status: 'succeeded', value: 1, cached: false },
      b: { status: 'succeeded', value: 2, cached: false },
      c: { status: 'succeeded', value: 3, cached: false },
    });
    expect(result.statuses.a?.state).toBe('succeeded');
    expect(typeof result.runId).toBe('string');
  });

  it('should run tasks concurrently', async () => {
    const orchestrator = new TaskOrchestrator({ logger });
    let inFlight = 0;
    let peak = 0;
    const tracked = (name: string): OrchestratorTask<number> => ({
      name,
      execute: async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await delay(20);
        inFlight--;
        return 0;
      },
    });

    await orchestrator.run([tracked('a'), tracked('b'), tracked('c')]);

    expect(peak).toBe(3);
  });

  it('should cap concurrency when asked', async () => {
    const orchestrator = new TaskOrchestrator({ logger });
    let inFlight = 0;
    let peak = 0;
    const tracked = (name: string): OrchestratorTask<number> => ({
      name,
      execute: async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await delay(10);
        inFlight--;
        return 0;
      },
    });

    await orchestrator.run([tracked('a'), tracked('b'), tracked('c'), tracked('d')], { maxConcurrency: 2 });

    expect(peak).toBe(2);
  });

  it('should keep the first of duplicate task names', async () => {
    const orchestrator = new TaskOrchestrator({ logger });
    const first = task('a', 1);
    const second = task('a', 2);

    const result = await orchestrator.run([first, second]);

    expect(result.results).toEqual({ a: { status: 'succeeded', value: 1, cached: false } });
    expect(second.execute).not.toHaveBeenCalled();
  });

  it('should report excluded tasks as skipped without running them', async () => {
    const orchestrator = new TaskOrchestrator({ logger });
    const skipped = task('b', 2);

    const result = await orchestrator.run([task('a', 1), skipped], { exclude: ['b'] });

    expect(result.results.b).toEqual({ status: 'skipped' });
    expect(result.statuses.b?.state).toBe('skipped');
    expect(skipped.execute).not.toHaveBeenCalled();
  });

  it('should isolate a failing task', async () => {
    const orchestrator = new TaskOrchestrator({ logger });
    const failing: OrchestratorTask<number> = {
      name: 'b',
      execute: async () => {
        throw new ToolExecutionError('exit 2', { tool: 'b', exitCode: 2 });
      },
    };

    const result = await orchestrator.run([task('a', 1, 5), failing, task('c', 3, 5)]);

    expect(result.results.a).toEqual({ status: 'succeeded', value: 1, cached: false });
    expect(result.results.b).toEqual({ status: 'failed', error: { name: 'b', message: 'exit 2', code: 'TOOL_FAILED' } });
    expect(result.results.c).toEqual({ status: 'succeeded', value: 3, cached: false });
    expect(result.statuses.b?.error?.code).toBe('TOOL_FAILED');
  });

  it('should fail a task that exceeds its timeout and abort its signal', async () => {
    const orchestrator = new TaskOrchestrator({ logger });
    let observed: AbortSignal | undefined;
    const slow: OrchestratorTask<number> = {
      name: 'slow',
      timeoutMs: 20,
      execute: async (signal) => {
        observed = signal;
        await delay(1000, signal);
        return 1;
      },
    };

    const result = await orchestrator.run([slow, task('fast', 2)]);

    expect(result.results.slow).toMatchObject({ status: 'failed', error: { code: 'TIMEOUT' } });
    expect(result.results.fast).toEqual({ status: 'succeeded', value: 2, cached: false });
    expect(observed?.aborted).toBe(true);
  });

  it('should apply the default task timeout', async () => {
    const orchestrator = new TaskOrchestrator({ logger, defaultTaskTimeoutMs: 20 });

    const result = await orchestrator.run([task('slow', 1, 1000)]);

    expect(result.results.slow).toMatchObject({ status: 'failed', error: { code: 'TIMEOUT' } });
  });

  it('should cancel unfinished tasks when the signal aborts', async () => {
    const orchestrator = new TaskOrchestrator({ logger });
    const controller = new AbortController();
    const signals: AbortSignal[] = [];
    const hanging = (name: string): OrchestratorTask<number> => ({
      name,
      execute: async (signal) => {
        signals.push(signal);
        await delay(5000, signal);
        return 0;
      },
    });

    setTimeout(() => controller.abort(new Error('user stop')), 20);
    const result = await orchestrator.run([task('quick', 1), hanging('a'), hanging('b')], {
      signal: controller.signal,
    });

    expect(result.results.quick).toEqual({ status: 'succeeded', value: 1, cached: false });
    expect(result.results.a).toEqual({ status: 'cancelled', reason: 'user stop' });
    expect(result.results.b).toEqual({ status: 'cancelled', reason: 'user stop' });
    expect(signals.every((signal) => signal.aborted)).toBe(true);
  });

  it('should cancel everything when the signal is already aborted', async () => {
    const orchestrator = new TaskOrchestrator({ logger });
    const controller = new AbortController();
    controller.abort('shutdown');
    const pending = task('a', 1);

    const result = await orchestrator.run([pending], { signal: controller.signal });

    expect(result.results.a).toEqual({ status: 'cancelled', reason: 'shutdown' });
    expect(pending.execute).not.toHaveBeenCalled();
  });

  it('should cancel unfinished tasks on the run-wide timeout', async () => {
    const orchestrator = new TaskOrchestrator({ logger });

    const result = await orchestrator.run([task('quick', 1), task('slow', 2, 5000)], { timeoutMs: 30 });

    expect(result.results.quick).toEqual({ status: 'succeeded', value: 1, cached: false });
    expect(result.results.slow).toEqual({ status: 'cancelled', reason: 'Audit run timed out after 30ms' });
  });

  describe('cache guard', () => {
    it('should return a hit without executing', async () => {
      const orchestrator = new TaskOrchestrator({ logger });
      const cached = task('a', 1);
      const store = vi.fn(async (raw: number) => raw);
      cached.cache = { lookup: async () => ({ hit: true, value: 42 }), store };

      const result = await orchestrator.run([cached]);

      expect(result.results.a).toEqual({ status: 'succeeded', value: 42, cached: true });
      expect(result.statuses.a?.cached).toBe(true);
      expect(cached.execute).not.toHaveBeenCalled();
      expect(store).not.toHaveBeenCalled();
    });

    it('should execute on a miss and report what store returns', async () => {
      const orchestrator = new TaskOrchestrator({ logger });
      const missed = task('a', 5);
      const guard: CacheGuard<number> = {
        lookup: async () => ({ hit: false, reason: 'expired' }),
        store: vi.fn(async (raw: number) => raw * 10),
      };
      missed.cache = guard;

      const result = await orchestrator.run([missed]);

      expect(result.results.a).toEqual({ status: 'succeeded', value: 50, cached: false });
      expect(guard.store).toHaveBeenCalledWith(5);
    });

    it('should always execute when the guard has no lookup', async () => {
      const orchestrator = new TaskOrchestrator({ logger });
      const storeOnly = task('a', 3);
      storeOnly.cache = { store: async (raw) => raw + 1 };

      const result = await orchestrator.run([storeOnly]);

      expect(result.results.a).toEqual({ status: 'succeeded', value: 4, cached: false });
      expect(storeOnly.execute).toHaveBeenCalledTimes(1);
    });

    it('should treat a failing lookup as a miss', async () => {
      const orchestrator = new TaskOrchestrator({ logger });
      const guarded = task('a', 7);
      guarded.cache = {
        lookup: async () => {
          throw new Error('unreadable');
        },
        store: async (raw) => raw,
      };

      const result = await orchestrator.run([guarded]);

      expect(result.results.a).toEqual({ status: 'succeeded', value: 7, cached: false });
    });

    it('should fail the task when store throws', async () => {
      const orchestrator = new TaskOrchestrator({ logger });
      const guarded = task('a', 7);
      guarded.cache = {
        store: async () => {
          throw new Error('disk full');
        },
      };

      const result = await orchestrator.run([guarded]);

      expect(result.results.a).toEqual({
        status: 'failed',
        error: { name: 'a', message: 'disk full', code: 'TOOL_FAILED' },
      });
    });

    it('should not store the result of a timed-out task', async () => {
      const orchestrator = new TaskOrchestrator({ logger });
      const store = vi.fn(async (raw: number) => raw);
      const stubborn: OrchestratorTask<number> = {
        name: 'stubborn',
        timeoutMs: 10,
        // ignores its signal
        execute: () => new Promise((resolve) => setTimeout(() => resolve(1), 40)),
        cache: { store },
      };

      const result = await orchestrator.run([stubborn]);
      await delay(60);

      expect(result.results.stubborn).toMatchObject({ status: 'failed', error: { code: 'TIMEOUT' } });
      expect(store).not.toHaveBeenCalled();
    });

    it('should finish a cache store under way before reporting the task cancelled', async () => {
      const orchestrator = new TaskOrchestrator({ logger });
      const controller = new AbortController();
      const events: string[] = [];
      const guarded: OrchestratorTask<number> = {
        name: 'guarded',
        execute: async () => 1,
        cache: {
          store: (raw) =>
            new Promise<number>((resolve) => {
              controller.abort('stop');
              setTimeout(() => {
                events.push('stored');
                resolve(raw);
              }, 20);
            }),
        },
      };

      const result = await orchestrator.run([guarded], { signal: controller.signal });
      events.push('reported');

      expect(result.results.guarded).toEqual({ status: 'cancelled', reason: 'stop' });
      expect(events).toEqual(['stored', 'reported']);
    });

    it('should finish a cache lookup under way before reporting the task cancelled', async () => {
      const orchestrator = new TaskOrchestrator({ logger });
      const controller = new AbortController();
      const events: string[] = [];
      const execute = vi.fn(async () => 1);
      const guarded: OrchestratorTask<number> = {
        name: 'guarded',
        execute,
        cache: {
          lookup: () =>
            new Promise((resolve) => {
              controller.abort('stop');
              setTimeout(() => {
                events.push('looked up');
                resolve({ hit: true, value: 2 });
              }, 20);
            }),
          store: async (raw) => raw,
        },
      };

      const result = await orchestrator.run([guarded], { signal: controller.signal });
      events.push('reported');

      expect(result.results.guarded).toMatchObject({ status: 'cancelled' });
      expect(events).toEqual(['looked up', 'reported']);
      expect(execute).not.toHaveBeenCalled();
    });
  });
});
