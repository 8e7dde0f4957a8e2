/**
 * Tests for timeout and cancellation helpers
 */

import { describe, it, expect, vi } from 'vitest';
import { abortReason, createLinkedController, raceAbort, withTimeout } from '../timeout.js';
import { OperationCancelledError, TimeoutError } from '../errors.js';

const context = { component: 'Test', operation: 'work' };

describe('withTimeout', () => {
  it('should resolve with the operation result', async () => {
    await expect(withTimeout(async () => 'done', 1000, context)).resolves.toBe('done');
  });

  it('should reject with TimeoutError and call onTimeout', async () => {
    const onTimeout = vi.fn();
    const never = () => new Promise<string>(() => {});

    const error = await withTimeout(never, 10, context, onTimeout).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ code: 'TIMEOUT', timeoutMs: 10 });
    expect(onTimeout).toHaveBeenCalledTimes(1);
  });

  it('should propagate the operation error', async () => {
    await expect(
      withTimeout(
        async () => {
          throw new Error('inner');
        },
        1000,
        context
      )
    ).rejects.toThrow('inner');
  });
});

describe('raceAbort', () => {
  it('should reject immediately when already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('stop'));

    const error = await raceAbort(new Promise(() => {}), controller.signal, context).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(OperationCancelledError);
    expect(error).toMatchObject({ details: { reason: 'stop' } });
  });

  it('should reject when the signal aborts later', async () => {
    const controller = new AbortController();
    const pending = raceAbort(new Promise(() => {}), controller.signal, context);

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(OperationCancelledError);
  });

  it('should settle with the promise when not aborted', async () => {
    const controller = new AbortController();
    await expect(raceAbort(Promise.resolve(3), controller.signal, context)).resolves.toBe(3);
  });
});

describe('createLinkedController', () => {
  it('should abort the child with the parent reason', () => {
    const parent = new AbortController();
    const { controller } = createLinkedController(parent.signal);

    parent.abort('user');

    expect(controller.signal.aborted).toBe(true);
    expect(controller.signal.reason).toBe('user');
  });

  it('should start aborted when the parent already is', () => {
    const parent = new AbortController();
    parent.abort();

    expect(createLinkedController(parent.signal).controller.signal.aborted).toBe(true);
  });

  it('should stop forwarding after dispose', () => {
    const parent = new AbortController();
    const { controller, dispose } = createLinkedController(parent.signal);

    dispose();
    parent.abort();

    expect(controller.signal.aborted).toBe(false);
  });

  it('should not abort the parent when the child aborts', () => {
    const parent = new AbortController();
    const { controller } = createLinkedController(parent.signal);

    controller.abort();

    expect(parent.signal.aborted).toBe(false);
  });
});

describe('abortReason', () => {
  it('should describe the reason', () => {
    const withError = new AbortController();
    withError.abort(new Error('run timed out'));
    const withString = new AbortController();
    withString.abort('shutdown');

    expect(abortReason(withError.signal)).toBe('run timed out');
    expect(abortReason(withString.signal)).toBe('shutdown');
  });
});
