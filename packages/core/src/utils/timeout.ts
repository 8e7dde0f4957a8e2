/**
 * Timeout and cancellation helpers
 *
 * Wraps async operations with timeout enforcement and abort-signal races
 * so a hanging analysis cannot stall an audit.
 */

import { OperationCancelledError, TimeoutError } from './errors.js';

export interface OperationContext {
  component: string;
  operation: string;
}

/**
 * Wrap an async function with a timeout. `onTimeout` runs before the
 * rejection, typically to abort the work that lost the race.
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  context: OperationContext,
  onTimeout?: () => void
): Promise<T> {
  const start = Date.now();
  let timer: ReturnType<typeof setTimeout> | undefined;

  try {
    return await Promise.race([
      fn(),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          onTimeout?.();
          reject(
            new TimeoutError(`Operation "${context.operation}" timed out after ${timeoutMs}ms`, {
              ...context,
              timeoutMs,
              elapsed: Date.now() - start,
            })
          );
        }, timeoutMs);
      }),
    ]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

/**
 * Settle with the promise, or reject with OperationCancelledError as soon
 * as the signal aborts
 */
export async function raceAbort<T>(
  promise: Promise<T>,
  signal: AbortSignal,
  context: OperationContext
): Promise<T> {
  let onAbort: (() => void) | undefined;

  try {
    return await Promise.race([
      promise,
      new Promise<never>((_, reject) => {
        onAbort = () => {
          reject(
            new OperationCancelledError(`Operation "${context.operation}" was cancelled`, {
              ...context,
              reason: abortReason(signal),
            })
          );
        };
        if (signal.aborted) {
          onAbort();
        } else {
          signal.addEventListener('abort', onAbort, { once: true });
        }
      }),
    ]);
  } finally {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * Create a controller that aborts when the parent does
 */
export function createLinkedController(parent?: AbortSignal): {
  controller: AbortController;
  dispose: () => void;
} {
  const controller = new AbortController();
  if (!parent) {
    return { controller, dispose: () => {} };
  }

  const forward = () => controller.abort(parent.reason);
  if (parent.aborted) {
    forward();
    return { controller, dispose: () => {} };
  }

  parent.addEventListener('abort', forward, { once: true });
  return {
    controller,
    dispose: () => parent.removeEventListener('abort', forward),
  };
}

export function abortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason.message;
  }
  return reason === undefined ? 'aborted' : String(reason);
}
