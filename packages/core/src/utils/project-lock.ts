/**
 * Per-project write lock
 *
 * Serializes audits and cache clears that target the same project root
 * within one process. Waiters are served in arrival order; a waiter that
 * exceeds its bound gives up with LockTimeoutError.
 */

import { resolve } from 'node:path';
import { LockTimeoutError } from './errors.js';

interface Waiter {
  grant: () => void;
}

interface LockState {
  queue: Waiter[];
}

export type ReleaseLock = () => void;

export class ProjectLock {
  private locks = new Map<string, LockState>();

  /**
   * Acquire the lock for `projectRoot`, waiting at most `timeoutMs`
   */
  async acquire(projectRoot: string, timeoutMs: number): Promise<ReleaseLock> {
    const key = resolve(projectRoot);
    const held = this.locks.get(key);

    if (!held) {
      this.locks.set(key, { queue: [] });
      return this.releaser(key);
    }

    const start = Date.now();
    return new Promise<ReleaseLock>((resolvePromise, reject) => {
      const waiter: Waiter = {
        grant: () => {
          clearTimeout(timer);
          resolvePromise(this.releaser(key));
        },
      };
      const timer = setTimeout(() => {
        const index = held.queue.indexOf(waiter);
        if (index >= 0) {
          held.queue.splice(index, 1);
        }
        reject(
          new LockTimeoutError(`Timed out after ${timeoutMs}ms waiting for the lock on ${key}`, {
            lockKey: key,
            waitedMs: Date.now() - start,
          })
        );
      }, timeoutMs);
      held.queue.push(waiter);
    });
  }

  /**
   * Run `fn` while holding the lock for `projectRoot`
   */
  async withLock<T>(projectRoot: string, timeoutMs: number, fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire(projectRoot, timeoutMs);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(projectRoot: string): boolean {
    return this.locks.has(resolve(projectRoot));
  }

  private releaser(key: string): ReleaseLock {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;

      const state = this.locks.get(key);
      const next = state?.queue.shift();
      if (next) {
        next.grant();
      } else {
        this.locks.delete(key);
      }
    };
  }
}

let sharedLock: ProjectLock | null = null;

/**
 * Process-wide lock shared by every coordinator
 */
export function getProjectLock(): ProjectLock {
  if (!sharedLock) {
    sharedLock = new ProjectLock();
  }
  return sharedLock;
}
