/**
 * Tests for ProjectLock
 */

import { describe, it, expect } from 'vitest';
import { ProjectLock, getProjectLock } from '../project-lock.js';
import { LockTimeoutError } from '../errors.js';

describe('ProjectLock', () => {
  it('should serialize holders of the same root in arrival order', async () => {
    const lock = new ProjectLock();
    const order: string[] = [];

    const task = (label: string, delay: number) =>
      lock.withLock('/repo', 1000, async () => {
        order.push(`${label}:start`);
        await new Promise((resolve) => setTimeout(resolve, delay));
        order.push(`${label}:end`);
      });

    await Promise.all([task('a', 20), task('b', 0), task('c', 0)]);

    expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
    expect(lock.isLocked('/repo')).toBe(false);
  });

  it('should treat equivalent paths as one key', async () => {
    const lock = new ProjectLock();
    const release = await lock.acquire('/repo/sub/..', 100);

    expect(lock.isLocked('/repo')).toBe(true);
    release();
    expect(lock.isLocked('/repo')).toBe(false);
  });

  it('should not block different roots', async () => {
    const lock = new ProjectLock();
    const releaseA = await lock.acquire('/repo-a', 100);
    const releaseB = await lock.acquire('/repo-b', 100);

    expect(lock.isLocked('/repo-a')).toBe(true);
    expect(lock.isLocked('/repo-b')).toBe(true);
    releaseA();
    releaseB();
  });

  it('should time out a waiter with LockTimeoutError', async () => {
    const lock = new ProjectLock();
    const release = await lock.acquire('/repo', 100);

    const error = await lock.acquire('/repo', 10).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(LockTimeoutError);
    release();
    expect(lock.isLocked('/repo')).toBe(false);
  });

  it('should ignore a second release call', async () => {
    const lock = new ProjectLock();
    const first = await lock.acquire('/repo', 100);
    first();
    const second = await lock.acquire('/repo', 100);

    first();

    expect(lock.isLocked('/repo')).toBe(true);
    second();
  });

  it('should release the lock when the callback throws', async () => {
    const lock = new ProjectLock();

    await expect(
      lock.withLock('/repo', 100, async () => {
        throw new Error('fail');
      })
    ).rejects.toThrow('fail');
    expect(lock.isLocked('/repo')).toBe(false);
  });

  it('should share one process-wide instance', () => {
    expect(getProjectLock()).toBe(getProjectLock());
  });
});
