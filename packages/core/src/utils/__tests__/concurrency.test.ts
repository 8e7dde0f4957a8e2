/**
 * Tests for Semaphore and runWithConcurrency
 */

import { describe, it, expect } from 'vitest';
import { Semaphore, runWithConcurrency } from '../concurrency.js';

describe('Semaphore', () => {
  it('should reject fewer than one permit', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
    expect(() => new Semaphore(1.5)).toThrow(RangeError);
  });

  it('should queue acquirers once permits run out', async () => {
    const semaphore = new Semaphore(1);
    await semaphore.acquire();

    let granted = false;
    const waiting = semaphore.acquire().then(() => {
      granted = true;
    });

    expect(semaphore.available()).toBe(0);
    expect(semaphore.waitingCount()).toBe(1);
    expect(granted).toBe(false);

    semaphore.release();
    await waiting;

    expect(granted).toBe(true);
    expect(semaphore.available()).toBe(0);

    semaphore.release();
    expect(semaphore.available()).toBe(1);
  });

  it('should release the permit when use throws', async () => {
    const semaphore = new Semaphore(2);

    await expect(
      semaphore.use(async () => {
        throw new Error('fail');
      })
    ).rejects.toThrow('fail');
    expect(semaphore.available()).toBe(2);
  });
});

describe('runWithConcurrency', () => {
  it('should cap in-flight operations and keep order', async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await runWithConcurrency(
      [30, 10, 20, 5, 15],
      async (delay, index) => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, delay));
        inFlight--;
        return index * 2;
      },
      2
    );

    expect(results).toEqual([0, 2, 4, 6, 8]);
    expect(peak).toBe(2);
  });
});
