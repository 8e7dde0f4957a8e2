/**
 * Concurrency control
 *
 * Counting semaphore used to cap how many analysis tools run at once.
 */

export class Semaphore {
  private permits: number;
  private waiting: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.permits = permits;
  }

  /**
   * Acquire a permit (waits if none available)
   */
  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  /**
   * Release a permit; hands it straight to the oldest waiter if any
   */
  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.permits++;
    }
  }

  available(): number {
    return this.permits;
  }

  waitingCount(): number {
    return this.waiting.length;
  }

  /**
   * Run `fn` while holding a permit
   */
  async use<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

/**
 * Run operations with controlled concurrency, preserving input order
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  operation: (item: T, index: number) => Promise<R>,
  maxConcurrent: number
): Promise<R[]> {
  const semaphore = new Semaphore(maxConcurrent);
  return Promise.all(items.map((item, index) => semaphore.use(() => operation(item, index))));
}
