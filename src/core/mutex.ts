/**
 * Async Mutex & Semaphore
 *
 * Locking primitives for state shared between concurrent instance analyses.
 * - AsyncMutex: single-resource exclusive lock (cache fills, report reduction)
 * - AsyncSemaphore: counting semaphore for bounded concurrency (outbound LLM calls)
 */

/**
 * AsyncMutex: exclusive lock for async operations.
 * Only one holder at a time; others queue in FIFO order.
 */
export class AsyncMutex {
  private locked = false;
  private queue: Array<() => void> = [];

  /**
   * Acquire the lock. Returns a release function.
   */
  async acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return this.createRelease();
    }

    return new Promise<() => void>((resolve) => {
      this.queue.push(() => {
        resolve(this.createRelease());
      });
    });
  }

  /**
   * Run a function while holding the lock.
   */
  async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  get queueLength(): number {
    return this.queue.length;
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return; // Idempotent
      released = true;

      const next = this.queue.shift();
      if (next) {
        // Hand over in a microtask to avoid deep release chains
        queueMicrotask(next);
      } else {
        this.locked = false;
      }
    };
  }
}

/**
 * AsyncSemaphore: counting semaphore for bounded concurrency.
 */
export class AsyncSemaphore {
  private permits: number;
  private queue: Array<() => void> = [];

  constructor(maxPermits: number) {
    if (maxPermits < 1) throw new Error('Semaphore must have at least 1 permit');
    this.permits = maxPermits;
  }

  /**
   * Acquire a permit. Waits if none available.
   */
  async acquire(): Promise<() => void> {
    if (this.permits > 0) {
      this.permits--;
      return this.createRelease();
    }

    return new Promise<() => void>((resolve) => {
      this.queue.push(() => {
        resolve(this.createRelease());
      });
    });
  }

  /**
   * Run a function while holding a permit.
   */
  async withPermit<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.queue.shift();
      if (next) {
        queueMicrotask(next);
      } else {
        this.permits++;
      }
    };
  }
}
