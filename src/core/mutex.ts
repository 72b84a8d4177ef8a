/**
 * Async Mutex Primitives
 *
 * - AsyncMutex: single-resource exclusive lock
 * - KeyedMutex: one AsyncMutex per key (user id, strategy name), created on
 *   demand and dropped once nobody holds or waits for it
 */

/**
 * AsyncMutex — Exclusive lock for async operations.
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
        // Hand over in a microtask to avoid deep synchronous chains
        queueMicrotask(next);
      } else {
        this.locked = false;
      }
    };
  }
}

/**
 * KeyedMutex — serializes work per key while letting different keys run
 * concurrently.
 */
export class KeyedMutex<K = string> {
  private locks: Map<K, { mutex: AsyncMutex; holders: number }> = new Map();

  async withLock<T>(key: K, fn: () => T | Promise<T>): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { mutex: new AsyncMutex(), holders: 0 };
      this.locks.set(key, entry);
    }
    entry.holders++;

    try {
      return await entry.mutex.withLock(fn);
    } finally {
      entry.holders--;
      if (entry.holders === 0) {
        this.locks.delete(key);
      }
    }
  }

  isLocked(key: K): boolean {
    return this.locks.get(key)?.mutex.isLocked ?? false;
  }

  /** Number of keys currently held or waited on. */
  get size(): number {
    return this.locks.size;
  }
}
