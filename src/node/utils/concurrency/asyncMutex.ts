/**
 * AsyncMutex - A FIFO mutual exclusion lock for async operations
 *
 * Only one holder at a time. Waiters are served strictly in arrival order:
 * release hands the lock directly to the next waiter, so a caller arriving
 * between release and wake-up cannot jump the queue.
 *
 * Example:
 * ```typescript
 * const mutex = new AsyncMutex();
 * const lock = await mutex.acquire();
 * try {
 *   // Critical section
 * } finally {
 *   lock.release();
 * }
 * ```
 */
export class AsyncMutex {
  private locked = false;
  private queue: Array<() => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  /** Number of callers waiting for the lock. */
  get pending(): number {
    return this.queue.length;
  }

  /**
   * Acquire the lock. Resolves once the caller holds it.
   */
  acquire(): Promise<AsyncMutexLock> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(new AsyncMutexLock(this));
    }

    return new Promise<AsyncMutexLock>((resolve) => {
      this.queue.push(() => resolve(new AsyncMutexLock(this)));
    });
  }

  /**
   * Run an operation while holding the lock.
   */
  async runExclusive<T>(operation: () => Promise<T>): Promise<T> {
    const lock = await this.acquire();
    try {
      return await operation();
    } finally {
      lock.release();
    }
  }

  /**
   * @internal - Should only be called by AsyncMutexLock
   */
  handOff(): void {
    const next = this.queue.shift();
    if (next) {
      // Lock stays held; ownership moves to the next waiter
      next();
    } else {
      this.locked = false;
    }
  }
}

/**
 * Lock handle. Releasing twice is a no-op.
 */
export class AsyncMutexLock {
  private released = false;

  constructor(private readonly mutex: AsyncMutex) {}

  release(): void {
    if (this.released) return;
    this.released = true;
    this.mutex.handOff();
  }
}
