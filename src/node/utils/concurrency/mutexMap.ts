import { AsyncMutex } from "./asyncMutex";

export interface KeyLock {
  /** Idempotent. */
  release(): void;
}

/**
 * Per-key FIFO locks built on AsyncMutex.
 *
 * Calls for the same key (a model id, a session id) run one at a time in
 * arrival order; different keys never wait on each other. A key's mutex is
 * dropped once nobody holds or waits on it.
 *
 * ```typescript
 * const lifecycleLocks = new MutexMap<string>();
 * await lifecycleLocks.withLock(modelId, () => orchestrator.spawn(modelId));
 * ```
 */
export class MutexMap<K> {
  private readonly mutexes = new Map<K, AsyncMutex>();

  /** True while an operation holds the key. */
  isLocked(key: K): boolean {
    return this.mutexes.get(key)?.isLocked ?? false;
  }

  /**
   * Hold the key until release(). For locks that outlive a single call,
   * such as one held while a stream is consumed.
   */
  async acquire(key: K): Promise<KeyLock> {
    let mutex = this.mutexes.get(key);
    if (!mutex) {
      mutex = new AsyncMutex();
      this.mutexes.set(key, mutex);
    }
    const held = mutex;
    const lock = await held.acquire();

    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        lock.release();
        if (!held.isLocked && this.mutexes.get(key) === held) {
          this.mutexes.delete(key);
        }
      },
    };
  }

  async withLock<T>(key: K, operation: () => Promise<T>): Promise<T> {
    const lock = await this.acquire(key);
    try {
      return await operation();
    } finally {
      lock.release();
    }
  }
}
