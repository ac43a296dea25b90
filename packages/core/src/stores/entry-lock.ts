/**
 * Interface for serializing work on a single cache entry
 */
export interface EntryLock {
  /**
   * Run a task while holding the exclusive lock for a cache key.
   * Tasks for the same key run one after another in call order; tasks for
   * different keys do not wait on each other.
   * @param key The cache key of the entry
   * @param task The work to perform while the lock is held
   * @returns The task's result; the lock is released whether it resolves or rejects
   */
  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T>;

  /**
   * Check whether a task currently holds or waits for the lock
   * @param key The cache key of the entry
   */
  isLocked(key: string): boolean;
}

/**
 * Per-key promise chain. Only guards callers that share this instance;
 * separate processes using the same cache directory are not excluded.
 */
export class InProcessEntryLock implements EntryLock {
  private tails = new Map<string, Promise<void>>();

  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    // The tail never rejects; a failed task releases the key like any other.
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
