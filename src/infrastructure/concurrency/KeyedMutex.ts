/**
 * Per-key asynchronous mutual exclusion.
 *
 * Tasks for the same key run one at a time in arrival order; tasks for
 * different keys never wait on each other. A key's entry is removed as soon
 * as its queue drains.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `task` once every earlier task for `key` has settled.
   */
  async runExclusive<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Whether any task currently holds or waits for `key`.
   */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /** Number of keys with queued or running tasks */
  get size(): number {
    return this.tails.size;
  }
}
