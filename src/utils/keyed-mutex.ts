/**
 * Keyed Mutex
 *
 * Serializes async work per key while letting different keys run
 * concurrently. The ingestion pipeline locks on record id so the
 * existence check and the upsert for one id never interleave with another
 * worker handling the same id.
 *
 * @example
 * ```typescript
 * const locks = new KeyedMutex();
 * await locks.runExclusive('doc-1', async () => {
 *   if (!(await store.exists('doc-1'))) await store.upsert(record, embedding);
 * });
 * ```
 */
export class KeyedMutex {
  /** Tail of the wait chain for each key currently held */
  private tails = new Map<string, Promise<void>>();

  /**
   * Run `task` once every earlier task for the same key has settled.
   */
  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => {};
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
      // Drop the entry if nobody queued behind us
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Whether any task currently holds or waits on `key` */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
