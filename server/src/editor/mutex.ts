/**
 * Promise-chain locks for serializing async critical sections.
 *
 * @module editor/mutex
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  /** Callers currently holding or waiting for the lock. */
  get pending(): number {
    return this._pending;
  }

  /** Run `task` once every previously queued task has settled. */
  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    this._pending += 1;
    const previous = this.tail;
    let release: () => void = () => {};
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    try {
      await previous;
      return await task();
    } finally {
      this._pending -= 1;
      release();
    }
  }
}

/**
 * One {@link Mutex} per key, created on first use and dropped once no caller
 * holds or waits for it.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, Mutex>();

  get size(): number {
    return this.locks.size;
  }

  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(key, lock);
    }

    try {
      return await lock.runExclusive(task);
    } finally {
      if (lock.pending === 0 && this.locks.get(key) === lock) {
        this.locks.delete(key);
      }
    }
  }
}
