/**
 * Promise-chain mutex for async read-modify-write sequences.
 * Waiters run in arrival order.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.pending++;

    try {
      await previous;
      return await task();
    } finally {
      this.pending--;
      release();
    }
  }

  isLocked(): boolean {
    return this.pending > 0;
  }
}

/**
 * One mutex per key, dropped again once nobody holds or waits for it
 */
export class KeyedMutex {
  private locks = new Map<string, Mutex>();

  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(key, lock);
    }

    try {
      return await lock.runExclusive(task);
    } finally {
      if (!lock.isLocked() && this.locks.get(key) === lock) {
        this.locks.delete(key);
      }
    }
  }

  size(): number {
    return this.locks.size;
  }
}
