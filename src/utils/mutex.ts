/**
 * Promise-chain lock. Callers are served in arrival order; a failing task
 * does not poison the chain for the next one.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => {};
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
 * One Mutex per key, dropped again once nobody is waiting on it.
 */
export class KeyedMutex {
  private readonly locks = new Map<string, Mutex>();

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

  isLocked(key: string): boolean {
    return this.locks.get(key)?.isLocked() ?? false;
  }
}
