/**
 * In-process mutual exclusion.
 *
 * `Mutex` hands the lock directly to the next waiter on release, so waiters
 * run in FIFO order. `KeyedMutex` keeps one Mutex per key and drops it once
 * nobody holds or awaits it, so idle subjects cost nothing.
 */

export class Mutex {
  private locked = false;
  private readonly waiters: Array<() => void> = [];

  /** Resolves with a release function once the lock is held. */
  acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.releaser());
    }
    return new Promise((resolve) => {
      this.waiters.push(() => resolve(this.releaser()));
    });
  }

  /** Run `fn` while holding the lock. */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  getWaiting(): number {
    return this.waiters.length;
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // Ownership passes straight to the waiter; `locked` stays true.
        next();
      } else {
        this.locked = false;
      }
    };
  }
}

export class KeyedMutex {
  private readonly locks = new Map<string, { mutex: Mutex; refs: number }>();

  /** Run `fn` while holding the lock for `key`. */
  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    let entry = this.locks.get(key);
    if (!entry) {
      entry = { mutex: new Mutex(), refs: 0 };
      this.locks.set(key, entry);
    }
    entry.refs++;
    try {
      return await entry.mutex.runExclusive(fn);
    } finally {
      entry.refs--;
      if (entry.refs === 0) this.locks.delete(key);
    }
  }

  isLocked(key: string): boolean {
    return this.locks.get(key)?.mutex.isLocked() ?? false;
  }

  /** Number of keys currently held or awaited. */
  size(): number {
    return this.locks.size;
  }
}
