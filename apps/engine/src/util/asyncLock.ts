/** FIFO mutex; `acquire` resolves with the release function. */
export class AsyncLock {
  private queue: Array<() => void> = [];
  private locked = false;

  async acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const attempt = () => {
        if (!this.locked) {
          this.locked = true;
          resolve(() => this.release());
        } else {
          this.queue.push(attempt);
        }
      };
      attempt();
    });
  }

  private release(): void {
    this.locked = false;
    const next = this.queue.shift();
    if (next) {
      next();
    }
  }
}

/** One lock per key, created on first use. */
export class KeyedLock {
  private locks = new Map<string, AsyncLock>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = new AsyncLock();
      this.locks.set(key, lock);
    }
    const release = await lock.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
