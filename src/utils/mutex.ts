/**
 * Single-permit async lock. Waiters are served in FIFO order, so critical
 * sections run one at a time and in the order they were requested.
 */
export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  /** Wait for the lock. Resolves with the function that releases it. */
  async acquire(): Promise<() => void> {
    if (!this.locked) {
      this.locked = true;
      return () => this.release();
    }
    return new Promise((resolve) => {
      this.waiters.push(() => resolve(() => this.release()));
    });
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Hand the lock straight to the next waiter; it stays locked.
      next();
    } else {
      this.locked = false;
    }
  }
}
