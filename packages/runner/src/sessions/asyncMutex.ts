/**
 * AsyncMutex: FIFO lock for code that must not run concurrently against a
 * shared resource (the portal session handle).
 *
 * unlock() hands the lock straight to the oldest waiter, so it never appears
 * free while someone is queued.
 */
export class AsyncMutex {
  private locked = false;
  private readonly waiters: Array<() => void> = [];

  lock(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  unlock(): void {
    if (!this.locked) {
      throw new Error('AsyncMutex.unlock() called while not locked');
    }
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await this.lock();
    try {
      return await fn();
    } finally {
      this.unlock();
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  get waitingCount(): number {
    return this.waiters.length;
  }
}
