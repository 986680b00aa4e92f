/**
 * FIFO mutex for async critical sections.
 * Waiters are resumed in the order they called `acquire`.
 */
export class Mutex {
  private locked = false;
  private waitQueue: Array<() => void> = [];

  /**
   * Acquires the lock, waiting behind earlier callers if it is held.
   */
  async acquire(): Promise<void> {
    return new Promise((resolve) => {
      if (!this.locked) {
        this.locked = true;
        resolve();
        return;
      }
      this.waitQueue.push(resolve);
    });
  }

  /**
   * Releases the lock, or hands it straight to the next waiter.
   * The lock never becomes free while callers are queued.
   */
  release(): void {
    if (!this.locked) {
      throw new Error('Cannot release unlocked mutex');
    }

    const nextWaiter = this.waitQueue.shift();
    if (nextWaiter) {
      nextWaiter();
      return;
    }
    this.locked = false;
  }

  /**
   * Runs `fn` while holding the lock; the lock is released however `fn` settles.
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  /**
   * Number of callers waiting for the lock.
   */
  get waiting(): number {
    return this.waitQueue.length;
  }
}
