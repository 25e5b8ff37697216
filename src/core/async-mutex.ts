/**
 * Async mutex with a FIFO wait queue.
 * The engine's only serialization point: every event handler runs inside runExclusive.
 */
export class AsyncMutex {
  private locked = false;
  private queue: Array<() => void> = [];

  /**
   * Acquire the mutex. Resolves with a release function once it is held.
   */
  acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const tryAcquire = (): void => {
        if (!this.locked) {
          this.locked = true;
          let released = false;
          resolve(() => {
            // A second call to the same release function must not free someone else's hold
            if (!released) {
              released = true;
              this.release();
            }
          });
        } else {
          this.queue.push(tryAcquire);
        }
      };
      tryAcquire();
    });
  }

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

  /** Number of callers waiting for the lock */
  get waiting(): number {
    return this.queue.length;
  }

  private release(): void {
    this.locked = false;
    const next = this.queue.shift();
    if (next) {
      next();
    }
  }
}
