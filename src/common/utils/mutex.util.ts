/**
 * FIFO async mutex. Work passed to {@link Mutex.runExclusive} never overlaps
 * with other work on the same instance.
 */
export class Mutex {
  private readonly waiters: Array<() => void> = [];
  private locked = false;

  async runExclusive<T>(work: () => Promise<T> | T): Promise<T> {
    await this.lock();
    try {
      return await work();
    } finally {
      this.unlock();
    }
  }

  private lock(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  private unlock(): void {
    const next = this.waiters.shift();
    if (next) {
      // ownership passes straight to the next waiter
      next();
    } else {
      this.locked = false;
    }
  }
}
