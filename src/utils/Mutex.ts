/**
 * Promise-queue mutex. Waiters are served in arrival order.
 */
export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.lock();
    try {
      return await fn();
    } finally {
      this.unlock();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  private lock(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }
    return new Promise(resolve => this.waiters.push(resolve));
  }

  private unlock(): void {
    const next = this.waiters.shift();
    if (next) {
      // Ownership passes straight to the next waiter
      next();
    } else {
      this.locked = false;
    }
  }
}
