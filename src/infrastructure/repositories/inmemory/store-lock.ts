/**
 * StoreLock: single-permit async mutex guarding the in-memory tables.
 *
 * Every store operation runs inside `run()`, so a read-modify-write sequence
 * is never interleaved with another request's mutation, and readers never see
 * an entity half-way through an update. Waiters are served FIFO.
 */
export class StoreLock {
  private held = false;
  private readonly waiting: Array<() => void> = [];

  get isHeld(): boolean {
    return this.held;
  }

  async acquire(): Promise<void> {
    if (!this.held) {
      this.held = true;
      return;
    }
    return new Promise<void>((resolve) => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    const next = this.waiting.shift();
    if (next) {
      // Ownership passes straight to the next waiter; `held` stays true.
      next();
    } else {
      this.held = false;
    }
  }

  async run<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
