/**
 * FIFO async mutex. Callers queue in the order they ask for the lock.
 */
export class AsyncMutex {
  #locked = false;
  #waiters: Array<() => void> = [];

  get locked(): boolean {
    return this.#locked;
  }

  get pending(): number {
    return this.#waiters.length;
  }

  async acquire(): Promise<() => void> {
    if (!this.#locked) {
      this.#locked = true;
      return this.#releaser();
    }
    return new Promise<() => void>((resolve) => {
      this.#waiters.push(() => resolve(this.#releaser()));
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

  #releaser(): () => void {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      this.#release();
    };
  }

  #release(): void {
    const next = this.#waiters.shift();
    if (next) {
      // ownership passes straight to the next waiter
      next();
      return;
    }
    this.#locked = false;
  }
}
