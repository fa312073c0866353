type Waiter = { write: boolean; resolve: () => void };

/**
 * Async reader/writer lock. Readers share the lock; a writer holds it alone.
 * Waiters are served in arrival order, so a queued writer is not starved by
 * readers that arrive after it.
 */
export class RwLock {
  private readers = 0;
  private writer = false;
  private waiters: Waiter[] = [];

  async read<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire(false);
    try {
      return await fn();
    } finally {
      this.readers -= 1;
      this.wake();
    }
  }

  async write<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire(true);
    try {
      return await fn();
    } finally {
      this.writer = false;
      this.wake();
    }
  }

  isWriteLocked(): boolean {
    return this.writer;
  }

  private acquire(write: boolean): Promise<void> {
    if (this.waiters.length === 0 && this.canGrant(write)) {
      this.grant(write);
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiters.push({ write, resolve }));
  }

  private canGrant(write: boolean): boolean {
    return write ? !this.writer && this.readers === 0 : !this.writer;
  }

  private grant(write: boolean) {
    if (write) {
      this.writer = true;
    } else {
      this.readers += 1;
    }
  }

  private wake() {
    while (this.waiters.length > 0) {
      const next = this.waiters[0];
      if (!this.canGrant(next.write)) {
        return;
      }
      this.waiters.shift();
      this.grant(next.write);
      next.resolve();
      if (next.write) {
        return;
      }
    }
  }
}
