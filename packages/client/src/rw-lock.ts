type LockMode = "read" | "write";

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

/**
 * In-process read/write lock. Readers share the lock, a writer holds it
 * alone. Waiters are served in arrival order, so a queued writer holds back
 * readers that arrive after it.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private queue: Waiter[] = [];

  read<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.run("read", fn);
  }

  write<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.run("write", fn);
  }

  private async run<T>(mode: LockMode, fn: () => T | Promise<T>): Promise<T> {
    await this.acquire(mode);
    try {
      return await fn();
    } finally {
      this.release(mode);
    }
  }

  private acquire(mode: LockMode): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(mode)) {
      this.take(mode);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.queue.push({
        mode,
        grant: () => {
          this.take(mode);
          resolve();
        },
      });
    });
  }

  private canGrant(mode: LockMode): boolean {
    if (this.writing) return false;
    return mode === "read" || this.readers === 0;
  }

  private take(mode: LockMode): void {
    if (mode === "read") this.readers++;
    else this.writing = true;
  }

  private release(mode: LockMode): void {
    if (mode === "read") this.readers--;
    else this.writing = false;

    while (this.queue.length > 0) {
      const next = this.queue[0];
      if (!this.canGrant(next.mode)) break;
      this.queue.shift();
      next.grant();
    }
  }
}
