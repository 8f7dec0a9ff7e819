/** Releases a held lock. Calling it more than once is a no-op. */
export type Release = () => void;

interface Waiter {
  mode: "read" | "write";
  grant: () => void;
}

/**
 * Exclusive/shared lock for one record.
 *
 * Waiters are served in arrival order: a reader that arrives while a writer is
 * queued waits behind that writer, so writers are never starved.
 *
 * The orchestrator only takes the exclusive side. Image reads are lock-free
 * snapshots because a run waiting for its host holds the write lock until the
 * host worker takes it, and a reader would queue behind that.
 */
export class RwLock {
  private readers = 0;
  private writer = false;
  private readonly waiters: Waiter[] = [];

  acquireRead(): Promise<Release> {
    if (!this.writer && this.waiters.length === 0) {
      this.readers += 1;
      return Promise.resolve(this.releaser("read"));
    }
    return new Promise<Release>((resolve) => {
      this.waiters.push({ mode: "read", grant: () => resolve(this.releaser("read")) });
    });
  }

  acquireWrite(): Promise<Release> {
    if (!this.writer && this.readers === 0 && this.waiters.length === 0) {
      this.writer = true;
      return Promise.resolve(this.releaser("write"));
    }
    return new Promise<Release>((resolve) => {
      this.waiters.push({ mode: "write", grant: () => resolve(this.releaser("write")) });
    });
  }

  async withRead<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async withWrite<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** Current holders and queue length, for logging and tests. */
  get state(): { readers: number; writer: boolean; waiting: number } {
    return { readers: this.readers, writer: this.writer, waiting: this.waiters.length };
  }

  private releaser(mode: Waiter["mode"]): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      if (mode === "read") {
        this.readers -= 1;
      } else {
        this.writer = false;
      }
      this.drain();
    };
  }

  private drain(): void {
    while (this.waiters.length > 0) {
      const next = this.waiters[0];
      if (next.mode === "write") {
        if (this.writer || this.readers > 0) return;
        this.waiters.shift();
        this.writer = true;
        next.grant();
        return;
      }
      if (this.writer) return;
      this.waiters.shift();
      this.readers += 1;
      next.grant();
    }
  }
}
