/**
 * @description: In-process read-write lock for guarding shared store state across concurrent requests.
 * @scope: utility
 * @module: ReadWriteLock
 * @risk: high - A release bug stalls every request that touches the store.
 */

// --- Types ---
type LockMode = 'read' | 'write';

type Release = () => void;

type Waiter = {
  mode: LockMode;
  grant: () => void;
};

/**
 * FIFO read-write lock. Readers share, writers are exclusive, and a request
 * only jumps straight in when nobody is queued ahead of it, so neither side
 * can starve the other.
 */
class ReadWriteLock {
  private activeReaders = 0;
  private writerActive = false;
  private readonly waiters: Waiter[] = [];

  acquireRead(): Promise<Release> {
    return this.acquire('read');
  }

  acquireWrite(): Promise<Release> {
    return this.acquire('write');
  }

  async withRead<T>(task: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await task();
    } finally {
      release();
    }
  }

  async withWrite<T>(task: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await task();
    } finally {
      release();
    }
  }

  // Exposed for diagnostics and tests.
  get pendingCount(): number {
    return this.waiters.length;
  }

  private acquire(mode: LockMode): Promise<Release> {
    return new Promise<Release>((resolve) => {
      const waiter: Waiter = {
        mode,
        grant: () => resolve(this.createRelease(mode))
      };

      if (this.waiters.length === 0 && this.canGrant(mode)) {
        this.admit(waiter);
        return;
      }

      this.waiters.push(waiter);
    });
  }

  private canGrant(mode: LockMode): boolean {
    if (mode === 'read') {
      return !this.writerActive;
    }
    return !this.writerActive && this.activeReaders === 0;
  }

  private admit(waiter: Waiter): void {
    if (waiter.mode === 'read') {
      this.activeReaders += 1;
    } else {
      this.writerActive = true;
    }
    waiter.grant();
  }

  private createRelease(mode: LockMode): Release {
    let released = false;
    return () => {
      // Double release must not corrupt the counters.
      if (released) {
        return;
      }
      released = true;

      if (mode === 'read') {
        this.activeReaders -= 1;
      } else {
        this.writerActive = false;
      }
      this.drain();
    };
  }

  private drain(): void {
    // Admit from the head until the next waiter conflicts with what is held.
    while (this.waiters.length > 0) {
      const next = this.waiters[0];
      if (!next || !this.canGrant(next.mode)) {
        return;
      }
      this.waiters.shift();
      this.admit(next);
    }
  }
}

export { ReadWriteLock };
export type { LockMode, Release };
