/**
 * FIFO async mutex.
 *
 * Callers queue up in arrival order; exactly one holder runs at a time.
 * Used to funnel every read and write of the poller's watermark/dedup state
 * through one serial section, so a slow cycle's commit can never interleave
 * with another cycle's request building or commit.
 */

type Waiter = () => void;

export class SerialLock {
  private held = false;
  private readonly waiters: Waiter[] = [];

  /** Whether the lock is currently held. */
  get locked(): boolean {
    return this.held;
  }

  /** Number of callers waiting to acquire the lock. */
  get pending(): number {
    return this.waiters.length;
  }

  /**
   * Acquire the lock. Resolves with a release function that must be called
   * exactly once; extra calls are ignored.
   */
  acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const grant = () => {
        this.held = true;
        let released = false;
        resolve(() => {
          if (released) return;
          released = true;
          this.release();
        });
      };

      if (this.held) {
        this.waiters.push(grant);
      } else {
        grant();
      }
    });
  }

  /** Run `fn` while holding the lock, releasing it however `fn` settles. */
  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Hand over directly so no other caller can slip in between.
      next();
    } else {
      this.held = false;
    }
  }
}
