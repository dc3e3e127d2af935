type Release = () => void;

/**
 * Async exclusion lock. Waiters are admitted in FIFO order; `runExclusive`
 * releases on both resolve and reject.
 */
export class Mutex {
  private locked = false;
  private readonly waiters: Array<(release: Release) => void> = [];

  acquire(): Promise<Release> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve(this.createRelease());
    }
    return new Promise<Release>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  /** Number of callers waiting for the lock. */
  get pending(): number {
    return this.waiters.length;
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        // Hand the lock over directly so no new caller can barge in.
        next(this.createRelease());
      } else {
        this.locked = false;
      }
    };
  }
}
