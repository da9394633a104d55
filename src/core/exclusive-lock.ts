// Promise-chain mutex. Each acquirer waits on the previous holder's release,
// so waiters are served in FIFO order.

export class ExclusiveLock {
  private tail: Promise<void> = Promise.resolve();
  private holders = 0;

  /** True while someone holds the lock or is queued for it. */
  get isLocked(): boolean {
    return this.holders > 0;
  }

  /**
   * Acquire the lock. Returns a release function; call it in a finally block.
   * Releasing twice is a no-op.
   */
  acquire(): Promise<() => void> {
    let resolveNext!: () => void;
    const prev = this.tail;
    this.tail = new Promise<void>((resolve) => { resolveNext = resolve; });
    this.holders++;

    let released = false;
    const release = () => {
      if (released) return;
      released = true;
      this.holders--;
      resolveNext();
    };
    return prev.then(() => release);
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
