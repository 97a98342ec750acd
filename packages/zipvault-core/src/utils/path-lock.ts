export type ReleaseFn = () => void;

/**
 * Per-key mutual exclusion. Waiters for the same key are served in FIFO order;
 * different keys never block each other.
 */
export class PathLockTable {
  private tails = new Map<string, Promise<void>>();
  private holders = new Set<string>();

  async acquire(key: string): Promise<ReleaseFn> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    this.holders.add(key);

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.holders.delete(key);
      if (this.tails.get(key) === tail) this.tails.delete(key);
      release();
    };
  }

  isHeld(key: string): boolean {
    return this.holders.has(key);
  }

  get size(): number {
    return this.holders.size;
  }
}
