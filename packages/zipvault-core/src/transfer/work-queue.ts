/**
 * FIFO queue shared by the transfer workers. Items with the same key are
 * queued once; idle workers park in `wait()` until something changes.
 */
export class WorkQueue<T> {
  private items: T[] = [];
  private byKey = new Map<string, T>();
  private waiters = new Set<() => void>();

  constructor(private readonly keyOf: (item: T) => string) {}

  get length(): number {
    return this.items.length;
  }

  /**
   * Enqueue `item` unless an item with the same key is already waiting.
   * @returns The queued item (the existing one when deduplicated) and whether it was added.
   */
  push(item: T): { item: T; added: boolean } {
    const key = this.keyOf(item);
    const existing = this.byKey.get(key);
    if (existing !== undefined) return { item: existing, added: false };
    this.byKey.set(key, item);
    this.items.push(item);
    this.wake();
    return { item, added: true };
  }

  shift(): T | undefined {
    const item = this.items.shift();
    if (item !== undefined) this.byKey.delete(this.keyOf(item));
    return item;
  }

  /** Remove and return everything still queued. */
  drain(): T[] {
    const drained = this.items;
    this.items = [];
    this.byKey.clear();
    return drained;
  }

  /** Resolves on the next push or `wake()`. */
  wait(): Promise<void> {
    return new Promise((resolve) => {
      this.waiters.add(resolve);
    });
  }

  wake(): void {
    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const resolve of waiters) resolve();
  }
}
