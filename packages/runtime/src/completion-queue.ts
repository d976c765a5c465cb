/**
 * Completion queue: background tasks post results here and the owner
 * drains them at a point of its choosing (under its own lock).
 */

export class CompletionQueue<T> {
  private items: T[] = [];
  private waiters: Array<() => void> = [];

  push(item: T): void {
    this.items.push(item);
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) wake();
  }

  /**
   * Remove and return every queued item in arrival order.
   */
  drain(): T[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Resolves once at least one item is queued.
   */
  whenNonEmpty(): Promise<void> {
    if (this.items.length > 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }
}
