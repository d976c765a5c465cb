/**
 * Promise-chained exclusive lock.
 *
 * Each vault owns one; every accounting mutation runs inside
 * `runExclusive`. Callers release the lock before awaiting external I/O by
 * keeping that I/O outside the callback.
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  /**
   * Run `fn` once every previously queued holder has finished.
   * The returned promise settles with `fn`'s result or rejection.
   */
  runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    this.waiting++;
    const run = this.tail.then(fn).finally(() => {
      this.waiting--;
    });
    // A failed holder must not poison the queue; the failure reaches the
    // caller through `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** True while a holder runs or waits */
  get isLocked(): boolean {
    return this.waiting > 0;
  }
}
