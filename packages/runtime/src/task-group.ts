/**
 * Tracks fire-and-forget background work so owners can wait for quiescence
 * (`whenIdle`) and report failures instead of leaving promises floating.
 */

export class TaskGroup {
  private readonly running = new Set<Promise<void>>();

  constructor(private readonly onError: (name: string, err: unknown) => void) {}

  spawn(name: string, task: () => Promise<void>): void {
    const run: Promise<void> = task()
      .catch((err: unknown) => {
        this.onError(name, err);
      })
      .finally(() => {
        this.running.delete(run);
      });
    this.running.add(run);
  }

  get size(): number {
    return this.running.size;
  }

  /**
   * Resolves when no task is running, including tasks spawned by tasks.
   */
  async whenIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running]);
    }
  }
}
