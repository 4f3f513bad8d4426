/**
 * Runs work after the current response has been sent. Each scheduled task runs
 * exactly once; nothing is retried or persisted.
 */
export class TaskRunner {
  private inFlight = new Set<Promise<void>>();

  schedule(name: string, task: () => Promise<void>): void {
    const run: Promise<void> = new Promise<void>((resolve) => setImmediate(resolve))
      .then(task)
      .catch((error: unknown) => {
        console.error(`❌ Background task ${name} failed:`, error);
      })
      .finally(() => {
        this.inFlight.delete(run);
      });
    this.inFlight.add(run);
  }

  get pending(): number {
    return this.inFlight.size;
  }

  /** Resolves once every scheduled task, including ones scheduled meanwhile, has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }
}
