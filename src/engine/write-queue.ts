/**
 * @file src/engine/write-queue.ts
 * @summary Single-writer channel for durable store writes. Tasks run strictly one at a
 * time in the order they were enqueued, so the store sees writes in the order the user
 * acted and a slow write can never land after a later one.
 *
 * @exports
 *   - WriteQueue - promise-chain mutex
 */

export class WriteQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  enqueue<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const run = this.tail.then(task);
    this.tail = run.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      },
    );
    return run;
  }

  /** Number of tasks enqueued and not yet settled. */
  get size(): number {
    return this.pending;
  }

  /** Resolves once every task enqueued so far has settled. */
  async idle(): Promise<void> {
    while (this.pending > 0) await this.tail;
  }
}
