/**
 * Single-consumer task queue. Tasks run one at a time in enqueue order; a task
 * that throws rejects its own promise and the queue moves on.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get size(): number {
    return this.pending;
  }

  enqueue<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending += 1;
    const run = this.tail.then(task);
    this.tail = run.then(
      () => this.settle(),
      () => this.settle()
    );
    return run;
  }

  /** Resolves once every task enqueued so far has finished. */
  drain(): Promise<void> {
    return this.tail;
  }

  private settle(): void {
    this.pending -= 1;
  }
}
