/**
 * In-process mutual exclusion for async operations.
 *
 * Operations passed to `runExclusive` run one at a time in arrival order.
 * Each GameSession owns one of these, so operations on the same game are
 * linearized while different games never contend.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Run `operation` once every previously queued operation has settled.
   * A rejection is returned to the caller and does not poison the queue.
   */
  public runExclusive<T>(operation: () => T | Promise<T>): Promise<T> {
    this.pending += 1;
    const run = this.tail.then(operation);
    this.tail = run.then(
      () => this.release(),
      () => this.release()
    );
    return run;
  }

  /** Number of operations queued or running. */
  public get queued(): number {
    return this.pending;
  }

  public isLocked(): boolean {
    return this.pending > 0;
  }

  private release(): void {
    this.pending -= 1;
  }
}
