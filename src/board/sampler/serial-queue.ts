/**
 * Serial Queue
 *
 * Runs async jobs one after another on a single promise chain. A failing job
 * rejects its own caller only; later jobs still run.
 */

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(job: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const result = this.tail.then(job);
    this.tail = result.then(
      () => this.settle(),
      () => this.settle(),
    );
    return result;
  }

  /** Jobs queued or running */
  get size(): number {
    return this.pending;
  }

  private settle(): void {
    this.pending--;
  }
}
