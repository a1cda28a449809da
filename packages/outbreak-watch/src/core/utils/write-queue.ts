/**
 * Single-writer queue
 *
 * Runs async tasks strictly one after another in submission order. A failed
 * task rejects its own caller only; the queue keeps draining.
 */
export class WriteQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => {
        this.pending -= 1;
      },
      () => {
        this.pending -= 1;
      }
    );
    return result;
  }

  /** Tasks submitted but not yet settled */
  get size(): number {
    return this.pending;
  }

  /** Resolves once every task submitted so far has settled */
  async drain(): Promise<void> {
    await this.tail;
  }
}
