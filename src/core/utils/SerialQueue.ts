/**
 * Runs async tasks strictly one after another, in the order they were queued.
 *
 * A task's failure is returned to its own caller and does not stop the
 * tasks queued behind it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending: number = 0;

  run<T>(task: () => Promise<T> | T): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => {
        this.pending--;
      },
      () => {
        this.pending--;
      }
    );
    return result;
  }

  /**
   * Number of tasks queued or running.
   */
  size(): number {
    return this.pending;
  }

  /**
   * Resolves once every task queued so far has settled.
   */
  onIdle(): Promise<void> {
    return this.tail;
  }
}
