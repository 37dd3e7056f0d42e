/**
 * Runs async tasks one at a time in submission order. A failed task does not stall the queue.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  public run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /** Resolves once every task submitted so far has settled. */
  public idle(): Promise<void> {
    return this.tail;
  }
}
