/**
 * Runs async tasks one at a time, in the order they were submitted.
 * A failed task rejects only its own caller; later tasks still run.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // The caller observes the failure through `result`
    this.tail = result.catch(() => undefined);
    return result;
  }
}
