/**
 * Runs async tasks one at a time in submission order.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();

  public run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // A failed task must not block the ones queued after it; the caller
    // still sees the rejection through `result`.
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  public idle(): Promise<void> {
    return this.tail;
  }
}
