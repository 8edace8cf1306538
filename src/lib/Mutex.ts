/**
 * Promise-chain mutual exclusion. Tasks run one at a time, in the order
 * `runExclusive` was called.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    // The chain moves on after a failed task; the rejection still reaches the caller through `result`.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
