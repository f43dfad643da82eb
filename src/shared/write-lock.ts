/**
 * Serializes async operations: each run() starts only after every earlier one settled.
 * Outbound lines share one pipe, so a whole line write is the critical section.
 */
export class WriteLock {
  private tail: Promise<void> = Promise.resolve();

  run<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.tail.then(fn);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
