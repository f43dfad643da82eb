export type QueueEntry<T> = { kind: "message"; value: T } | { kind: "error"; error: Error } | { kind: "end" };

/**
 * Unbounded FIFO between the read loop and message consumers. The producer closes
 * it with an optional error entry followed by `end`. Once `end` has been taken,
 * every later take returns `end` immediately.
 */
export class MessageQueue<T> {
  private items: QueueEntry<T>[] = [];
  private waiters: ((entry: QueueEntry<T>) => void)[] = [];
  private ended = false;
  private finished = false;

  push(value: T): void {
    this.put({ kind: "message", value });
  }

  fail(error: Error): void {
    this.put({ kind: "error", error });
  }

  end(): void {
    if (this.finished) return;
    this.finished = true;
    this.put({ kind: "end" });
  }

  take(): Promise<QueueEntry<T>> {
    if (this.ended) return Promise.resolve({ kind: "end" });
    const next = this.items.shift();
    if (next) return Promise.resolve(this.consume(next));
    return new Promise((resolve) => {
      this.waiters.push((entry) => resolve(this.consume(entry)));
    });
  }

  get size(): number {
    return this.items.length;
  }

  private put(entry: QueueEntry<T>): void {
    const waiter = this.waiters.shift();
    if (waiter) waiter(entry);
    else this.items.push(entry);
  }

  private consume(entry: QueueEntry<T>): QueueEntry<T> {
    if (entry.kind === "end") {
      this.ended = true;
      // wake every other pending consumer
      for (const waiter of this.waiters.splice(0)) waiter({ kind: "end" });
    }
    return entry;
  }
}
