/** Fixed-size ring buffer keeping the most recent items. */
export class RingBuffer<T> {
  private buffer: T[] = [];
  private index = 0;

  constructor(private readonly capacity: number) {}

  push(item: T): void {
    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
    } else {
      this.buffer[this.index] = item;
    }
    this.index = (this.index + 1) % this.capacity;
  }

  /** Items oldest first. */
  toArray(): T[] {
    if (this.buffer.length < this.capacity) return [...this.buffer];
    return [...this.buffer.slice(this.index), ...this.buffer.slice(0, this.index)];
  }

  get size(): number {
    return this.buffer.length;
  }
}
