/**
 * FIFO queue with O(1) amortised enqueue and dequeue.
 *
 * Items live in an array read from a moving head index; the consumed
 * prefix is dropped once it outgrows the live part.
 */
export class Queue<T> {
  private items: T[] = [];
  private head = 0;

  constructor(initial: Iterable<T> = []) {
    for (const item of initial) this.items.push(item);
  }

  get size(): number {
    return this.items.length - this.head;
  }

  enqueue(item: T): void {
    this.items.push(item);
  }

  enqueueAll(items: Iterable<T>): void {
    for (const item of items) this.items.push(item);
  }

  dequeue(): T | undefined {
    if (this.head >= this.items.length) return undefined;
    const item = this.items[this.head];
    this.head++;
    if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
    return item;
  }
}
