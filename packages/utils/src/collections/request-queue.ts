/**
 * Singly linked FIFO queue.
 *
 * Insertion order is service order. `peek()` lets a consumer keep the head in
 * place while it works on it and `shift()` it only once the work is done.
 */
export class RequestQueue<T> {
  private head: QueueSlot<T> | undefined;
  private tail: QueueSlot<T> | undefined;
  private count = 0;

  get size(): number {
    return this.count;
  }

  get isEmpty(): boolean {
    return this.count === 0;
  }

  push(value: T): void {
    const slot: QueueSlot<T> = { value, next: undefined };
    if (this.tail) {
      this.tail.next = slot;
    } else {
      this.head = slot;
    }
    this.tail = slot;
    this.count++;
  }

  peek(): T | undefined {
    return this.head?.value;
  }

  shift(): T | undefined {
    const slot = this.head;
    if (!slot) return undefined;
    this.head = slot.next;
    if (!this.head) {
      this.tail = undefined;
    }
    this.count--;
    return slot.value;
  }

  /** Removes every entry and returns them in queue order. */
  drain(): T[] {
    const values: T[] = [];
    for (let slot = this.head; slot; slot = slot.next) {
      values.push(slot.value);
    }
    this.head = undefined;
    this.tail = undefined;
    this.count = 0;
    return values;
  }

  *[Symbol.iterator](): IterableIterator<T> {
    for (let slot = this.head; slot; slot = slot.next) {
      yield slot.value;
    }
  }
}

interface QueueSlot<T> {
  value: T;
  next: QueueSlot<T> | undefined;
}
