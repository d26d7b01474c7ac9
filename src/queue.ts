/**
 * Single-producer, single-consumer FIFO with a fixed capacity.
 *
 * `push` never waits: when the queue is full the oldest item is evicted to make
 * room and counted in `dropped`. `shift` resolves with the next item, or with
 * `undefined` once the queue is closed and empty.
 */
export class BoundedQueue<T> {
  private readonly slots: (T | undefined)[];
  private head = 0;
  private count = 0;
  private closed = false;
  private waiter: (() => void) | null = null;
  private _dropped = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`queue capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<T | undefined>(capacity);
  }

  get size() {
    return this.count;
  }

  get dropped() {
    return this._dropped;
  }

  get isClosed() {
    return this.closed;
  }

  push(item: T): { accepted: boolean; evicted?: T } {
    if (this.closed) return { accepted: false };

    let evicted: T | undefined;
    if (this.count === this.capacity) {
      evicted = this.slots[this.head];
      this.slots[this.head] = item;
      this.head = (this.head + 1) % this.capacity;
      this._dropped++;
    } else {
      this.slots[(this.head + this.count) % this.capacity] = item;
      this.count++;
    }

    this.wake();
    return evicted === undefined ? { accepted: true } : { accepted: true, evicted };
  }

  async shift(): Promise<T | undefined> {
    while (this.count === 0) {
      if (this.closed) return undefined;
      if (this.waiter) throw new Error('BoundedQueue supports a single consumer');
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
    return this.take();
  }

  close() {
    this.closed = true;
    this.wake();
  }

  clear() {
    const discarded = this.count;
    this.slots.fill(undefined);
    this.head = 0;
    this.count = 0;
    return discarded;
  }

  private wake() {
    const resolve = this.waiter;
    this.waiter = null;
    resolve?.();
  }

  private take(): T | undefined {
    const item = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count--;
    return item;
  }
}
