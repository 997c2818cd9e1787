/**
 * FIFO between callback-style producers and one awaiting consumer.
 * After `end(last)` the queue drains and then hands out `last` forever.
 * The queue itself is unbounded; producers that can pause watch `size`.
 */
export class EventQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<(item: T) => void> = [];
  private last: { readonly item: T } | null = null;

  get ended(): boolean {
    return this.last !== null;
  }

  /** Items waiting for a consumer */
  get size(): number {
    return this.items.length;
  }

  push(item: T): void {
    if (this.last) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.items.push(item);
    }
  }

  end(item: T): void {
    if (this.last) return;
    this.last = { item };
    for (const waiter of this.waiters.splice(0)) waiter(item);
  }

  next(): Promise<T> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      return Promise.resolve(item);
    }
    if (this.last) return Promise.resolve(this.last.item);
    return new Promise((resolve) => this.waiters.push(resolve));
  }
}
