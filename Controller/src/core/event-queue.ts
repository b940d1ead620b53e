/**
 * Ordered FIFO with any number of producers and a single async consumer.
 */
export class EventQueue<T> {
  private items: T[] = [];
  private waiter: (() => void) | null = null;
  private closed = false;

  push(item: T): boolean {
    if (this.closed) return false;
    this.items.push(item);
    this.wake();
    return true;
  }

  /** Items already queued are still delivered; later pushes are dropped. */
  close(): void {
    this.closed = true;
    this.wake();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Deliver items one at a time, awaiting the handler before taking the
   * next. Resolves once the queue is closed and drained.
   */
  async consume(handler: (item: T) => Promise<void>): Promise<void> {
    for (;;) {
      const item = this.items.shift();
      if (item !== undefined) {
        await handler(item);
        continue;
      }
      if (this.closed) return;
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}
