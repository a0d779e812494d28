/**
 * Unbounded queue with a single consumer. Producers `post` from background
 * work; the foreground loop awaits `next` and is the only reader.
 */
export class EventChannel<T> {
  private queue: T[] = [];
  private waiter?: (event: T) => void;

  post(event: T): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = undefined;
      waiter(event);
      return;
    }
    this.queue.push(event);
  }

  next(): Promise<T> {
    if (this.queue.length > 0) {
      const [event, ...rest] = this.queue;
      this.queue = rest;
      return Promise.resolve(event);
    }
    if (this.waiter) {
      return Promise.reject(new Error('EventChannel already has a consumer waiting'));
    }
    return new Promise(resolve => {
      this.waiter = resolve;
    });
  }

  get size(): number {
    return this.queue.length;
  }
}
