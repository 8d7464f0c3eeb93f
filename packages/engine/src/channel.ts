/**
 * Single-consumer queue between the dispatcher's workers and its iterator.
 *
 * Workers push as probes finish; the consumer takes items in arrival order.
 * `take()` resolves to undefined once the channel is closed and drained.
 */

interface Waiter<T> {
  resolve: (item: T | undefined) => void;
  reject: (err: unknown) => void;
}

export class ResultChannel<T> {
  private readonly buffer: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;
  private failure: { error: unknown } | undefined;

  get isClosed(): boolean {
    return this.closed;
  }

  push(item: T): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) waiter.resolve(item);
    else this.buffer.push(item);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter.resolve(undefined);
  }

  fail(error: unknown): void {
    if (this.closed) return;
    this.failure = { error };
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) waiter.reject(error);
  }

  take(): Promise<T | undefined> {
    if (this.buffer.length > 0) return Promise.resolve(this.buffer.shift());
    if (this.failure) return Promise.reject(this.failure.error);
    if (this.closed) return Promise.resolve(undefined);
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }
}
