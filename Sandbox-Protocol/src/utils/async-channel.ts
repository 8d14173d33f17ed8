// =============================================================================
// AsyncChannel<T>: push-to-pull bridge for streamed subprocess output
// =============================================================================

export class AsyncChannel<T> {
  private buffer: T[] = [];
  private waiters: Array<(value: T | null) => void> = [];
  private closed = false;

  push(value: T): void {
    if (this.closed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(value);
    } else {
      this.buffer.push(value);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters) {
      waiter(null);
    }
    this.waiters = [];
  }

  /** Next buffered value; null once the channel is closed and drained */
  next(): Promise<T | null> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      return Promise.resolve(value);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise<T | null>((resolve) => {
      this.waiters.push(resolve);
    });
  }
}
