/**
 * Backend slot limiter for the responder.
 *
 * At most `maxActive` executions hold a slot. Others wait in FIFO order, up
 * to `maxQueued`; the caller checks canAccept() before acking. A queued
 * waiter can be withdrawn (cancel or timeout while still pending), in which
 * case its acquire() resolves false.
 */

interface Waiter {
  id: string;
  resolve: (granted: boolean) => void;
}

export class ExecutionSlots {
  private readonly maxActive: number;
  private readonly maxQueued: number;
  private running = 0;
  private queue: Waiter[] = [];

  constructor(maxActive: number, maxQueued: number) {
    this.maxActive = maxActive;
    this.maxQueued = maxQueued;
  }

  get active(): number {
    return this.running;
  }

  get queueDepth(): number {
    return this.queue.length;
  }

  /** True when an execute can be accepted, immediately or into the queue */
  canAccept(): boolean {
    return this.running < this.maxActive || this.queue.length < this.maxQueued;
  }

  acquire(id: string): Promise<boolean> {
    if (this.running < this.maxActive) {
      this.running++;
      return Promise.resolve(true);
    }
    return new Promise<boolean>((resolve) => {
      this.queue.push({ id, resolve });
    });
  }

  /** Drop a queued waiter. Returns false if `id` was not queued. */
  withdraw(id: string): boolean {
    const index = this.queue.findIndex((waiter) => waiter.id === id);
    if (index === -1) return false;
    const [waiter] = this.queue.splice(index, 1);
    waiter.resolve(false);
    return true;
  }

  isQueued(id: string): boolean {
    return this.queue.some((waiter) => waiter.id === id);
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      // Slot passes straight to the next waiter
      next.resolve(true);
      return;
    }
    this.running = Math.max(0, this.running - 1);
  }
}
