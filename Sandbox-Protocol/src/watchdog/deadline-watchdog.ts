/**
 * Deadline Watchdog: one timer service for every execution on a connection.
 *
 * Deadlines live in a binary min-heap. Only the earliest live deadline has a
 * timer armed. disarm() and re-arm() are lazy: stale heap entries are skipped
 * when they surface. Expiry is reported through `onExpire`; the session turns
 * it into a Timeout transition, which is a no-op if the execution already
 * finished.
 */

import { Logger } from '@fathom/shared/Utils/logger.js';

interface HeapEntry {
  id: string;
  deadline: number;
  seq: number;
}

export interface DeadlineWatchdogOptions {
  onExpire: (id: string) => void;
  now?: () => number;
  logger?: Logger;
}

export class DeadlineWatchdog {
  private readonly heap: HeapEntry[] = [];
  /** id -> seq of its live heap entry */
  private readonly live = new Map<string, number>();
  private seq = 0;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private timerAt: number | null = null;
  private readonly onExpire: (id: string) => void;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: DeadlineWatchdogOptions) {
    this.onExpire = options.onExpire;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? new Logger('fathom:watchdog');
  }

  /** Arm (or re-arm) the deadline for `id`, as an absolute epoch-ms time */
  arm(id: string, deadline: number): void {
    const seq = ++this.seq;
    this.live.set(id, seq);
    this.push({ id, deadline, seq });
    this.schedule();
  }

  disarm(id: string): boolean {
    const removed = this.live.delete(id);
    if (removed && this.live.size === 0) {
      this.heap.length = 0;
      this.cancelTimer();
    }
    return removed;
  }

  has(id: string): boolean {
    return this.live.has(id);
  }

  get size(): number {
    return this.live.size;
  }

  /** Earliest live deadline, or null when nothing is armed */
  nextDeadline(): number | null {
    this.dropStale();
    return this.heap.length > 0 ? this.heap[0].deadline : null;
  }

  clear(): void {
    this.live.clear();
    this.heap.length = 0;
    this.cancelTimer();
  }

  private schedule(): void {
    const next = this.nextDeadline();
    if (next === null) {
      this.cancelTimer();
      return;
    }
    if (this.timer !== null && this.timerAt === next) return;

    this.cancelTimer();
    this.timerAt = next;
    this.timer = setTimeout(() => this.fire(), Math.max(0, next - this.now()));
    this.timer.unref();
  }

  private fire(): void {
    this.timer = null;
    this.timerAt = null;
    const now = this.now();

    const expired: string[] = [];
    this.dropStale();
    while (this.heap.length > 0 && this.heap[0].deadline <= now) {
      const entry = this.pop();
      if (this.live.get(entry.id) === entry.seq) {
        this.live.delete(entry.id);
        expired.push(entry.id);
      }
      this.dropStale();
    }

    for (const id of expired) {
      try {
        this.onExpire(id);
      } catch (error) {
        this.logger.error('Deadline handler failed', { executionId: id, error });
      }
    }
    this.schedule();
  }

  private cancelTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
      this.timerAt = null;
    }
  }

  private dropStale(): void {
    while (this.heap.length > 0 && this.live.get(this.heap[0].id) !== this.heap[0].seq) {
      this.pop();
    }
  }

  // ── Binary heap ───────────────────────────────────────────────────────────

  private push(entry: HeapEntry): void {
    this.heap.push(entry);
    let i = this.heap.length - 1;
    while (i > 0) {
      const parent = (i - 1) >> 1;
      if (this.heap[parent].deadline <= this.heap[i].deadline) break;
      [this.heap[parent], this.heap[i]] = [this.heap[i], this.heap[parent]];
      i = parent;
    }
  }

  private pop(): HeapEntry {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (last !== undefined && this.heap.length > 0) {
      this.heap[0] = last;
      let i = 0;
      for (;;) {
        const left = 2 * i + 1;
        const right = left + 1;
        let smallest = i;
        if (left < this.heap.length && this.heap[left].deadline < this.heap[smallest].deadline) smallest = left;
        if (right < this.heap.length && this.heap[right].deadline < this.heap[smallest].deadline) smallest = right;
        if (smallest === i) break;
        [this.heap[smallest], this.heap[i]] = [this.heap[i], this.heap[smallest]];
        i = smallest;
      }
    }
    return top;
  }
}
