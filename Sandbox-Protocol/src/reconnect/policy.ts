/**
 * Reconnection Policy: initiator-side backoff between reconnect attempts.
 *
 * Attempt 0 retries immediately. Attempt n >= 1 waits
 * min(base * 2^(n-1), max), so with the defaults: 0, 100, 200, 400, 800 ms …
 * capped at 30 s. reset() after a successful reconnect starts over.
 */

export const DEFAULT_RECONNECT_BASE_DELAY_MS = 100;
export const DEFAULT_RECONNECT_MAX_DELAY_MS = 30_000;

export interface ReconnectPolicyOptions {
  baseDelayMs?: number;
  maxDelayMs?: number;
}

export class ReconnectPolicy {
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  private attempt = 0;

  constructor(options: ReconnectPolicyOptions = {}) {
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_RECONNECT_BASE_DELAY_MS;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_RECONNECT_MAX_DELAY_MS;
  }

  nextDelay(attempt: number): number {
    if (attempt <= 0) return 0;
    return Math.min(this.baseDelayMs * 2 ** (attempt - 1), this.maxDelayMs);
  }

  /** Delay for the upcoming attempt; advances the counter */
  next(): number {
    const delay = this.nextDelay(this.attempt);
    this.attempt++;
    return delay;
  }

  reset(): void {
    this.attempt = 0;
  }

  get attempts(): number {
    return this.attempt;
  }
}
