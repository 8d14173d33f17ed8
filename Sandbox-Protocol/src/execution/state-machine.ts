/**
 * Execution state machine: one instance per execution id.
 *
 * Both roles drive the same machine: the responder applies events it is about
 * to emit, the initiator applies events it has observed. Every mutation is a
 * method here; the owning session calls them only from the execution's handle
 * queue (see registry.ts), so a machine is never mutated by two tasks at once.
 *
 *   pending ──start──▶ running
 *      │                  │
 *      └──────finish──────┴──▶ completed | failed | cancelled | timeout | oom
 *
 * Terminal states are absorbing: a second finish() is dropped, not an error.
 */

import { errorPayload, type ErrorPayload } from '../errors.js';
import {
  DEFAULT_MAX_OUTPUT_BYTES,
  isTerminalStatus,
  type ExecStatus,
  type OutputStream,
  type TerminalStatus,
} from '../protocol/types.js';
import type { ExecState, ExecutionRequest, ExecutionResult, ExecutionSnapshot } from './types.js';

export type Transition =
  | { changed: true; from: ExecStatus; to: ExecStatus }
  | { changed: false; reason: 'already_terminal' | 'invalid_transition' };

export type OutputOutcome =
  | { accepted: true; bytes: number; total: number }
  | { accepted: false; reason: 'not_running' | 'terminal' }
  | { accepted: false; reason: 'limit_exceeded'; transition: Transition };

export interface StateMachineOptions {
  /** Extra time past `timeout_ms` before the deadline (initiator side) */
  deadlineGraceMs?: number;
  now?: () => number;
}

export class ExecutionStateMachine {
  readonly request: ExecutionRequest;
  readonly createdAt: number;
  readonly deadline: number;
  readonly maxOutputBytes: number;

  private state: ExecState = { status: 'pending' };
  private acknowledged = false;
  private cancelRequested = false;
  private abandoned = false;
  private outputBytes = 0;
  private result: ExecutionResult | undefined;
  private readonly now: () => number;
  private resolveSettled: (status: TerminalStatus) => void = () => {};

  /** Resolves with the terminal status the moment one is entered */
  readonly settled: Promise<TerminalStatus>;

  constructor(request: ExecutionRequest, options: StateMachineOptions = {}) {
    this.request = request;
    this.now = options.now ?? Date.now;
    this.createdAt = this.now();
    this.deadline = this.createdAt + request.limits.timeout_ms + (options.deadlineGraceMs ?? 0);
    this.maxOutputBytes = request.limits.max_output_bytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    this.settled = new Promise<TerminalStatus>((resolve) => {
      this.resolveSettled = resolve;
    });
  }

  get id(): string {
    return this.request.id;
  }

  get status(): ExecStatus {
    return this.state.status;
  }

  get isTerminal(): boolean {
    return isTerminalStatus(this.state.status);
  }

  get isAcknowledged(): boolean {
    return this.acknowledged;
  }

  get isCancelRequested(): boolean {
    return this.cancelRequested;
  }

  get isAbandoned(): boolean {
    return this.abandoned;
  }

  get accumulatedOutputBytes(): number {
    return this.outputBytes;
  }

  /** Error attached to the terminal state, if any */
  get error(): ErrorPayload | undefined {
    return 'error' in this.state ? this.state.error : undefined;
  }

  getResult(): ExecutionResult | undefined {
    return this.result;
  }

  /** Elapsed time since creation, for the `result` message */
  elapsedMs(): number {
    return Math.max(0, this.now() - this.createdAt);
  }

  /**
   * Record the ack. Does not change status. Returns false if already acked
   * or if the execution is already over.
   */
  acknowledge(): boolean {
    if (this.acknowledged || this.isTerminal) return false;
    this.acknowledged = true;
    return true;
  }

  start(): Transition {
    if (this.isTerminal) return { changed: false, reason: 'already_terminal' };
    if (this.state.status !== 'pending') return { changed: false, reason: 'invalid_transition' };
    this.state = { status: 'running', startedAt: this.now() };
    return { changed: true, from: 'pending', to: 'running' };
  }

  /**
   * Account for one output chunk. Crossing `max_output_bytes` moves the
   * execution to failed/OUTPUT_LIMIT and the chunk is not accepted.
   */
  recordOutput(stream: OutputStream, data: string): OutputOutcome {
    if (this.isTerminal) return { accepted: false, reason: 'terminal' };
    if (this.state.status !== 'running') return { accepted: false, reason: 'not_running' };

    const bytes = Buffer.byteLength(data, 'utf-8');
    const total = this.outputBytes + bytes;
    if (total > this.maxOutputBytes) {
      const transition = this.finish(
        'failed',
        errorPayload(
          'OUTPUT_LIMIT',
          `${stream} pushed output to ${total} bytes, over the ${this.maxOutputBytes} byte limit`,
        ),
      );
      return { accepted: false, reason: 'limit_exceeded', transition };
    }
    this.outputBytes = total;
    return { accepted: true, bytes, total };
  }

  /** Flag a cancel. Returns false when there is nothing left to cancel or it was already flagged. */
  requestCancel(): boolean {
    if (this.isTerminal || this.cancelRequested) return false;
    this.cancelRequested = true;
    return true;
  }

  /** First terminal transition wins; later attempts are no-ops */
  finish(status: TerminalStatus, error?: ErrorPayload): Transition {
    const from = this.state.status;
    if (isTerminalStatus(from)) return { changed: false, reason: 'already_terminal' };
    this.state = error === undefined
      ? { status, finishedAt: this.now() }
      : { status, finishedAt: this.now(), error };
    this.resolveSettled(status);
    return { changed: true, from, to: status };
  }

  /** `result` is only valid after a terminal status and is attached at most once */
  attachResult(result: ExecutionResult): boolean {
    if (!this.isTerminal || this.result !== undefined) return false;
    this.result = Object.freeze({ ...result });
    return true;
  }

  /**
   * Connection lost. The execution becomes unreachable and, if it was still
   * live, is finalized as a retryable NETWORK_ERROR failure.
   */
  abandon(reason: string): Transition {
    this.abandoned = true;
    return this.finish('failed', errorPayload('NETWORK_ERROR', `Connection lost: ${reason}`));
  }

  snapshot(): ExecutionSnapshot {
    const error = this.error;
    return {
      execution_id: this.id,
      language: this.request.language,
      status: this.state.status,
      acknowledged: this.acknowledged,
      created_at: new Date(this.createdAt).toISOString(),
      deadline_at: new Date(this.deadline).toISOString(),
      accumulated_output_bytes: this.outputBytes,
      cancel_requested: this.cancelRequested,
      abandoned: this.abandoned,
      ...(error !== undefined ? { error } : {}),
      ...(this.result !== undefined ? { result: this.result } : {}),
    };
  }
}
