/**
 * Initiator side of a connection: submits executions and observes the
 * responder's lifecycle events for each one.
 *
 * Each `execute()` returns a ticket. `acknowledged` tells "not received" apart
 * from "received": it resolves true on ack and false if the request was
 * rejected or lost before one arrived. `done` resolves exactly once with the
 * outcome; it never rejects.
 */

import { NetworkError, TimeoutError } from '@fathom/shared/Types/errors.js';
import {
  UnexpectedMessageError,
  errorPayload,
  type ErrorPayload,
  type ProtocolError,
} from '../errors.js';
import type { ExecutionHandle } from '../execution/registry.js';
import { ExecutionStateMachine } from '../execution/state-machine.js';
import type { ExecutionRequest, ExecutionResult, ResourceLimits } from '../execution/types.js';
import type {
  AckEnvelope,
  Envelope,
  ErrorEnvelope,
  Load,
  PongEnvelope,
  ResultEnvelope,
  StatusEnvelope,
  StderrEnvelope,
  StdoutEnvelope,
} from '../protocol/schemas.js';
import { isTerminalStatus, type OutputStream, type TerminalStatus, type WireStatus } from '../protocol/types.js';
import { generateExecutionId } from '../utils/id-generator.js';
import { ConnectionSession, assertNever, type SessionOptions } from './session.js';

/** Default extra wait past `timeout_ms` before the initiator gives up on its own */
export const DEFAULT_TIMEOUT_GRACE_MS = 5_000;

export interface ExecuteInput {
  /** Generated when omitted */
  id?: string;
  language: string;
  code: string;
  stdin?: string;
  env?: Record<string, string>;
  limits: ResourceLimits;
}

export interface ExecutionHandlers {
  onAck?: () => void;
  onStatus?: (status: WireStatus) => void;
  onOutput?: (stream: OutputStream, data: string) => void;
}

export type ExecutionOutcome =
  | { kind: 'rejected'; executionId: string; error: ErrorPayload }
  | {
      kind: 'finished';
      executionId: string;
      status: TerminalStatus;
      error?: ErrorPayload;
      result: ExecutionResult;
    }
  | { kind: 'abandoned'; executionId: string; error: ErrorPayload };

export interface ExecutionTicket {
  readonly executionId: string;
  readonly acknowledged: Promise<boolean>;
  readonly done: Promise<ExecutionOutcome>;
}

export interface InitiatorSessionOptions extends SessionOptions {
  /** Added to `timeout_ms` for the local deadline (default: 5s) */
  timeoutGraceMs?: number;
}

interface InitiatorContext {
  handlers: ExecutionHandlers;
  settleAck: (acked: boolean) => void;
  settleDone: (outcome: ExecutionOutcome) => void;
}

interface PendingPing {
  resolve: (load: Load | undefined) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

export class InitiatorSession extends ConnectionSession<InitiatorContext> {
  private readonly timeoutGraceMs: number;
  private pendingPings: PendingPing[] = [];

  constructor(options: InitiatorSessionOptions) {
    super('initiator', options);
    this.timeoutGraceMs = options.timeoutGraceMs ?? DEFAULT_TIMEOUT_GRACE_MS;
    this.onClose((reason) => this.rejectPings(new NetworkError(`Connection lost: ${reason}`)));
  }

  /**
   * Submit an execution. Throws NetworkError when the connection is already
   * closed and ExecutionAlreadyExistsError for an id that is still live.
   */
  execute(input: ExecuteInput, handlers: ExecutionHandlers = {}): ExecutionTicket {
    if (this.isClosed) {
      throw new NetworkError('Connection is closed', { connectionId: this.connectionId });
    }

    const request: ExecutionRequest = {
      id: input.id ?? generateExecutionId(),
      language: input.language,
      code: input.code,
      ...(input.stdin !== undefined ? { stdin: input.stdin } : {}),
      ...(input.env !== undefined ? { env: { ...input.env } } : {}),
      limits: { ...input.limits },
    };

    let settleAck: (acked: boolean) => void = () => undefined;
    let settleDone: (outcome: ExecutionOutcome) => void = () => undefined;
    const acknowledged = new Promise<boolean>((resolve) => {
      settleAck = resolve;
    });
    const done = new Promise<ExecutionOutcome>((resolve) => {
      settleDone = resolve;
    });

    const machine = new ExecutionStateMachine(request, { deadlineGraceMs: this.timeoutGraceMs, now: this.now });
    this.registry.register(machine, { handlers, settleAck, settleDone });

    const envelope = this.envelopes.execute(request);
    if (!this.send(envelope)) {
      this.registry.evict(request.id);
      throw new NetworkError('Connection closed before the request was sent', { executionId: request.id });
    }
    this.watchdog.arm(request.id, machine.deadline);
    this.logger.debug('Execution submitted', { executionId: request.id, language: request.language });

    return { executionId: request.id, acknowledged, done };
  }

  /**
   * Ask the responder to cancel. Resolves false, sending nothing, when the id
   * is unknown here or already terminal. The outcome still arrives through the
   * ticket: cancel is only confirmed by a terminal status.
   */
  async cancel(executionId: string): Promise<boolean> {
    const handle = this.registry.find(executionId);
    if (!handle) return false;
    return handle.run((machine) => {
      if (!machine.requestCancel()) return false;
      this.send(this.envelopes.cancel(machine.id));
      return true;
    });
  }

  /** Round-trip a ping. Resolves with the responder's reported load. */
  ping(timeoutMs: number = 5_000): Promise<Load | undefined> {
    if (this.isClosed) {
      return Promise.reject(new NetworkError('Connection is closed', { connectionId: this.connectionId }));
    }
    return new Promise<Load | undefined>((resolve, reject) => {
      const pending: PendingPing = {
        resolve,
        reject,
        timer: setTimeout(() => {
          this.pendingPings = this.pendingPings.filter((entry) => entry !== pending);
          reject(new TimeoutError(`No pong within ${timeoutMs}ms`, { connectionId: this.connectionId }));
        }, timeoutMs),
      };
      this.pendingPings.push(pending);
      this.send(this.envelopes.ping());
    });
  }

  protected dispatch(envelope: Envelope): void {
    switch (envelope.type) {
      case 'ack':
        this.onAck(envelope);
        return;
      case 'status':
        this.onStatus(envelope);
        return;
      case 'stdout':
      case 'stderr':
        this.onOutput(envelope);
        return;
      case 'result':
        this.onResult(envelope);
        return;
      case 'error':
        this.onError(envelope);
        return;
      case 'pong':
        this.onPong(envelope);
        return;
      case 'execute':
      case 'cancel':
      case 'ping':
        this.protocolViolation(new UnexpectedMessageError(envelope.type, 'initiator'));
        return;
      default:
        assertNever(envelope);
    }
  }

  /** Errors only flow responder → initiator, so there is nobody to tell */
  protected protocolViolation(error: ProtocolError): void {
    this.logger.warn('Protocol violation from responder', { code: error.code, reason: error.message });
  }

  // ── Incoming lifecycle events ─────────────────────────────────────────────

  private live(envelope: { type: string; id: string }): ExecutionHandle<InitiatorContext> | undefined {
    const handle = this.registry.find(envelope.id);
    if (!handle) {
      // Late events for executions this side already finalized (e.g. local timeout)
      this.logger.debug('Ignoring event for unknown execution', { type: envelope.type, executionId: envelope.id });
    }
    return handle;
  }

  private onAck(envelope: AckEnvelope): void {
    const handle = this.live(envelope);
    if (!handle) return;
    void this.enqueue(handle, 'ack', (machine, context) => {
      if (!machine.acknowledge()) {
        this.logger.warn('Duplicate or late ack', { executionId: machine.id });
        return;
      }
      context.settleAck(true);
      context.handlers.onAck?.();
    });
  }

  private onStatus(envelope: StatusEnvelope): void {
    const handle = this.live(envelope);
    if (!handle) return;
    void this.enqueue(handle, 'status', (machine, context) => {
      const { status } = envelope;
      if (status === 'running') {
        const transition = machine.start();
        if (transition.changed) context.handlers.onStatus?.(status);
        return;
      }
      const transition = machine.finish(status, envelope.error);
      if (!transition.changed) {
        this.logger.debug('Dropping second terminal status', { executionId: machine.id, status });
        return;
      }
      this.watchdog.disarm(machine.id);
      context.handlers.onStatus?.(status);
      // Final outcome waits for the result message
    });
  }

  private onOutput(envelope: StdoutEnvelope | StderrEnvelope): void {
    const handle = this.live(envelope);
    if (!handle) return;
    void this.enqueue(handle, envelope.type, (machine, context) => {
      const outcome = machine.recordOutput(envelope.type, envelope.data);
      if (outcome.accepted) {
        context.handlers.onOutput?.(envelope.type, envelope.data);
        return;
      }
      if (outcome.reason === 'limit_exceeded') {
        // The responder reports the same failure; its status is then a duplicate
        this.watchdog.disarm(machine.id);
        this.logger.warn('Output limit exceeded', { executionId: machine.id, limit: machine.maxOutputBytes });
        return;
      }
      this.logger.warn('Dropping output outside the running state', {
        executionId: machine.id,
        status: machine.status,
      });
    });
  }

  private onResult(envelope: ResultEnvelope): void {
    const handle = this.live(envelope);
    if (!handle) return;
    void this.enqueue(handle, 'result', (machine, context) => {
      const status = machine.status;
      if (!isTerminalStatus(status)) {
        this.logger.warn('Ignoring result before a terminal status', { executionId: machine.id, status });
        return;
      }
      const result: ExecutionResult = {
        exit_code: envelope.exit_code,
        duration_ms: envelope.duration_ms,
        ...(envelope.resource_usage !== undefined ? { resource_usage: envelope.resource_usage } : {}),
      };
      if (!machine.attachResult(result)) {
        this.logger.warn('Ignoring second result', { executionId: machine.id });
        return;
      }
      this.registry.evict(machine.id);
      context.settleAck(machine.isAcknowledged);
      const error = machine.error;
      context.settleDone({
        kind: 'finished',
        executionId: machine.id,
        status,
        ...(error !== undefined ? { error } : {}),
        result,
      });
    });
  }

  private onError(envelope: ErrorEnvelope): void {
    const payload: ErrorPayload = { code: envelope.code, message: envelope.message, retryable: envelope.retryable };
    if (envelope.id === undefined) {
      this.logger.warn('Connection-level error from responder', { code: payload.code, reason: payload.message });
      return;
    }

    const handle = this.registry.find(envelope.id);
    if (!handle) {
      this.logger.debug('Ignoring error for unknown execution', { executionId: envelope.id, code: payload.code });
      return;
    }
    void this.enqueue(handle, 'error', (machine, context) => {
      if (machine.isAcknowledged) {
        // e.g. UNKNOWN_EXECUTION for a cancel that crossed the terminal status
        this.logger.debug('Ignoring error for acknowledged execution', {
          executionId: machine.id,
          code: payload.code,
        });
        return;
      }
      // Rejected before ack: no entry is kept
      this.registry.evict(machine.id);
      this.watchdog.disarm(machine.id);
      machine.finish('failed', payload);
      context.settleAck(false);
      context.settleDone({ kind: 'rejected', executionId: machine.id, error: payload });
    });
  }

  private onPong(envelope: PongEnvelope): void {
    const [pending, ...rest] = this.pendingPings;
    if (!pending) {
      this.logger.debug('Unsolicited pong');
      return;
    }
    this.pendingPings = rest;
    clearTimeout(pending.timer);
    pending.resolve(envelope.load);
  }

  // ── Local deadline and connection loss ────────────────────────────────────

  /** The responder never reported a terminal status in time: cancel and finish locally */
  protected onDeadline(handle: ExecutionHandle<InitiatorContext>): void {
    const { machine, context } = handle;
    if (!machine.isCancelRequested) {
      machine.requestCancel();
      this.send(this.envelopes.cancel(machine.id));
    }
    machine.finish(
      'timeout',
      errorPayload('TIMEOUT', `No terminal status within ${machine.request.limits.timeout_ms}ms plus ${this.timeoutGraceMs}ms grace`),
    );
    const result: ExecutionResult = { exit_code: null, duration_ms: machine.elapsedMs() };
    machine.attachResult(result);
    this.registry.evict(machine.id);
    this.logger.warn('Execution timed out locally', { executionId: machine.id });

    const error = machine.error;
    context.settleAck(machine.isAcknowledged);
    context.settleDone({
      kind: 'finished',
      executionId: machine.id,
      status: 'timeout',
      ...(error !== undefined ? { error } : {}),
      result,
    });
  }

  protected onAbandon(handle: ExecutionHandle<InitiatorContext>, reason: string): void {
    const { machine, context } = handle;
    machine.abandon(reason);
    context.settleAck(machine.isAcknowledged);
    context.settleDone({
      kind: 'abandoned',
      executionId: machine.id,
      error: errorPayload('NETWORK_ERROR', `Connection lost: ${reason}`),
    });
  }

  private rejectPings(error: Error): void {
    const pending = this.pendingPings;
    this.pendingPings = [];
    for (const entry of pending) {
      clearTimeout(entry.timer);
      entry.reject(error);
    }
  }
}
