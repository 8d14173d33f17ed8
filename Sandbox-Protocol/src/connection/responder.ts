/**
 * Responder side of a connection: accepts `execute`, drives the backend and
 * emits ack → status → stdout/stderr → terminal status → result.
 *
 * Rejections (unsupported language, out-of-range limits, duplicate id, no
 * capacity) are answered with an `error` carrying the request id and no ack.
 * Once acked, an execution always ends with exactly one terminal status
 * followed by one result, unless the connection goes away first.
 */

import { errorMessage } from '@fathom/shared/Types/errors.js';
import type { BackendExit, BackendHandle, ExecutionBackend, ExecutionSpec, OutputChunk } from '../backend/types.js';
import {
  ExecutionAlreadyExistsError,
  UnexpectedMessageError,
  UnknownExecutionError,
  errorPayload,
  type ErrorPayload,
  type ProtocolError,
} from '../errors.js';
import { classifyExit } from '../execution/exit-status.js';
import type { ExecutionHandle } from '../execution/registry.js';
import { ExecutionStateMachine } from '../execution/state-machine.js';
import type { ExecutionRequest, ExecutionResult, ResourceLimits, ResourceUsage } from '../execution/types.js';
import type { ExecutionAuditLog } from '../logging/writer.js';
import type { CancelEnvelope, Envelope, ExecuteEnvelope, Load } from '../protocol/schemas.js';
import { isTerminalStatus, type TerminalStatus } from '../protocol/types.js';
import { ExecutionSlots } from '../utils/execution-slots.js';
import { ConnectionSession, assertNever, type SessionOptions } from './session.js';

export interface ResponderPolicy {
  languages: readonly string[];
  maxTimeoutMs: number;
  maxMemoryMb: number;
  maxCpuShares: number;
  maxOutputBytes: number;
}

export const DEFAULT_LIMIT_BOUNDS = {
  maxTimeoutMs: 300_000,
  maxMemoryMb: 2048,
  maxCpuShares: 1024,
  maxOutputBytes: 16_777_216,
} as const;

export interface ResponderSessionOptions extends SessionOptions {
  backend: ExecutionBackend;
  /** Accepted languages and limit bounds; languages default to the backend's */
  policy?: Partial<ResponderPolicy>;
  /** Backend slots, shared across connections by the server (default: 4 running, 16 queued) */
  slots?: ExecutionSlots;
  audit?: ExecutionAuditLog;
}

interface ResponderContext {
  backendHandle: BackendHandle | null;
}

type PumpStep =
  | { kind: 'settled' }
  | { kind: 'chunk'; chunk: OutputChunk | null }
  | { kind: 'drained' }
  | { kind: 'failed'; error: unknown };

function checkBound(name: keyof ResourceLimits, value: number | undefined, max: number): string | null {
  if (value === undefined) return null;
  if (value < 1 || value > max) {
    return `limits.${name} must be between 1 and ${max} (got ${value})`;
  }
  return null;
}

function toSpec(request: ExecutionRequest): ExecutionSpec {
  return {
    executionId: request.id,
    language: request.language,
    code: request.code,
    ...(request.stdin !== undefined ? { stdin: request.stdin } : {}),
    ...(request.env !== undefined ? { env: request.env } : {}),
    limits: request.limits,
  };
}

export class ResponderSession extends ConnectionSession<ResponderContext> {
  private readonly backend: ExecutionBackend;
  private readonly policy: ResponderPolicy;
  private readonly slots: ExecutionSlots;
  private readonly audit: ExecutionAuditLog | undefined;

  constructor(options: ResponderSessionOptions) {
    super('responder', options);
    this.backend = options.backend;
    this.policy = {
      ...DEFAULT_LIMIT_BOUNDS,
      languages: options.backend.languages,
      ...options.policy,
    };
    this.slots = options.slots ?? new ExecutionSlots(4, 16);
    this.audit = options.audit;
  }

  /** Load as reported in `pong`, counted over this connection's executions */
  load(): Load {
    const queued = this.registry.count((handle) => this.slots.isQueued(handle.id));
    return { active_executions: this.registry.size - queued, queue_depth: queued };
  }

  protected dispatch(envelope: Envelope): void {
    switch (envelope.type) {
      case 'execute':
        this.handleExecute(envelope);
        return;
      case 'cancel':
        this.handleCancel(envelope);
        return;
      case 'ping':
        this.send(this.envelopes.pong(this.load()));
        return;
      case 'ack':
      case 'status':
      case 'stdout':
      case 'stderr':
      case 'result':
      case 'error':
      case 'pong':
        this.protocolViolation(new UnexpectedMessageError(envelope.type, 'responder'));
        return;
      default:
        assertNever(envelope);
    }
  }

  protected protocolViolation(error: ProtocolError): void {
    this.logger.warn('Protocol violation', { code: error.code, reason: error.message });
    this.send(this.envelopes.error(undefined, error.toPayload()));
  }

  protected handshakeFailed(error: ProtocolError): void {
    this.send(this.envelopes.error(undefined, error.toPayload()));
    super.handshakeFailed(error);
  }

  // ── Execute ───────────────────────────────────────────────────────────────

  private handleExecute(envelope: ExecuteEnvelope): void {
    const rejection = this.validate(envelope);
    if (rejection) {
      this.reject(envelope.id, rejection);
      return;
    }

    const request: ExecutionRequest = {
      id: envelope.id,
      language: envelope.language,
      code: envelope.code,
      ...(envelope.stdin !== undefined ? { stdin: envelope.stdin } : {}),
      ...(envelope.env !== undefined ? { env: envelope.env } : {}),
      limits: envelope.limits,
    };
    const machine = new ExecutionStateMachine(request, { now: this.now });
    const handle = this.registry.register(machine, { backendHandle: null });

    machine.acknowledge();
    this.send(this.envelopes.ack(request.id));
    this.watchdog.arm(request.id, machine.deadline);
    this.logger.info('Execution accepted', { executionId: request.id, language: request.language });

    this.drive(handle).catch((error: unknown) => {
      this.logger.error('Execution driver failed', { executionId: request.id, error });
    });
  }

  private validate(envelope: ExecuteEnvelope): ErrorPayload | null {
    if (!this.policy.languages.includes(envelope.language)) {
      return errorPayload('LANGUAGE_NOT_SUPPORTED', `Language not supported: ${envelope.language}`);
    }

    const { limits } = envelope;
    const problem =
      checkBound('timeout_ms', limits.timeout_ms, this.policy.maxTimeoutMs) ??
      checkBound('memory_mb', limits.memory_mb, this.policy.maxMemoryMb) ??
      checkBound('cpu_shares', limits.cpu_shares, this.policy.maxCpuShares) ??
      checkBound('max_output_bytes', limits.max_output_bytes, this.policy.maxOutputBytes);
    if (problem) {
      return errorPayload('INVALID_REQUEST', problem);
    }

    if (this.registry.has(envelope.id)) {
      return new ExecutionAlreadyExistsError(envelope.id).toPayload();
    }
    if (!this.slots.canAccept()) {
      return errorPayload(
        'SANDBOX_OVERLOADED',
        `Sandbox at capacity (${this.slots.active} running, ${this.slots.queueDepth} queued)`,
      );
    }
    return null;
  }

  private reject(id: string, error: ErrorPayload): void {
    this.logger.info('Execution rejected', { executionId: id, code: error.code, reason: error.message });
    this.send(this.envelopes.error(id, error));
  }

  /**
   * Background driver for one execution: wait for a slot, start the backend,
   * forward output, then map the exit. Every state change is queued on the
   * handle; backend calls happen outside the queue so cancel and deadline
   * tasks are never stuck behind them.
   */
  private async drive(handle: ExecutionHandle<ResponderContext>): Promise<void> {
    const granted = await this.slots.acquire(handle.id);
    if (!granted) return; // withdrawn while queued: already finished

    try {
      await this.runOnBackend(handle);
    } finally {
      this.slots.release();
    }
  }

  private async runOnBackend(handle: ExecutionHandle<ResponderContext>): Promise<void> {
    const started = await handle.run((machine) => {
      if (machine.isTerminal) return false;
      if (machine.isCancelRequested) {
        this.finishExecution(handle, 'cancelled', undefined, null);
        return false;
      }
      machine.start();
      this.send(this.envelopes.status(machine.id, 'running'));
      return true;
    });
    if (!started) return;

    let backendHandle: BackendHandle;
    try {
      backendHandle = await this.backend.start(toSpec(handle.machine.request));
    } catch (error) {
      await handle.run(() => {
        this.finishExecution(
          handle,
          'failed',
          errorPayload('INTERNAL_ERROR', `Backend failed to start execution: ${errorMessage(error)}`),
          null,
        );
      });
      return;
    }

    await handle.run(async (machine, context) => {
      context.backendHandle = backendHandle;
      // Cancelled, timed out or abandoned while the backend was starting
      if (machine.isTerminal || machine.isCancelRequested) {
        await this.signalBackend(handle);
      }
    });

    await this.pumpOutput(handle, backendHandle);

    let exit: BackendExit;
    try {
      exit = await this.backend.wait(backendHandle);
    } catch (error) {
      await handle.run(() => {
        this.finishExecution(
          handle,
          'failed',
          errorPayload('INTERNAL_ERROR', `Backend lost track of execution: ${errorMessage(error)}`),
          null,
        );
      });
      return;
    }

    await handle.run((machine) => {
      if (machine.isTerminal) return;
      const outcome = classifyExit(exit, machine.isCancelRequested, machine.request.limits);
      this.finishExecution(handle, outcome.status, outcome.error, exit.exitCode, exit.resourceUsage);
    });
  }

  /**
   * Forward chunks in backend order until end of output or a terminal state.
   * The next chunk is not pulled until the transport has room for it.
   */
  private async pumpOutput(handle: ExecutionHandle<ResponderContext>, backendHandle: BackendHandle): Promise<void> {
    let isSettled = false;
    let interrupt: ((step: PumpStep) => void) | null = null;
    void handle.machine.settled.then(() => {
      isSettled = true;
      interrupt?.({ kind: 'settled' });
    });

    // One short-lived interrupt per wait; the settled promise gets a single reaction
    const untilSettled = async (work: Promise<PumpStep>): Promise<PumpStep> => {
      if (isSettled) return { kind: 'settled' };
      const interrupted = new Promise<PumpStep>((resolve) => {
        interrupt = resolve;
      });
      try {
        return await Promise.race([interrupted, work]);
      } finally {
        interrupt = null;
      }
    };

    for (;;) {
      const step = await untilSettled(this.backend.pollOutput(backendHandle).then(
        (chunk): PumpStep => ({ kind: 'chunk', chunk }),
        (error: unknown): PumpStep => ({ kind: 'failed', error }),
      ));

      if (step.kind === 'settled') return;
      if (step.kind === 'failed') {
        const message = `Backend output failed: ${errorMessage(step.error)}`;
        await handle.run(async () => {
          const finished = this.finishExecution(handle, 'failed', errorPayload('INTERNAL_ERROR', message), null);
          if (finished) await this.signalBackend(handle);
        });
        return;
      }
      if (step.kind === 'drained') continue;

      const { chunk } = step;
      if (chunk === null) return;
      await handle.run(async (machine) => {
        const outcome = machine.recordOutput(chunk.stream, chunk.data);
        if (outcome.accepted) {
          this.send(this.envelopes.output(machine.id, chunk.stream, chunk.data));
          return;
        }
        if (outcome.reason === 'limit_exceeded' && outcome.transition.changed) {
          this.logger.warn('Output limit exceeded', {
            executionId: machine.id,
            limit: machine.maxOutputBytes,
          });
          this.announceTerminal(handle, null);
          await this.signalBackend(handle);
        }
      });

      const drained = await untilSettled(this.transport.waitForDrain().then((): PumpStep => ({ kind: 'drained' })));
      if (drained.kind === 'settled') return;
    }
  }

  // ── Cancel, deadline, abandon ─────────────────────────────────────────────

  private handleCancel(envelope: CancelEnvelope): void {
    const handle = this.registry.find(envelope.id);
    if (!handle) {
      // Never creates an entry
      this.send(this.envelopes.error(envelope.id, new UnknownExecutionError(envelope.id).toPayload()));
      return;
    }

    void this.enqueue(handle, 'cancel', async (machine) => {
      if (!machine.requestCancel()) return;
      this.logger.info('Cancel requested', { executionId: machine.id });

      if (this.slots.isQueued(machine.id)) {
        this.finishExecution(handle, 'cancelled', undefined, null);
        return;
      }
      // Confirmed by the backend exit; if the backend is still starting, the start path signals it
      await this.signalBackend(handle);
    });
  }

  protected async onDeadline(handle: ExecutionHandle<ResponderContext>): Promise<void> {
    const { machine } = handle;
    const finished = this.finishExecution(
      handle,
      'timeout',
      errorPayload('TIMEOUT', `Execution exceeded its ${machine.request.limits.timeout_ms}ms timeout`),
      null,
    );
    if (finished) {
      this.logger.warn('Execution timed out', { executionId: machine.id });
      await this.signalBackend(handle);
    }
  }

  protected async onAbandon(handle: ExecutionHandle<ResponderContext>, reason: string): Promise<void> {
    const { machine } = handle;
    const transition = machine.abandon(reason);
    this.slots.withdraw(machine.id);
    if (transition.changed) {
      this.recordAudit(machine, null);
    }
    await this.signalBackend(handle);
  }

  private async signalBackend(handle: ExecutionHandle<ResponderContext>): Promise<void> {
    const backendHandle = handle.context.backendHandle;
    if (!backendHandle) return;
    try {
      await this.backend.signalCancel(backendHandle);
    } catch (error) {
      this.logger.warn('Failed to signal cancel to backend', { executionId: handle.id, error });
    }
  }

  // ── Terminal ──────────────────────────────────────────────────────────────

  /** Enter a terminal status and announce it. False if another transition won. */
  private finishExecution(
    handle: ExecutionHandle<ResponderContext>,
    status: TerminalStatus,
    error: ErrorPayload | undefined,
    exitCode: number | null,
    usage?: ResourceUsage,
  ): boolean {
    const transition = handle.machine.finish(status, error);
    if (!transition.changed) return false;
    this.announceTerminal(handle, exitCode, usage);
    return true;
  }

  /** Emit terminal status then result, and evict. The machine must have just turned terminal. */
  private announceTerminal(
    handle: ExecutionHandle<ResponderContext>,
    exitCode: number | null,
    usage?: ResourceUsage,
  ): void {
    const { machine } = handle;
    const status = machine.status;
    if (!isTerminalStatus(status)) return;

    this.watchdog.disarm(machine.id);
    this.slots.withdraw(machine.id);

    const result: ExecutionResult = {
      exit_code: exitCode,
      duration_ms: machine.elapsedMs(),
      ...(usage !== undefined ? { resource_usage: usage } : {}),
    };
    machine.attachResult(result);

    this.send(this.envelopes.status(machine.id, status, machine.error));
    this.send(this.envelopes.result(machine.id, result));
    this.registry.evict(machine.id);

    this.logger.info('Execution finished', {
      executionId: machine.id,
      status,
      exitCode,
      durationMs: result.duration_ms,
    });
    this.recordAudit(machine, exitCode);
  }

  private recordAudit(machine: ExecutionStateMachine, exitCode: number | null): void {
    const status = machine.status;
    if (!this.audit || !isTerminalStatus(status)) return;
    const result = machine.getResult();
    void this.audit.record({
      execution_id: machine.id,
      language: machine.request.language,
      status,
      error_code: machine.error?.code ?? null,
      exit_code: exitCode,
      duration_ms: result?.duration_ms ?? machine.elapsedMs(),
      output_bytes: machine.accumulatedOutputBytes,
      connection_id: this.connectionId,
      finished_at: new Date(this.now()).toISOString(),
    });
  }
}
