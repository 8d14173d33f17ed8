/**
 * Connection Session: one per physical connection, either role.
 *
 * Owns the execution registry, the deadline watchdog and the negotiated
 * protocol version. The receive path only decodes and dispatches; execution
 * work is queued on the execution's handle and never awaited here, so a slow
 * execution cannot hold up frames for another.
 *
 * On teardown every live execution is abandoned: evicted from the registry
 * and finalized by the role. Nothing is carried over to a later connection.
 */

import { Logger } from '@fathom/shared/Utils/logger.js';
import { ProtocolError, type DecodeError } from '../errors.js';
import { ExecutionRegistry, type ExecutionHandle } from '../execution/registry.js';
import type { ExecutionSnapshot } from '../execution/types.js';
import type { ExecutionStateMachine } from '../execution/state-machine.js';
import { EnvelopeCodec } from '../protocol/codec.js';
import { EnvelopeFactory } from '../protocol/envelopes.js';
import type { Envelope } from '../protocol/schemas.js';
import { PROTOCOL_VERSION, SUPPORTED_VERSIONS } from '../protocol/types.js';
import { generateConnectionId } from '../utils/id-generator.js';
import { DeadlineWatchdog } from '../watchdog/deadline-watchdog.js';
import type { Transport } from './transport.js';

export type SessionRole = 'initiator' | 'responder';

export interface SessionOptions {
  transport: Transport;
  /** Versions this side accepts (default: [1]) */
  supportedVersions?: readonly number[];
  /** Version stamped on outgoing envelopes until one is negotiated */
  version?: number;
  connectionId?: string;
  logger?: Logger;
  now?: () => number;
}

export function assertNever(value: never): never {
  throw new ProtocolError('INTERNAL_ERROR', `Unhandled message: ${JSON.stringify(value)}`);
}

export abstract class ConnectionSession<C> {
  readonly connectionId: string;
  readonly role: SessionRole;
  protected readonly registry = new ExecutionRegistry<C>();
  protected readonly watchdog: DeadlineWatchdog;
  protected readonly codec: EnvelopeCodec;
  protected envelopes: EnvelopeFactory;
  protected readonly transport: Transport;
  protected readonly logger: Logger;
  protected readonly now: () => number;

  private negotiatedVersion: number | null = null;
  private closed = false;
  private closeReason: string | null = null;
  private readonly closeListeners = new Set<(reason: string) => void>();

  constructor(role: SessionRole, options: SessionOptions) {
    this.role = role;
    this.connectionId = options.connectionId ?? generateConnectionId();
    this.transport = options.transport;
    this.now = options.now ?? Date.now;
    this.codec = new EnvelopeCodec(options.supportedVersions ?? SUPPORTED_VERSIONS);
    this.logger = (options.logger ?? new Logger(`fathom:${role}`)).with({ connectionId: this.connectionId });
    this.envelopes = new EnvelopeFactory(options.version ?? this.defaultVersion(), this.now);
    this.watchdog = new DeadlineWatchdog({
      onExpire: (id) => this.handleDeadline(id),
      now: this.now,
      logger: this.logger.child('watchdog'),
    });

    const declared = this.transport.declaredVersion;
    if (declared !== undefined && this.codec.supports(declared)) {
      this.fixVersion(declared);
    }

    this.transport.onFrame((frame) => this.receive(frame));
    this.transport.onClose((reason) => this.teardown(reason));
  }

  /** Negotiated version, or null before the first envelope */
  get version(): number | null {
    return this.negotiatedVersion;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get activeExecutions(): number {
    return this.registry.size;
  }

  /** Snapshots of every execution still live on this connection */
  listExecutions(): ExecutionSnapshot[] {
    return this.registry.snapshot();
  }

  onClose(listener: (reason: string) => void): () => void {
    if (this.closed) {
      const reason = this.closeReason ?? 'closed';
      queueMicrotask(() => listener(reason));
      return () => undefined;
    }
    this.closeListeners.add(listener);
    return () => this.closeListeners.delete(listener);
  }

  close(reason: string = 'closed locally'): void {
    if (this.closed) return;
    // The transport reports back through onClose, which runs teardown()
    this.transport.close(reason);
    this.teardown(reason);
  }

  /**
   * Encode and write one envelope. Writes happen synchronously in call order,
   * which is what keeps ack ahead of status and chunks in emission order.
   */
  send(envelope: Envelope): boolean {
    const sent = this.transport.send(this.codec.encode(envelope));
    if (!sent) {
      this.logger.debug('Dropped outgoing envelope on closed transport', { type: envelope.type });
    }
    return sent;
  }

  /** Decode one frame and dispatch it. Never throws. */
  receive(frame: string | Buffer): void {
    if (this.closed) return;

    const decoded = this.codec.decode(frame);
    if (!decoded.ok) {
      this.handleDecodeFailure(decoded.error);
      return;
    }
    const envelope = decoded.envelope;

    if (this.negotiatedVersion === null) {
      this.fixVersion(envelope.v);
    } else if (envelope.v !== this.negotiatedVersion) {
      this.protocolViolation(
        new ProtocolError(
          'INVALID_REQUEST',
          `Envelope version ${envelope.v} does not match negotiated version ${this.negotiatedVersion}`,
        ),
      );
      return;
    }

    try {
      this.dispatch(envelope);
    } catch (error) {
      this.logger.error('Failed to dispatch envelope', { type: envelope.type, error });
    }
  }

  /** Exhaustive handling of the closed message union */
  protected abstract dispatch(envelope: Envelope): void;

  /** Deadline elapsed for a live execution; runs on the execution's handle */
  protected abstract onDeadline(handle: ExecutionHandle<C>): void | Promise<void>;

  /** Connection lost while the execution was live; runs on the execution's handle */
  protected abstract onAbandon(handle: ExecutionHandle<C>, reason: string): void | Promise<void>;

  /** A frame or envelope that breaks the protocol but belongs to no execution */
  protected abstract protocolViolation(error: ProtocolError): void;

  protected defaultVersion(): number {
    const versions = this.codec.getSupportedVersions();
    return versions.length > 0 ? Math.max(...versions) : PROTOCOL_VERSION;
  }

  /**
   * Queue a task on an execution's handle. The caller does not wait; a
   * failing task is logged against the execution.
   */
  protected enqueue(
    handle: ExecutionHandle<C>,
    label: string,
    task: (machine: ExecutionStateMachine, context: C) => void | Promise<void>,
  ): Promise<void> {
    return handle.run(task).catch((error: unknown) => {
      this.logger.error(`Execution task failed: ${label}`, { executionId: handle.id, error });
    });
  }

  /** Frames whose first version is unsupported fail the handshake: report, then close */
  protected handleDecodeFailure(error: DecodeError): void {
    if (error.reason === 'unsupported_version' && this.negotiatedVersion === null) {
      this.logger.warn('Handshake failed', { version: error.version ?? null, reason: error.message });
      this.handshakeFailed(error);
      return;
    }
    this.protocolViolation(error);
  }

  /** Default: log and close. The responder also tells the peer why. */
  protected handshakeFailed(error: ProtocolError): void {
    this.close(`handshake failed: ${error.message}`);
  }

  private fixVersion(version: number): void {
    this.negotiatedVersion = version;
    this.envelopes = this.envelopes.withVersion(version);
    this.logger.debug('Protocol version negotiated', { version });
  }

  private handleDeadline(id: string): void {
    const handle = this.registry.find(id);
    if (!handle) return;
    // Timeout is a no-op if the execution reached a terminal state first
    void this.enqueue(handle, 'deadline', (machine) => {
      if (machine.isTerminal) return;
      return this.onDeadline(handle);
    });
  }

  private teardown(reason: string): void {
    if (this.closed) return;
    this.closed = true;
    this.closeReason = reason;
    this.watchdog.clear();

    const abandoned = this.registry.abandonAll();
    if (abandoned.length > 0) {
      this.logger.warn('Connection lost with live executions', { reason, executions: abandoned.length });
    } else {
      this.logger.info('Connection closed', { reason });
    }
    for (const handle of abandoned) {
      void this.enqueue(handle, 'abandon', () => this.onAbandon(handle, reason));
    }

    const listeners = [...this.closeListeners];
    this.closeListeners.clear();
    for (const listener of listeners) {
      listener(reason);
    }
  }
}
