/**
 * SandboxClient: initiator with reconnection and keepalive.
 *
 * Holds at most one InitiatorSession at a time. When the connection drops,
 * every execution on it is finalized as abandoned (retryable NETWORK_ERROR)
 * and a fresh connection is attempted on the Reconnection Policy's schedule.
 * The schedule only starts over after the peer has answered a ping.
 * Nothing is resumed on the new connection; callers decide whether to retry.
 */

import { Logger } from '@fathom/shared/Utils/logger.js';
import { NetworkError, errorMessage } from '@fathom/shared/Types/errors.js';
import type { Transport } from '../connection/transport.js';
import {
  InitiatorSession,
  type ExecuteInput,
  type ExecutionHandlers,
  type ExecutionTicket,
} from '../connection/initiator.js';
import type { Load } from '../protocol/schemas.js';
import { PROTOCOL_VERSION } from '../protocol/types.js';
import { ReconnectPolicy, type ReconnectPolicyOptions } from '../reconnect/policy.js';

export type TransportFactory = (version: number) => Promise<Transport>;

export type ClientState =
  | { status: 'idle' }
  | { status: 'connecting'; attempt: number }
  | { status: 'connected'; connectionId: string }
  | { status: 'disconnected'; reason: string }
  | { status: 'closed' };

export interface SandboxClientOptions {
  connect: TransportFactory;
  /** Protocol version this client speaks (default: 1) */
  version?: number;
  reconnect?: ReconnectPolicyOptions & {
    enabled?: boolean;
    /** Give up after this many reconnect attempts in a row (default: never) */
    maxAttempts?: number;
  };
  /** Keepalive ping interval; 0 disables (default: 15s) */
  pingIntervalMs?: number;
  pingTimeoutMs?: number;
  timeoutGraceMs?: number;
  logger?: Logger;
}

export class SandboxClient {
  private readonly options: SandboxClientOptions;
  private readonly policy: ReconnectPolicy;
  private readonly logger: Logger;
  private readonly stateListeners = new Set<(state: ClientState) => void>();

  private current: InitiatorSession | null = null;
  private clientState: ClientState = { status: 'idle' };
  private shouldReconnect = true;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private keepaliveTimer: ReturnType<typeof setInterval> | null = null;
  private connectWaiters: Array<{ resolve: () => void; reject: (error: Error) => void }> = [];

  constructor(options: SandboxClientOptions) {
    this.options = options;
    this.policy = new ReconnectPolicy(options.reconnect);
    this.logger = options.logger ?? new Logger('fathom:client');
  }

  get state(): ClientState {
    return this.clientState;
  }

  get session(): InitiatorSession | null {
    return this.current;
  }

  onStateChange(listener: (state: ClientState) => void): () => void {
    this.stateListeners.add(listener);
    return () => this.stateListeners.delete(listener);
  }

  /** Resolves once connected. Keeps retrying in the background until then. */
  connect(): Promise<void> {
    if (this.clientState.status === 'connected') return Promise.resolve();
    if (this.clientState.status === 'closed') {
      return Promise.reject(new NetworkError('Sandbox client is closed'));
    }

    const waiting = new Promise<void>((resolve, reject) => {
      this.connectWaiters.push({ resolve, reject });
    });
    // Idle, or gave up after the last failure: start over
    if (this.clientState.status === 'idle' || !this.shouldReconnect) {
      this.shouldReconnect = true;
      this.policy.reset();
      this.startAttempt();
    }
    return waiting;
  }

  execute(input: ExecuteInput, handlers?: ExecutionHandlers): ExecutionTicket {
    return this.requireSession().execute(input, handlers);
  }

  cancel(executionId: string): Promise<boolean> {
    if (!this.current) return Promise.resolve(false);
    return this.current.cancel(executionId);
  }

  ping(timeoutMs?: number): Promise<Load | undefined> {
    return this.requireSession().ping(timeoutMs ?? this.options.pingTimeoutMs);
  }

  /** Stop reconnecting and drop the connection. Live executions are abandoned. */
  async close(): Promise<void> {
    this.shouldReconnect = false;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.stopKeepalive();
    const session = this.current;
    this.current = null;
    session?.close('client closed');
    this.rejectWaiters(new NetworkError('Sandbox client closed before connecting'));
    this.updateState({ status: 'closed' });
  }

  // ── Connection loop ───────────────────────────────────────────────────────

  private requireSession(): InitiatorSession {
    if (!this.current || this.current.isClosed) {
      throw new NetworkError('Not connected to a sandbox', { state: this.clientState.status });
    }
    return this.current;
  }

  private startAttempt(): void {
    this.attemptConnect().catch((error: unknown) => {
      this.logger.error('Connection attempt crashed', error);
    });
  }

  private async attemptConnect(): Promise<void> {
    if (!this.shouldReconnect) return;
    this.updateState({ status: 'connecting', attempt: this.policy.attempts });

    let transport: Transport;
    try {
      transport = await this.options.connect(this.options.version ?? PROTOCOL_VERSION);
    } catch (error) {
      this.scheduleReconnect(errorMessage(error));
      return;
    }

    if (!this.shouldReconnect) {
      transport.close('client closed');
      return;
    }

    const session = new InitiatorSession({
      transport,
      version: this.options.version ?? PROTOCOL_VERSION,
      ...(this.options.version !== undefined ? { supportedVersions: [this.options.version] } : {}),
      ...(this.options.timeoutGraceMs !== undefined ? { timeoutGraceMs: this.options.timeoutGraceMs } : {}),
      logger: this.logger.child('session'),
    });
    if (session.isClosed) {
      this.scheduleReconnect('transport closed during connect');
      return;
    }

    this.current = session;
    this.updateState({ status: 'connected', connectionId: session.connectionId });
    this.confirmHandshake(session);
    this.startKeepalive(session);
    this.resolveWaiters();

    session.onClose((reason) => {
      if (this.current !== session) return;
      this.current = null;
      this.stopKeepalive();
      this.scheduleReconnect(reason);
    });
  }

  /**
   * An open transport is not yet a working connection: a peer may accept and
   * then refuse the version, or drop at once. The backoff only starts over
   * once the peer answers a first ping.
   */
  private confirmHandshake(session: InitiatorSession): void {
    void session.ping(this.options.pingTimeoutMs ?? 5_000).then(
      () => {
        if (this.current !== session) return;
        this.policy.reset();
        this.logger.debug('Handshake confirmed', { connectionId: session.connectionId, version: session.version });
      },
      (error: unknown) => {
        if (session.isClosed) {
          this.logger.debug('Connection closed before the handshake completed', { error });
          return;
        }
        this.logger.warn('No answer to the handshake ping, dropping connection', { error });
        session.close('keepalive timeout');
      },
    );
  }

  private scheduleReconnect(reason: string): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (!this.shouldReconnect) return;

    const settings = this.options.reconnect;
    const maxAttempts = settings?.maxAttempts ?? Number.POSITIVE_INFINITY;
    if (settings?.enabled === false || this.policy.attempts >= maxAttempts) {
      this.shouldReconnect = false;
      this.updateState({ status: 'disconnected', reason });
      this.rejectWaiters(new NetworkError(`Unable to connect: ${reason}`, { attempts: this.policy.attempts }));
      return;
    }

    const delay = this.policy.next();
    this.logger.warn('Disconnected, reconnecting', { reason, attempt: this.policy.attempts, delayMs: delay });
    this.updateState({ status: 'disconnected', reason });
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.startAttempt();
    }, delay);
  }

  // ── Keepalive ─────────────────────────────────────────────────────────────

  private startKeepalive(session: InitiatorSession): void {
    this.stopKeepalive();
    const interval = this.options.pingIntervalMs ?? 15_000;
    if (interval <= 0) return;

    this.keepaliveTimer = setInterval(() => {
      session.ping(this.options.pingTimeoutMs ?? 5_000).catch((error: unknown) => {
        if (session.isClosed) return;
        this.logger.warn('Keepalive failed, dropping connection', { error });
        session.close('keepalive timeout');
      });
    }, interval);
    this.keepaliveTimer.unref();
  }

  private stopKeepalive(): void {
    if (this.keepaliveTimer) {
      clearInterval(this.keepaliveTimer);
      this.keepaliveTimer = null;
    }
  }

  // ── State ─────────────────────────────────────────────────────────────────

  private updateState(next: ClientState): void {
    this.clientState = next;
    for (const listener of this.stateListeners) {
      try {
        listener(next);
      } catch (error) {
        this.logger.warn('Connection state listener threw', error);
      }
    }
  }

  private resolveWaiters(): void {
    const waiters = this.connectWaiters;
    this.connectWaiters = [];
    for (const waiter of waiters) waiter.resolve();
  }

  private rejectWaiters(error: Error): void {
    const waiters = this.connectWaiters;
    this.connectWaiters = [];
    for (const waiter of waiters) waiter.reject(error);
  }
}
