/**
 * WebSocket transport (ws). One JSON envelope per text frame.
 *
 * The initiator declares its protocol version in the upgrade request header,
 * so the responder can refuse an unsupported version before any frame flows.
 */

import { WebSocket, type RawData } from 'ws';
import { NetworkError, errorMessage } from '@fathom/shared/Types/errors.js';
import { Logger } from '@fathom/shared/Utils/logger.js';
import { BaseTransport } from './transport.js';

const logger = new Logger('fathom:ws');

export const PROTOCOL_VERSION_HEADER = 'x-fathom-protocol-version';

/** Hold senders back while ws has more than this queued for the socket */
export const WS_HIGH_WATER_BYTES = 1_048_576;
const DRAIN_POLL_MS = 10;

/** ws limits a close reason to 123 bytes */
const MAX_CLOSE_REASON_BYTES = 123;

function frameText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  return Buffer.from(data).toString('utf-8');
}

function clampReason(reason: string): string {
  let clamped = reason;
  while (Buffer.byteLength(clamped, 'utf-8') > MAX_CLOSE_REASON_BYTES) {
    clamped = clamped.slice(0, -1);
  }
  return clamped;
}

/** Parse a declared version header value; undefined when absent or not an integer */
export function parseVersionHeader(value: string | string[] | undefined): number | undefined {
  const raw = Array.isArray(value) ? value[0] : value;
  if (raw === undefined || !/^\d+$/.test(raw.trim())) return undefined;
  return Number.parseInt(raw.trim(), 10);
}

export class WebSocketTransport extends BaseTransport {
  readonly declaredVersion?: number;
  private readonly socket: WebSocket;
  private lastError: string | null = null;
  private drainTimer: ReturnType<typeof setInterval> | null = null;

  constructor(socket: WebSocket, declaredVersion?: number) {
    super();
    this.socket = socket;
    this.declaredVersion = declaredVersion;

    // Binary frames are decoded as text too; the codec rejects anything that isn't an envelope
    socket.on('message', (data) => {
      this.emitFrame(frameText(data));
    });
    socket.on('error', (error) => {
      this.lastError = errorMessage(error);
    });
    socket.on('close', (code, reason) => {
      const text = reason.toString('utf-8');
      this.stopDrainPolling();
      this.markClosed(text || this.lastError || `socket closed (${code})`);
    });
  }

  send(frame: string): boolean {
    if (!this.isOpen || this.socket.readyState !== WebSocket.OPEN) {
      return false;
    }
    this.socket.send(frame);
    return true;
  }

  /** ws has no drain event on the client object, so bufferedAmount is polled */
  waitForDrain(): Promise<void> {
    if (!this.isOpen || this.socket.bufferedAmount < WS_HIGH_WATER_BYTES) {
      return Promise.resolve();
    }
    const waiting = this.awaitDrain();
    if (!this.drainTimer) {
      this.drainTimer = setInterval(() => {
        if (this.isOpen && this.socket.bufferedAmount >= WS_HIGH_WATER_BYTES) return;
        this.stopDrainPolling();
        this.releaseDrainWaiters();
      }, DRAIN_POLL_MS);
    }
    return waiting;
  }

  close(reason: string = 'closed locally'): void {
    this.stopDrainPolling();
    if (!this.markClosed(reason)) return;
    if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.close(1000, clampReason(reason));
    }
  }

  private stopDrainPolling(): void {
    if (this.drainTimer) {
      clearInterval(this.drainTimer);
      this.drainTimer = null;
    }
  }
}

export interface ConnectWebSocketOptions {
  /** Protocol version declared in the upgrade header */
  version: number;
  headers?: Record<string, string>;
  /** Abort the opening handshake after this long (default: 10s) */
  handshakeTimeoutMs?: number;
}

/**
 * Open a WebSocket to a responder. Rejects with NetworkError when the socket
 * cannot be opened or the upgrade is refused (e.g. 426 for an unsupported version).
 */
export function connectWebSocket(url: string, options: ConnectWebSocketOptions): Promise<WebSocketTransport> {
  return new Promise<WebSocketTransport>((resolve, reject) => {
    const socket = new WebSocket(url, {
      headers: { ...options.headers, [PROTOCOL_VERSION_HEADER]: String(options.version) },
      handshakeTimeout: options.handshakeTimeoutMs ?? 10_000,
    });

    const fail = (message: string, details?: Record<string, unknown>): void => {
      socket.removeAllListeners();
      // Late errors from the abandoned socket
      socket.on('error', (error) => logger.debug('Error on abandoned socket', { url, error }));
      socket.terminate();
      reject(new NetworkError(message, { url, ...details }));
    };

    socket.once('unexpected-response', (_request, response) => {
      fail(`Upgrade refused with HTTP ${response.statusCode ?? 'unknown'}`, { statusCode: response.statusCode });
    });
    socket.once('error', (error) => {
      fail(`WebSocket connection failed: ${errorMessage(error)}`);
    });
    socket.once('open', () => {
      socket.removeAllListeners('unexpected-response');
      socket.removeAllListeners('error');
      resolve(new WebSocketTransport(socket, options.version));
    });
  });
}
