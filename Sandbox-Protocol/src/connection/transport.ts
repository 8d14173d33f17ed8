/**
 * Transport seam between a connection session and the wire.
 *
 * A transport moves whole text frames (one JSON envelope each) in order, in
 * both directions, and reports when the underlying connection goes away.
 * Framing is the transport's business; the session never sees partial frames.
 */

import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { errorMessage } from '@fathom/shared/Types/errors.js';

export type FrameListener = (frame: string) => void;
export type CloseListener = (reason: string) => void;

export interface Transport {
  readonly isOpen: boolean;
  /** Version the peer declared out of band (e.g. an upgrade header), if the transport carries one */
  readonly declaredVersion?: number;
  /** Queue one frame for delivery. Returns false if the transport is already closed. */
  send(frame: string): boolean;
  /** Resolves once the wire has room for more frames, or the transport closes */
  waitForDrain(): Promise<void>;
  onFrame(listener: FrameListener): () => void;
  onClose(listener: CloseListener): () => void;
  close(reason?: string): void;
}

/**
 * Listener bookkeeping shared by the concrete transports. Close fires at most once.
 */
export abstract class BaseTransport implements Transport {
  private readonly frameListeners = new Set<FrameListener>();
  private readonly closeListeners = new Set<CloseListener>();
  private drainWaiters: Array<() => void> = [];
  private closed = false;
  private closeReason: string | null = null;

  get isOpen(): boolean {
    return !this.closed;
  }

  abstract send(frame: string): boolean;
  abstract close(reason?: string): void;

  /** Transports without an outgoing buffer of their own never hold the sender back */
  waitForDrain(): Promise<void> {
    return Promise.resolve();
  }

  onFrame(listener: FrameListener): () => void {
    this.frameListeners.add(listener);
    return () => this.frameListeners.delete(listener);
  }

  onClose(listener: CloseListener): () => void {
    if (this.closed) {
      // Late subscribers still learn why the transport went away
      const reason = this.closeReason ?? 'closed';
      queueMicrotask(() => listener(reason));
      return () => undefined;
    }
    this.closeListeners.add(listener);
    return () => this.closeListeners.delete(listener);
  }

  protected emitFrame(frame: string): void {
    if (this.closed) return;
    for (const listener of this.frameListeners) {
      listener(frame);
    }
  }

  /** Park a sender until releaseDrainWaiters() or close */
  protected awaitDrain(): Promise<void> {
    if (this.closed) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  protected releaseDrainWaiters(): void {
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const resolve of waiters) resolve();
  }

  /** Mark closed and notify. Returns false if already closed. */
  protected markClosed(reason: string): boolean {
    if (this.closed) return false;
    this.closed = true;
    this.closeReason = reason;
    this.releaseDrainWaiters();
    const listeners = [...this.closeListeners];
    this.closeListeners.clear();
    this.frameListeners.clear();
    for (const listener of listeners) {
      listener(reason);
    }
    return true;
  }
}

export interface StreamTransportOptions {
  /** End the writable side on close (default: true). Off for process.stdout. */
  endWritable?: boolean;
}

/**
 * Newline-delimited JSON over a Readable/Writable pair: stdio, a TCP socket,
 * or in-memory streams. Blank lines are ignored.
 */
export class StreamTransport extends BaseTransport {
  private readonly writable: Writable;
  private readonly lines: Interface;
  private readonly endWritable: boolean;
  private saturated = false;

  constructor(readable: Readable, writable: Writable, options: StreamTransportOptions = {}) {
    super();
    this.writable = writable;
    this.endWritable = options.endWritable ?? true;

    this.lines = createInterface({ input: readable, crlfDelay: Infinity });
    this.lines.on('line', (line) => {
      if (line.trim().length === 0) return;
      this.emitFrame(line);
    });
    this.lines.on('close', () => {
      this.markClosed('peer closed the stream');
    });
    writable.on('error', (error) => {
      this.shutdown(`write failed: ${errorMessage(error)}`);
    });
  }

  send(frame: string): boolean {
    if (!this.isOpen || this.writable.destroyed || this.writable.writableEnded) {
      return false;
    }
    const flushed = this.writable.write(`${frame}\n`);
    if (!flushed && !this.saturated) {
      this.saturated = true;
      this.writable.once('drain', () => {
        this.saturated = false;
        this.releaseDrainWaiters();
      });
    }
    return true;
  }

  /** Waits for the writable's 'drain' once write() has reported it is over its high-water mark */
  waitForDrain(): Promise<void> {
    if (!this.saturated || !this.isOpen) return Promise.resolve();
    return this.awaitDrain();
  }

  close(reason: string = 'closed locally'): void {
    this.shutdown(reason);
  }

  private shutdown(reason: string): void {
    if (!this.markClosed(reason)) return;
    this.lines.close();
    if (this.endWritable && !this.writable.writableEnded) {
      this.writable.end();
    }
  }
}
