/**
 * In-memory transport pair. Frames are delivered to the peer on a microtask,
 * in send order; closing one end closes the other after anything already sent.
 */

import { BaseTransport } from '../../src/connection/transport.js';
import { EnvelopeCodec } from '../../src/protocol/codec.js';
import type { Envelope } from '../../src/protocol/schemas.js';

export const PEER_CLOSED_REASON = 'peer closed the connection';

export class MemoryTransport extends BaseTransport {
  declaredVersion?: number;
  peer: MemoryTransport | null = null;

  send(frame: string): boolean {
    if (!this.isOpen) return false;
    const peer = this.peer;
    queueMicrotask(() => peer?.deliver(frame));
    return true;
  }

  close(reason: string = 'closed locally'): void {
    if (!this.markClosed(reason)) return;
    const peer = this.peer;
    queueMicrotask(() => peer?.hangUp());
  }

  deliver(frame: string): void {
    this.emitFrame(frame);
  }

  hangUp(): void {
    this.markClosed(PEER_CLOSED_REASON);
  }
}

export function createTransportPair(): [MemoryTransport, MemoryTransport] {
  const left = new MemoryTransport();
  const right = new MemoryTransport();
  left.peer = right;
  right.peer = left;
  return [left, right];
}

/**
 * Test-side end of a connection: sends raw frames and keeps every envelope
 * the other side wrote, decoded.
 */
export class Wire {
  readonly transport: MemoryTransport;
  readonly received: Envelope[] = [];
  readonly rawFrames: string[] = [];
  private readonly codec = new EnvelopeCodec([1, 2]);

  constructor(transport: MemoryTransport) {
    this.transport = transport;
    transport.onFrame((frame) => {
      this.rawFrames.push(frame);
      const decoded = this.codec.decode(frame);
      if (!decoded.ok) {
        throw new Error(`Peer wrote an invalid frame: ${decoded.error.message}`);
      }
      this.received.push(decoded.envelope);
    });
  }

  send(message: Record<string, unknown>): void {
    this.transport.send(JSON.stringify({ v: 1, ts: new Date().toISOString(), ...message }));
  }

  sendRaw(frame: string): void {
    this.transport.send(frame);
  }

  types(): string[] {
    return this.received.map((envelope) => envelope.type);
  }

  /** Envelopes about one execution, in arrival order */
  about(id: string): Envelope[] {
    return this.received.filter((envelope) => 'id' in envelope && envelope.id === id);
  }
}

/** A Wire connected to a fresh transport handed to the code under test */
export function createWire(): { wire: Wire; transport: MemoryTransport } {
  const [testSide, codeSide] = createTransportPair();
  return { wire: new Wire(testSide), transport: codeSide };
}
