/**
 * Envelope builders. Every envelope leaves here frozen and stamped with the
 * factory's protocol version and the current time.
 */

import type { ErrorPayload } from '../errors.js';
import type { ExecutionRequest, ExecutionResult } from '../execution/types.js';
import { deepFreeze } from '../utils/freeze.js';
import type {
  AckEnvelope,
  CancelEnvelope,
  ErrorEnvelope,
  ExecuteEnvelope,
  Load,
  PingEnvelope,
  PongEnvelope,
  ResultEnvelope,
  StatusEnvelope,
  StderrEnvelope,
  StdoutEnvelope,
} from './schemas.js';
import { PROTOCOL_VERSION, type OutputStream, type WireStatus } from './types.js';

export class EnvelopeFactory {
  readonly version: number;
  private readonly now: () => number;

  constructor(version: number = PROTOCOL_VERSION, now: () => number = Date.now) {
    this.version = version;
    this.now = now;
  }

  withVersion(version: number): EnvelopeFactory {
    return version === this.version ? this : new EnvelopeFactory(version, this.now);
  }

  private ts(): string {
    return new Date(this.now()).toISOString();
  }

  execute(request: ExecutionRequest): ExecuteEnvelope {
    const envelope: ExecuteEnvelope = {
      v: this.version,
      type: 'execute',
      id: request.id,
      ts: this.ts(),
      language: request.language,
      code: request.code,
      ...(request.stdin !== undefined ? { stdin: request.stdin } : {}),
      ...(request.env !== undefined ? { env: { ...request.env } } : {}),
      limits: { ...request.limits },
    };
    return deepFreeze(envelope);
  }

  cancel(id: string): CancelEnvelope {
    const envelope: CancelEnvelope = { v: this.version, type: 'cancel', id, ts: this.ts() };
    return deepFreeze(envelope);
  }

  ping(): PingEnvelope {
    const envelope: PingEnvelope = { v: this.version, type: 'ping', ts: this.ts() };
    return deepFreeze(envelope);
  }

  ack(id: string): AckEnvelope {
    const envelope: AckEnvelope = { v: this.version, type: 'ack', id, ts: this.ts() };
    return deepFreeze(envelope);
  }

  status(id: string, status: WireStatus, error?: ErrorPayload): StatusEnvelope {
    const envelope: StatusEnvelope = {
      v: this.version,
      type: 'status',
      id,
      ts: this.ts(),
      status,
      ...(error !== undefined ? { error: { ...error } } : {}),
    };
    return deepFreeze(envelope);
  }

  output(id: string, stream: OutputStream, data: string): StdoutEnvelope | StderrEnvelope {
    if (stream === 'stdout') {
      const envelope: StdoutEnvelope = { v: this.version, type: 'stdout', id, ts: this.ts(), data };
      return deepFreeze(envelope);
    }
    const envelope: StderrEnvelope = { v: this.version, type: 'stderr', id, ts: this.ts(), data };
    return deepFreeze(envelope);
  }

  result(id: string, result: ExecutionResult): ResultEnvelope {
    const envelope: ResultEnvelope = {
      v: this.version,
      type: 'result',
      id,
      ts: this.ts(),
      exit_code: result.exit_code,
      duration_ms: result.duration_ms,
      ...(result.resource_usage !== undefined ? { resource_usage: { ...result.resource_usage } } : {}),
    };
    return deepFreeze(envelope);
  }

  /** `id` is omitted for connection-level errors that no execution can own */
  error(id: string | undefined, error: ErrorPayload): ErrorEnvelope {
    const envelope: ErrorEnvelope = {
      v: this.version,
      type: 'error',
      ...(id !== undefined ? { id } : {}),
      ts: this.ts(),
      code: error.code,
      message: error.message,
      retryable: error.retryable,
    };
    return deepFreeze(envelope);
  }

  pong(load?: Load): PongEnvelope {
    const envelope: PongEnvelope = {
      v: this.version,
      type: 'pong',
      ts: this.ts(),
      ...(load !== undefined ? { load: { ...load } } : {}),
    };
    return deepFreeze(envelope);
  }
}
