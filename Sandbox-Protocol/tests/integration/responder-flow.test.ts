/**
 * Responder protocol flow over an in-memory connection.
 *
 * The test plays the initiator with raw frames and checks exactly what the
 * responder writes back, in order.
 */

import { describe, it, expect, vi } from 'vitest';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ResponderSession, type ResponderSessionOptions } from '../../src/connection/responder.js';
import { ExecutionAuditLog } from '../../src/logging/writer.js';
import type { ExecutionAuditRecord } from '../../src/logging/types.js';
import { ExecutionSlots } from '../../src/utils/execution-slots.js';
import { createWire } from '../helpers/transport-pair.js';
import { ScriptedBackend, type Script } from '../helpers/scripted-backend.js';
import type { ExecutionSpec } from '../../src/backend/types.js';

class CapturingAudit extends ExecutionAuditLog {
  readonly records: ExecutionAuditRecord[] = [];

  constructor() {
    super(join(tmpdir(), 'fathom-audit-unused'));
  }

  async record(entry: ExecutionAuditRecord): Promise<void> {
    this.records.push(entry);
  }
}

function setup(
  script: (spec: ExecutionSpec) => Script = () => ({}),
  options: Partial<Omit<ResponderSessionOptions, 'transport' | 'backend'>> = {},
) {
  const { wire, transport } = createWire();
  const backend = new ScriptedBackend(script);
  const session = new ResponderSession({ transport, backend, ...options });
  return { wire, backend, session };
}

function execute(id: string, overrides: Record<string, unknown> = {}) {
  return {
    type: 'execute',
    id,
    language: 'python',
    code: 'print(1)',
    limits: { timeout_ms: 5_000, memory_mb: 128 },
    ...overrides,
  };
}

describe('execute lifecycle', () => {
  it('should ack, run, stream output and finish with a result', async () => {
    const audit = new CapturingAudit();
    const { wire, backend, session } = setup(
      () => ({ chunks: [{ stream: 'stdout', data: '1\n' }] }),
      { audit },
    );

    wire.send(execute('exec_1'));

    await vi.waitFor(() => expect(wire.types()).toEqual(['ack', 'status', 'stdout', 'status', 'result']));
    const [ack, running, stdout, completed, result] = wire.received;
    expect(ack).toMatchObject({ v: 1, type: 'ack', id: 'exec_1' });
    expect(running).toMatchObject({ type: 'status', id: 'exec_1', status: 'running' });
    expect(stdout).toMatchObject({ type: 'stdout', id: 'exec_1', data: '1\n' });
    expect(completed).toMatchObject({ type: 'status', id: 'exec_1', status: 'completed' });
    expect('error' in completed).toBe(false);
    expect(result).toMatchObject({ type: 'result', id: 'exec_1', exit_code: 0 });

    expect(backend.started).toEqual([{
      executionId: 'exec_1',
      language: 'python',
      code: 'print(1)',
      limits: { timeout_ms: 5_000, memory_mb: 128 },
    }]);
    expect(session.listExecutions()).toEqual([]);
    expect(audit.records).toEqual([expect.objectContaining({
      execution_id: 'exec_1',
      language: 'python',
      status: 'completed',
      error_code: null,
      exit_code: 0,
      output_bytes: 2,
      connection_id: session.connectionId,
    })]);
  });

  it('should keep stdout and stderr chunks in backend order', async () => {
    const { wire } = setup(() => ({
      chunks: [
        { stream: 'stdout', data: 'a' },
        { stream: 'stderr', data: 'b' },
        { stream: 'stdout', data: 'c' },
      ],
    }));

    wire.send(execute('exec_1'));

    await vi.waitFor(() => expect(wire.types()).toContain('result'));
    const chunks = wire.received.flatMap((envelope) =>
      envelope.type === 'stdout' || envelope.type === 'stderr' ? [`${envelope.type}:${envelope.data}`] : [],
    );
    expect(chunks).toEqual(['stdout:a', 'stderr:b', 'stdout:c']);
  });

  it('should report a non-zero exit as completed with its code', async () => {
    const { wire } = setup(() => ({ exit: { exitCode: 3, signal: null, oom: false } }));
    wire.send(execute('exec_1'));

    await vi.waitFor(() => expect(wire.types()).toContain('result'));
    expect(wire.received[2]).toMatchObject({ type: 'status', status: 'completed' });
    expect(wire.received[3]).toMatchObject({ type: 'result', exit_code: 3 });
  });

  it('should report memory exhaustion as oom with an OOM error', async () => {
    const { wire } = setup(() => ({ exit: { exitCode: null, signal: 'SIGKILL', oom: true } }));
    wire.send(execute('exec_1'));

    await vi.waitFor(() => expect(wire.types()).toContain('result'));
    expect(wire.received[2]).toMatchObject({
      type: 'status',
      status: 'oom',
      error: { code: 'OOM', message: 'Execution exceeded its 128 MB memory limit', retryable: false },
    });
    expect(wire.received[3]).toMatchObject({ type: 'result', exit_code: null });
  });

  it('should fail with INTERNAL_ERROR when the backend cannot start', async () => {
    const { wire } = setup(() => ({ failStart: new Error('disk full') }));
    wire.send(execute('exec_1'));

    await vi.waitFor(() => expect(wire.types()).toEqual(['ack', 'status', 'status', 'result']));
    expect(wire.received[2]).toMatchObject({
      status: 'failed',
      error: { code: 'INTERNAL_ERROR', message: 'Backend failed to start execution: disk full', retryable: true },
    });
  });

  it('should list a running execution', async () => {
    const { wire, session } = setup(() => ({ hang: true }));
    wire.send(execute('exec_1'));

    await vi.waitFor(() => expect(wire.types()).toEqual(['ack', 'status']));
    expect(session.listExecutions()).toEqual([expect.objectContaining({
      execution_id: 'exec_1',
      status: 'running',
      acknowledged: true,
      cancel_requested: false,
    })]);
    session.close();
  });
});

describe('rejections', () => {
  it('should reject an unsupported language without an ack', async () => {
    const { wire, backend, session } = setup();
    wire.send(execute('exec_r', { language: 'rust', code: 'fn main() {}' }));

    await vi.waitFor(() => expect(wire.received).toHaveLength(1));
    expect(wire.received[0]).toMatchObject({
      type: 'error',
      id: 'exec_r',
      code: 'LANGUAGE_NOT_SUPPORTED',
      message: 'Language not supported: rust',
      retryable: false,
    });
    expect(backend.started).toEqual([]);
    expect(session.activeExecutions).toBe(0);
  });

  it('should reject limits outside the configured bounds', async () => {
    const { wire } = setup(undefined, { policy: { maxMemoryMb: 1024 } });
    wire.send(execute('exec_1', { limits: { timeout_ms: 0, memory_mb: 128 } }));
    wire.send(execute('exec_2', { limits: { timeout_ms: 1_000, memory_mb: 4_096 } }));

    await vi.waitFor(() => expect(wire.received).toHaveLength(2));
    expect(wire.received.map((envelope) => envelope.type === 'error' ? envelope.message : envelope.type)).toEqual([
      'limits.timeout_ms must be between 1 and 300000 (got 0)',
      'limits.memory_mb must be between 1 and 1024 (got 4096)',
    ]);
  });

  it('should reject a duplicate id on the same connection', async () => {
    const { wire, session } = setup(() => ({ hang: true }));
    wire.send(execute('exec_1'));
    wire.send(execute('exec_1'));

    await vi.waitFor(() => expect(wire.types()).toContain('error'));
    const errors = wire.received.filter((envelope) => envelope.type === 'error');
    expect(errors).toEqual([expect.objectContaining({
      id: 'exec_1',
      code: 'INVALID_REQUEST',
      message: 'Execution exec_1 already exists on this connection',
    })]);
    expect(wire.types().filter((type) => type === 'ack')).toHaveLength(1);
    session.close();
  });

  it('should refuse work with SANDBOX_OVERLOADED when slots and queue are full', async () => {
    const slots = new ExecutionSlots(1, 0);
    const { wire, session } = setup(() => ({ hang: true }), { slots });
    wire.send(execute('exec_a'));
    wire.send(execute('exec_b'));

    await vi.waitFor(() => expect(wire.about('exec_b')).toHaveLength(1));
    expect(wire.about('exec_b')[0]).toMatchObject({
      type: 'error',
      code: 'SANDBOX_OVERLOADED',
      message: 'Sandbox at capacity (1 running, 0 queued)',
      retryable: true,
    });
    session.close();
  });

  it('should share capacity across connections', async () => {
    const slots = new ExecutionSlots(1, 0);
    const first = setup(() => ({ hang: true }), { slots });
    const second = setup(() => ({ hang: true }), { slots });

    first.wire.send(execute('exec_a'));
    await vi.waitFor(() => expect(first.wire.types()).toEqual(['ack', 'status']));

    second.wire.send(execute('exec_b'));
    await vi.waitFor(() => expect(second.wire.received).toHaveLength(1));
    expect(second.wire.received[0]).toMatchObject({ type: 'error', code: 'SANDBOX_OVERLOADED' });

    first.session.close();
    second.session.close();
  });

  it('should accept new work once a slot frees up', async () => {
    const slots = new ExecutionSlots(1, 0);
    const { wire } = setup(() => ({}), { slots });
    wire.send(execute('exec_a'));
    await vi.waitFor(() => expect(wire.about('exec_a').map((envelope) => envelope.type)).toContain('result'));

    wire.send(execute('exec_b'));
    await vi.waitFor(() => expect(wire.about('exec_b').map((envelope) => envelope.type)).toContain('result'));
    expect(wire.about('exec_b')[0].type).toBe('ack');
  });
});

describe('cancel', () => {
  it('should answer a cancel for an unknown id with UNKNOWN_EXECUTION', async () => {
    const { wire, session } = setup();
    wire.send({ type: 'cancel', id: 'exec_missing' });

    await vi.waitFor(() => expect(wire.received).toHaveLength(1));
    expect(wire.received[0]).toMatchObject({
      type: 'error',
      id: 'exec_missing',
      code: 'UNKNOWN_EXECUTION',
      message: 'Unknown execution: exec_missing',
      retryable: false,
    });
    expect(session.activeExecutions).toBe(0);
  });

  it('should cancel a running execution through the backend', async () => {
    const { wire, backend } = setup(() => ({ hang: true }));
    wire.send(execute('exec_1'));
    await vi.waitFor(() => expect(wire.types()).toEqual(['ack', 'status']));

    wire.send({ type: 'cancel', id: 'exec_1' });

    await vi.waitFor(() => expect(wire.types()).toEqual(['ack', 'status', 'status', 'result']));
    expect(wire.received[2]).toMatchObject({ type: 'status', status: 'cancelled' });
    expect('error' in wire.received[2]).toBe(false);
    expect(wire.received[3]).toMatchObject({ type: 'result', exit_code: null });
    expect(backend.cancelled).toEqual(['exec_1']);
  });

  it('should report completed when the process exits before the cancel lands', async () => {
    const { wire, backend } = setup(() => ({ hang: true }));
    wire.send(execute('exec_1'));
    await vi.waitFor(() => expect(wire.types()).toEqual(['ack', 'status']));

    backend.complete('exec_1', { exitCode: 0, signal: null, oom: false });
    wire.send({ type: 'cancel', id: 'exec_1' });

    await vi.waitFor(() => expect(wire.types()).toContain('result'));
    const statuses = wire.received.flatMap((envelope) => envelope.type === 'status' ? [envelope.status] : []);
    expect(statuses).toEqual(['running', 'completed']);
  });

  it('should cancel a queued execution without starting it', async () => {
    const slots = new ExecutionSlots(1, 4);
    const { wire, backend, session } = setup(() => ({ hang: true }), { slots });
    wire.send(execute('exec_a'));
    wire.send(execute('exec_b'));
    await vi.waitFor(() => expect(wire.about('exec_b').map((envelope) => envelope.type)).toEqual(['ack']));

    wire.send({ type: 'cancel', id: 'exec_b' });

    await vi.waitFor(() =>
      expect(wire.about('exec_b').map((envelope) => envelope.type)).toEqual(['ack', 'status', 'result']),
    );
    expect(wire.about('exec_b')[1]).toMatchObject({ status: 'cancelled' });
    expect(backend.started.map((spec) => spec.executionId)).toEqual(['exec_a']);
    expect(slots.queueDepth).toBe(0);
    session.close();
  });
});

describe('resource limits', () => {
  it('should time out an execution that runs past timeout_ms', async () => {
    const { wire, backend } = setup(() => ({ hang: true }));
    wire.send(execute('exec_t', { limits: { timeout_ms: 50, memory_mb: 128 } }));

    await vi.waitFor(() => expect(wire.types()).toEqual(['ack', 'status', 'status', 'result']));
    expect(wire.received[2]).toMatchObject({
      type: 'status',
      status: 'timeout',
      error: { code: 'TIMEOUT', message: 'Execution exceeded its 50ms timeout', retryable: false },
    });
    expect(wire.received[3]).toMatchObject({ type: 'result', exit_code: null });
    expect(backend.cancelled).toEqual(['exec_t']);
  });

  it('should fail with OUTPUT_LIMIT and drop the chunk that crossed it', async () => {
    const { wire, backend } = setup(() => ({
      hang: true,
      chunks: [
        { stream: 'stdout', data: 'abc' },
        { stream: 'stdout', data: 'defg' },
        { stream: 'stdout', data: 'never sent' },
      ],
    }));
    wire.send(execute('exec_o', { limits: { timeout_ms: 5_000, memory_mb: 128, max_output_bytes: 4 } }));

    await vi.waitFor(() => expect(wire.types()).toEqual(['ack', 'status', 'stdout', 'status', 'result']));
    expect(wire.received[2]).toMatchObject({ type: 'stdout', data: 'abc' });
    expect(wire.received[3]).toMatchObject({
      type: 'status',
      status: 'failed',
      error: {
        code: 'OUTPUT_LIMIT',
        message: 'stdout pushed output to 7 bytes, over the 4 byte limit',
        retryable: false,
      },
    });
    expect(wire.received[4]).toMatchObject({ type: 'result', exit_code: null });
    expect(backend.cancelled).toEqual(['exec_o']);
  });
});

describe('ping', () => {
  it('should answer with the connection load', async () => {
    const slots = new ExecutionSlots(1, 4);
    const { wire, session } = setup(() => ({ hang: true }), { slots });

    wire.send({ type: 'ping' });
    await vi.waitFor(() => expect(wire.types()).toEqual(['pong']));
    expect(wire.received[0]).toMatchObject({ load: { active_executions: 0, queue_depth: 0 } });

    wire.send(execute('exec_a'));
    wire.send(execute('exec_b'));
    wire.send({ type: 'ping' });
    await vi.waitFor(() => expect(wire.types().filter((type) => type === 'pong')).toHaveLength(2));
    const pong = wire.received.filter((envelope) => envelope.type === 'pong')[1];
    expect(pong).toMatchObject({ load: { active_executions: 1, queue_depth: 1 } });
    session.close();
  });
});

describe('connection handling', () => {
  it('should abandon live executions and stop the backend when the peer goes away', async () => {
    const audit = new CapturingAudit();
    const { wire, backend, session } = setup(() => ({ hang: true }), { audit });
    wire.send(execute('exec_1'));
    await vi.waitFor(() => expect(wire.types()).toEqual(['ack', 'status']));

    wire.transport.close();

    await vi.waitFor(() => expect(backend.cancelled).toEqual(['exec_1']));
    expect(session.isClosed).toBe(true);
    expect(session.activeExecutions).toBe(0);
    expect(audit.records).toEqual([expect.objectContaining({
      execution_id: 'exec_1',
      status: 'failed',
      error_code: 'NETWORK_ERROR',
    })]);
  });

  it('should fail the handshake on an unsupported first version', async () => {
    const { wire, session } = setup();
    wire.send({ v: 2, type: 'ping' });

    await vi.waitFor(() => expect(wire.transport.isOpen).toBe(false));
    expect(wire.received).toHaveLength(1);
    expect(wire.received[0]).toMatchObject({
      type: 'error',
      code: 'INVALID_REQUEST',
      message: 'Unsupported protocol version 2 (supported: 1)',
    });
    expect('id' in wire.received[0]).toBe(false);
    expect(session.isClosed).toBe(true);
  });

  it('should fix the version from the first envelope', async () => {
    const { wire, session } = setup(undefined, { supportedVersions: [1, 2] });
    expect(session.version).toBeNull();
    wire.send({ v: 1, type: 'ping' });

    await vi.waitFor(() => expect(wire.types()).toEqual(['pong']));
    expect(wire.received[0].v).toBe(1);
    expect(session.version).toBe(1);
  });

  it('should report a version change after negotiation and stay open', async () => {
    const { wire, session } = setup(undefined, { supportedVersions: [1, 2] });
    wire.send({ v: 1, type: 'ping' });
    wire.send({ v: 2, type: 'ping' });

    await vi.waitFor(() => expect(wire.types()).toEqual(['pong', 'error']));
    expect(wire.received[1]).toMatchObject({
      code: 'INVALID_REQUEST',
      message: 'Envelope version 2 does not match negotiated version 1',
    });
    expect(session.isClosed).toBe(false);
  });

  it('should take the version declared by the transport', async () => {
    const { wire, transport } = createWire();
    transport.declaredVersion = 2;
    const session = new ResponderSession({ transport, backend: new ScriptedBackend(), supportedVersions: [1, 2] });
    expect(session.version).toBe(2);

    wire.send({ v: 1, type: 'ping' });
    await vi.waitFor(() => expect(wire.types()).toEqual(['error']));
    expect(wire.received[0]).toMatchObject({ v: 2, message: 'Envelope version 1 does not match negotiated version 2' });
  });

  it('should reject a message that only a responder sends', async () => {
    const { wire, session } = setup();
    wire.send({ type: 'ack', id: 'exec_1' });

    await vi.waitFor(() => expect(wire.received).toHaveLength(1));
    expect(wire.received[0]).toMatchObject({
      type: 'error',
      code: 'INVALID_REQUEST',
      message: 'Unexpected ack message: not accepted by the responder',
    });
    expect(session.isClosed).toBe(false);
  });

  it('should report a malformed frame and keep serving', async () => {
    const { wire } = setup();
    wire.sendRaw('not json');
    wire.send({ type: 'ping' });

    await vi.waitFor(() => expect(wire.types()).toEqual(['error', 'pong']));
    expect(wire.received[0]).toMatchObject({ code: 'INVALID_REQUEST', message: 'Frame is not valid JSON' });
  });
});
