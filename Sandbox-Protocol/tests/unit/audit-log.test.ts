import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { ExecutionAuditLog } from '../../src/logging/writer.js';
import type { ExecutionAuditRecord } from '../../src/logging/types.js';

let testLogDir: string;

beforeEach(async () => {
  testLogDir = join(tmpdir(), `fathom-audit-test-${randomUUID().slice(0, 8)}`);
  await mkdir(testLogDir, { recursive: true });
});

afterEach(async () => {
  await rm(testLogDir, { recursive: true, force: true });
});

function record(overrides: Partial<ExecutionAuditRecord> = {}): ExecutionAuditRecord {
  return {
    execution_id: 'exec_1',
    language: 'python',
    status: 'completed',
    error_code: null,
    exit_code: 0,
    duration_ms: 42,
    output_bytes: 2,
    connection_id: 'conn_1',
    finished_at: '2025-03-01T10:00:00.000Z',
    ...overrides,
  };
}

describe('ExecutionAuditLog', () => {
  it('should write entries into the file of the day they finished', async () => {
    const audit = new ExecutionAuditLog(testLogDir);
    await audit.record(record());

    expect(audit.pathFor('2025-03-01')).toBe(join(testLogDir, 'executions-2025-03-01.jsonl'));
    expect(existsSync(audit.pathFor('2025-03-01'))).toBe(true);

    const entries = await audit.read({ day: '2025-03-01' });
    expect(entries).toEqual([{ type: 'execution', timestamp: '2025-03-01T10:00:00.000Z', ...record() }]);
  });

  it('should read newest first and apply filters', async () => {
    const audit = new ExecutionAuditLog(testLogDir);
    await audit.record(record({ execution_id: 'exec_1', finished_at: '2025-03-01T10:00:00.000Z' }));
    await audit.record(record({
      execution_id: 'exec_2',
      status: 'timeout',
      error_code: 'TIMEOUT',
      exit_code: null,
      finished_at: '2025-03-01T11:00:00.000Z',
    }));

    const all = await audit.read({ day: '2025-03-01' });
    expect(all.map((entry) => entry.execution_id)).toEqual(['exec_2', 'exec_1']);

    const timeouts = await audit.read({ day: '2025-03-01', filter: (entry) => entry.status === 'timeout' });
    expect(timeouts.map((entry) => entry.execution_id)).toEqual(['exec_2']);
  });

  it('should return nothing for a day without a file', async () => {
    const audit = new ExecutionAuditLog(testLogDir);
    await expect(audit.read({ day: '2024-01-01' })).resolves.toEqual([]);
  });

  it('should not throw when the log directory cannot be created', async () => {
    const blocker = join(testLogDir, 'not-a-dir');
    await writeFile(blocker, 'x');
    const audit = new ExecutionAuditLog(join(blocker, 'logs'));
    await expect(audit.record(record())).resolves.toBeUndefined();
  });
});
