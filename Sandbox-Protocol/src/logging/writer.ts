/**
 * JSONL audit writer: one line per finished execution in
 * `executions-YYYY-MM-DD.jsonl` under the configured log directory.
 */

import { JsonlLogger, type AuditReadOptions } from '@fathom/shared/Logging/jsonl.js';
import { Logger } from '@fathom/shared/Utils/logger.js';
import type { ExecutionAuditEntry, ExecutionAuditRecord } from './types.js';

const logger = new Logger('fathom:audit');

export class ExecutionAuditLog {
  private readonly jsonl: JsonlLogger<ExecutionAuditEntry>;

  constructor(logDir: string) {
    this.jsonl = new JsonlLogger<ExecutionAuditEntry>(logDir, 'executions');
  }

  /**
   * Append an entry. Failures are logged and never reach the caller.
   */
  async record(entry: ExecutionAuditRecord): Promise<void> {
    try {
      await this.jsonl.write({ type: 'execution', timestamp: entry.finished_at, ...entry });
    } catch (err) {
      logger.error('Failed to write audit log', { executionId: entry.execution_id, error: err });
    }
  }

  read(options?: AuditReadOptions<ExecutionAuditEntry>): Promise<ExecutionAuditEntry[]> {
    return this.jsonl.read(options);
  }

  pathFor(day?: string): string {
    return this.jsonl.pathFor(day);
  }
}
