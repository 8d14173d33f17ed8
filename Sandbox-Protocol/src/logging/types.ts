/**
 * Audit log entry for finished executions (daily rotation).
 */

import type { BaseAuditEntry } from '@fathom/shared/Logging/jsonl.js';
import type { ErrorCode } from '../errors.js';
import type { TerminalStatus } from '../protocol/types.js';

/** What the responder reports when an execution finishes */
export interface ExecutionAuditRecord {
  execution_id: string;
  language: string;
  status: TerminalStatus;
  error_code: ErrorCode | null;
  exit_code: number | null;
  duration_ms: number;
  output_bytes: number;
  connection_id: string;
  finished_at: string;
}

export interface ExecutionAuditEntry extends BaseAuditEntry, ExecutionAuditRecord {
  type: 'execution';
}
