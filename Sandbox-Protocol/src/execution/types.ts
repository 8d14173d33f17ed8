/**
 * Execution data model.
 */

import type { ErrorPayload } from '../errors.js';
import type { ResourceLimits, ResourceUsage } from '../protocol/schemas.js';
import type { ExecStatus, TerminalStatus } from '../protocol/types.js';

export type { ResourceLimits, ResourceUsage } from '../protocol/schemas.js';

/** Created by the initiator; immutable once sent */
export interface ExecutionRequest {
  id: string;
  language: string;
  code: string;
  stdin?: string;
  /** Insertion order is preserved on the wire and when overlaid on the sandbox env */
  env?: Record<string, string>;
  limits: ResourceLimits;
}

/** Attached once a terminal status has been entered; never mutated afterward */
export interface ExecutionResult {
  exit_code: number | null;
  duration_ms: number;
  resource_usage?: ResourceUsage;
}

/** Tagged execution state. Terminal variants are immutable once entered. */
export type ExecState =
  | { status: 'pending' }
  | { status: 'running'; startedAt: number }
  | { status: TerminalStatus; finishedAt: number; error?: ErrorPayload };

/** Read-only view of one execution, as listed by the sessions */
export interface ExecutionSnapshot {
  execution_id: string;
  language: string;
  status: ExecStatus;
  acknowledged: boolean;
  created_at: string;
  deadline_at: string;
  accumulated_output_bytes: number;
  cancel_requested: boolean;
  abandoned: boolean;
  error?: ErrorPayload;
  result?: ExecutionResult;
}
