/**
 * Execution Backend contract. The backend owns isolation and resource
 * enforcement; the engine only starts, cancels and drains it.
 */

import type { OutputStream } from '../protocol/types.js';
import type { ResourceLimits, ResourceUsage } from '../execution/types.js';

export interface ExecutionSpec {
  executionId: string;
  language: string;
  code: string;
  stdin?: string;
  env?: Record<string, string>;
  limits: ResourceLimits;
}

export interface BackendHandle {
  readonly executionId: string;
}

export interface OutputChunk {
  stream: OutputStream;
  data: string;
}

export interface BackendExit {
  /** null when the process was terminated by a signal */
  exitCode: number | null;
  signal: string | null;
  /** The backend saw the process die from memory exhaustion */
  oom: boolean;
  resourceUsage?: ResourceUsage;
}

export interface ExecutionBackend {
  /** Languages this backend can run */
  readonly languages: readonly string[];
  start(spec: ExecutionSpec): Promise<BackendHandle>;
  /** Best-effort; the exit is still reported through wait() */
  signalCancel(handle: BackendHandle): Promise<void>;
  /** Next chunk in emission order, or null at end of output */
  pollOutput(handle: BackendHandle): Promise<OutputChunk | null>;
  wait(handle: BackendHandle): Promise<BackendExit>;
  /** Stop everything still running (shutdown) */
  shutdown?(): Promise<void>;
}
