/**
 * Map a backend exit to the terminal status the responder reports.
 */

import { errorPayload, type ErrorPayload } from '../errors.js';
import type { BackendExit } from '../backend/types.js';
import type { TerminalStatus } from '../protocol/types.js';
import type { ResourceLimits } from './types.js';

export interface ExitClassification {
  status: TerminalStatus;
  error?: ErrorPayload;
}

/**
 * - killed after a cancel was requested: cancelled
 * - killed by memory exhaustion: oom
 * - exited on its own, any code: completed (a process that finished before the
 *   cancel took effect counts as completed; first transition wins)
 * - killed by anything else: failed/INTERNAL_ERROR
 */
export function classifyExit(exit: BackendExit, cancelRequested: boolean, limits: ResourceLimits): ExitClassification {
  if (cancelRequested && exit.exitCode === null && !exit.oom) {
    return { status: 'cancelled' };
  }
  if (exit.oom) {
    return {
      status: 'oom',
      error: errorPayload('OOM', `Execution exceeded its ${limits.memory_mb} MB memory limit`),
    };
  }
  if (exit.exitCode !== null) {
    return { status: 'completed' };
  }
  return {
    status: 'failed',
    error: errorPayload('INTERNAL_ERROR', `Execution was terminated by ${exit.signal ?? 'an unknown signal'}`),
  };
}
