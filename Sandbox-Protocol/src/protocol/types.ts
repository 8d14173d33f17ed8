/**
 * Protocol constants: versions, the closed message catalogue, execution statuses.
 */

export const PROTOCOL_VERSION = 1;

export const SUPPORTED_VERSIONS: readonly number[] = [PROTOCOL_VERSION];

/** Default cap on combined stdout+stderr bytes when the request omits one (1 MiB) */
export const DEFAULT_MAX_OUTPUT_BYTES = 1_048_576;

export const INITIATOR_MESSAGE_TYPES = ['execute', 'cancel', 'ping'] as const;
export const RESPONDER_MESSAGE_TYPES = ['ack', 'status', 'stdout', 'stderr', 'result', 'error', 'pong'] as const;

export const MESSAGE_TYPES = [...INITIATOR_MESSAGE_TYPES, ...RESPONDER_MESSAGE_TYPES] as const;

export type InitiatorMessageType = (typeof INITIATOR_MESSAGE_TYPES)[number];
export type ResponderMessageType = (typeof RESPONDER_MESSAGE_TYPES)[number];
export type MessageType = (typeof MESSAGE_TYPES)[number];

const KNOWN_MESSAGE_TYPES: ReadonlySet<string> = new Set(MESSAGE_TYPES);

export function isMessageType(value: unknown): value is MessageType {
  return typeof value === 'string' && KNOWN_MESSAGE_TYPES.has(value);
}

/** Statuses that can travel in a `status` message. `pending` never does. */
export const WIRE_STATUSES = ['running', 'completed', 'failed', 'cancelled', 'timeout', 'oom'] as const;
export const TERMINAL_STATUSES = ['completed', 'failed', 'cancelled', 'timeout', 'oom'] as const;

export type WireStatus = (typeof WIRE_STATUSES)[number];
export type TerminalStatus = (typeof TERMINAL_STATUSES)[number];
export type ExecStatus = 'pending' | WireStatus;

const TERMINAL: ReadonlySet<string> = new Set(TERMINAL_STATUSES);

export function isTerminalStatus(status: ExecStatus): status is TerminalStatus {
  return TERMINAL.has(status);
}

export type OutputStream = 'stdout' | 'stderr';
