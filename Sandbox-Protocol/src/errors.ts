/**
 * Error taxonomy shared by the codec, registry, watchdog and sessions.
 *
 * Every code belongs to exactly one class, and the class fixes whether the
 * initiator may retry. Resource and protocol errors are final; infrastructure
 * errors are retryable.
 */

import { BaseError } from '@fathom/shared/Types/errors.js';

export const ERROR_CODES = [
  // Resource class
  'TIMEOUT',
  'OOM',
  'OUTPUT_LIMIT',
  // Protocol class
  'LANGUAGE_NOT_SUPPORTED',
  'INVALID_REQUEST',
  'UNKNOWN_EXECUTION',
  // Infrastructure class
  'SANDBOX_OVERLOADED',
  'INTERNAL_ERROR',
  'NETWORK_ERROR',
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

export type ErrorClass = 'resource' | 'protocol' | 'infrastructure';

const ERROR_TAXONOMY: Record<ErrorCode, { errorClass: ErrorClass; retryable: boolean }> = {
  TIMEOUT: { errorClass: 'resource', retryable: false },
  OOM: { errorClass: 'resource', retryable: false },
  OUTPUT_LIMIT: { errorClass: 'resource', retryable: false },
  LANGUAGE_NOT_SUPPORTED: { errorClass: 'protocol', retryable: false },
  INVALID_REQUEST: { errorClass: 'protocol', retryable: false },
  UNKNOWN_EXECUTION: { errorClass: 'protocol', retryable: false },
  SANDBOX_OVERLOADED: { errorClass: 'infrastructure', retryable: true },
  INTERNAL_ERROR: { errorClass: 'infrastructure', retryable: true },
  NETWORK_ERROR: { errorClass: 'infrastructure', retryable: true },
};

const KNOWN_ERROR_CODES: ReadonlySet<string> = new Set(ERROR_CODES);

export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === 'string' && KNOWN_ERROR_CODES.has(value);
}

export function isRetryable(code: ErrorCode): boolean {
  return ERROR_TAXONOMY[code].retryable;
}

export function errorClassOf(code: ErrorCode): ErrorClass {
  return ERROR_TAXONOMY[code].errorClass;
}

/** Wire form of an error, as carried by `error` messages and terminal `status` messages */
export interface ErrorPayload {
  code: ErrorCode;
  message: string;
  retryable: boolean;
}

export function errorPayload(code: ErrorCode, message: string): ErrorPayload {
  return { code, message, retryable: isRetryable(code) };
}

/**
 * Protocol-level error. `retryable` is derived from the code, never chosen by the caller.
 */
export class ProtocolError extends BaseError {
  declare code: ErrorCode;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message, code, details, isRetryable(code));
    this.name = 'ProtocolError';
  }

  get errorClass(): ErrorClass {
    return errorClassOf(this.code);
  }

  toPayload(): ErrorPayload {
    return { code: this.code, message: this.message, retryable: this.retryable };
  }

  static fromPayload(payload: ErrorPayload): ProtocolError {
    return new ProtocolError(payload.code, payload.message);
  }
}

export class UnknownExecutionError extends ProtocolError {
  readonly executionId: string;

  constructor(executionId: string) {
    super('UNKNOWN_EXECUTION', `Unknown execution: ${executionId}`, { executionId });
    this.name = 'UnknownExecutionError';
    this.executionId = executionId;
  }
}

export class ExecutionAlreadyExistsError extends ProtocolError {
  readonly executionId: string;

  constructor(executionId: string) {
    super('INVALID_REQUEST', `Execution ${executionId} already exists on this connection`, { executionId });
    this.name = 'ExecutionAlreadyExistsError';
    this.executionId = executionId;
  }
}

/** An envelope travelling the wrong way, e.g. an `ack` sent to a responder */
export class UnexpectedMessageError extends ProtocolError {
  constructor(type: string, receiver: 'initiator' | 'responder') {
    super('INVALID_REQUEST', `Unexpected ${type} message: not accepted by the ${receiver}`, { type, receiver });
    this.name = 'UnexpectedMessageError';
  }
}

export type DecodeFailureReason = 'malformed' | 'unsupported_version' | 'unknown_type' | 'invalid_fields';

/**
 * Raised by the codec. Always INVALID_REQUEST; `reason` tells the session whether the
 * failure is a handshake failure (unsupported version) or a bad frame.
 */
export class DecodeError extends ProtocolError {
  readonly reason: DecodeFailureReason;
  readonly version?: number;

  constructor(reason: DecodeFailureReason, message: string, version?: number) {
    super('INVALID_REQUEST', message, version === undefined ? { reason } : { reason, version });
    this.name = 'DecodeError';
    this.reason = reason;
    this.version = version;
  }
}
