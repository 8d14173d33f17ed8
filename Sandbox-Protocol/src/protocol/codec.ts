/**
 * Envelope codec: JSON text <-> validated, frozen envelopes.
 *
 * Decoding never throws. Failures come back as a DecodeError (always
 * INVALID_REQUEST) so the connection session can report them without ever
 * touching the execution registry.
 */

import type { ZodError } from 'zod';
import { DecodeError, type DecodeFailureReason } from '../errors.js';
import { deepFreeze, isRecord } from '../utils/freeze.js';
import { envelopeSchema, type Envelope } from './schemas.js';
import { isMessageType, SUPPORTED_VERSIONS } from './types.js';

export type DecodeResult =
  | { ok: true; envelope: Envelope }
  | { ok: false; error: DecodeError };

function fail(reason: DecodeFailureReason, message: string, version?: number): DecodeResult {
  return { ok: false, error: new DecodeError(reason, message, version) };
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

export class EnvelopeCodec {
  private readonly supportedVersions: readonly number[];

  constructor(supportedVersions: readonly number[] = SUPPORTED_VERSIONS) {
    this.supportedVersions = supportedVersions;
  }

  supports(version: number): boolean {
    return this.supportedVersions.includes(version);
  }

  getSupportedVersions(): readonly number[] {
    return this.supportedVersions;
  }

  decode(frame: string | Buffer): DecodeResult {
    const text = typeof frame === 'string' ? frame : frame.toString('utf-8');

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      return fail('malformed', 'Frame is not valid JSON');
    }
    if (!isRecord(raw)) {
      return fail('malformed', 'Frame is not a JSON object');
    }

    const { v, type } = raw;
    if (typeof v !== 'number' || !Number.isInteger(v)) {
      return fail('invalid_fields', 'Missing or non-integer field: v');
    }
    if (!this.supports(v)) {
      return fail(
        'unsupported_version',
        `Unsupported protocol version ${v} (supported: ${this.supportedVersions.join(', ')})`,
        v,
      );
    }
    if (type === undefined) {
      return fail('invalid_fields', 'Missing required field: type', v);
    }
    if (!isMessageType(type)) {
      return fail('unknown_type', `Unrecognized message type: ${String(type)}`, v);
    }

    const parsed = envelopeSchema.safeParse(raw);
    if (!parsed.success) {
      return fail('invalid_fields', `Invalid ${type} message: ${formatIssues(parsed.error)}`, v);
    }
    return { ok: true, envelope: deepFreeze(parsed.data) };
  }

  encode(envelope: Envelope): string {
    return JSON.stringify(envelope);
  }
}
