/**
 * Zod schemas for every envelope in the catalogue.
 *
 * Wire layout is flat: the envelope fields `v`, `type`, `id`, `ts` sit next to
 * the type-specific payload fields, e.g.
 * `{"v":1,"type":"stdout","id":"exec_1","ts":"2025-01-01T00:00:00.000Z","data":"1\n"}`.
 */

import { z } from 'zod';
import { ERROR_CODES } from '../errors.js';
import { WIRE_STATUSES } from './types.js';

const version = z.number().int().positive();
const timestamp = z.string().datetime({ offset: true });
const executionId = z.string().min(1);

export const resourceLimitsSchema = z.object({
  timeout_ms: z.number().int(),
  memory_mb: z.number().int(),
  cpu_shares: z.number().int().optional(),
  max_output_bytes: z.number().int().optional(),
});

export const resourceUsageSchema = z.object({
  peak_memory_mb: z.number().nonnegative(),
  cpu_time_ms: z.number().nonnegative(),
});

export const errorPayloadSchema = z.object({
  code: z.enum(ERROR_CODES),
  message: z.string(),
  retryable: z.boolean(),
});

export const loadSchema = z.object({
  active_executions: z.number().int().nonnegative(),
  queue_depth: z.number().int().nonnegative(),
});

// ── Initiator → responder ────────────────────────────────────────────────────

export const executeEnvelopeSchema = z.object({
  v: version,
  type: z.literal('execute'),
  id: executionId,
  ts: timestamp,
  language: z.string().min(1),
  code: z.string(),
  stdin: z.string().optional(),
  env: z.record(z.string()).optional(),
  limits: resourceLimitsSchema,
});

export const cancelEnvelopeSchema = z.object({
  v: version,
  type: z.literal('cancel'),
  id: executionId,
  ts: timestamp,
});

export const pingEnvelopeSchema = z.object({
  v: version,
  type: z.literal('ping'),
  ts: timestamp,
});

// ── Responder → initiator ────────────────────────────────────────────────────

export const ackEnvelopeSchema = z.object({
  v: version,
  type: z.literal('ack'),
  id: executionId,
  ts: timestamp,
});

export const statusEnvelopeSchema = z.object({
  v: version,
  type: z.literal('status'),
  id: executionId,
  ts: timestamp,
  status: z.enum(WIRE_STATUSES),
  error: errorPayloadSchema.optional(),
});

export const stdoutEnvelopeSchema = z.object({
  v: version,
  type: z.literal('stdout'),
  id: executionId,
  ts: timestamp,
  data: z.string(),
});

export const stderrEnvelopeSchema = z.object({
  v: version,
  type: z.literal('stderr'),
  id: executionId,
  ts: timestamp,
  data: z.string(),
});

export const resultEnvelopeSchema = z.object({
  v: version,
  type: z.literal('result'),
  id: executionId,
  ts: timestamp,
  exit_code: z.number().int().nullable(),
  duration_ms: z.number().nonnegative(),
  resource_usage: resourceUsageSchema.optional(),
});

export const errorEnvelopeSchema = z.object({
  v: version,
  type: z.literal('error'),
  id: executionId.optional(),
  ts: timestamp,
  code: z.enum(ERROR_CODES),
  message: z.string(),
  retryable: z.boolean(),
});

export const pongEnvelopeSchema = z.object({
  v: version,
  type: z.literal('pong'),
  ts: timestamp,
  load: loadSchema.optional(),
});

export const envelopeSchema = z.discriminatedUnion('type', [
  executeEnvelopeSchema,
  cancelEnvelopeSchema,
  pingEnvelopeSchema,
  ackEnvelopeSchema,
  statusEnvelopeSchema,
  stdoutEnvelopeSchema,
  stderrEnvelopeSchema,
  resultEnvelopeSchema,
  errorEnvelopeSchema,
  pongEnvelopeSchema,
]);

export type ResourceLimits = z.infer<typeof resourceLimitsSchema>;
export type ResourceUsage = z.infer<typeof resourceUsageSchema>;
export type Load = z.infer<typeof loadSchema>;

export type ExecuteEnvelope = z.infer<typeof executeEnvelopeSchema>;
export type CancelEnvelope = z.infer<typeof cancelEnvelopeSchema>;
export type PingEnvelope = z.infer<typeof pingEnvelopeSchema>;
export type AckEnvelope = z.infer<typeof ackEnvelopeSchema>;
export type StatusEnvelope = z.infer<typeof statusEnvelopeSchema>;
export type StdoutEnvelope = z.infer<typeof stdoutEnvelopeSchema>;
export type StderrEnvelope = z.infer<typeof stderrEnvelopeSchema>;
export type ResultEnvelope = z.infer<typeof resultEnvelopeSchema>;
export type ErrorEnvelope = z.infer<typeof errorEnvelopeSchema>;
export type PongEnvelope = z.infer<typeof pongEnvelopeSchema>;

export type Envelope = z.infer<typeof envelopeSchema>;
