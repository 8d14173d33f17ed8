/**
 * Sandbox Protocol configuration
 *
 * Zod-validated environment config and environment stripping for
 * subprocess sandboxing.
 */

import { z } from 'zod';
import { homedir } from 'node:os';
import { resolve } from 'node:path';
import { ConfigurationError } from '@fathom/shared/Types/errors.js';

// ── Schema ───────────────────────────────────────────────────────────────────

const commaList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0),
    )
    .refine((items) => items.length > 0, { message: 'must list at least one value' });

const configSchema = z
  .object({
    transport: z.enum(['stdio', 'ws']).default('stdio'),
    host: z.string().min(1).default('127.0.0.1'),
    port: z.coerce.number().int().min(0).max(65_535).default(8790),
    supportedVersions: commaList('1').pipe(
      z.array(z.coerce.number().int().positive()),
    ),
    languages: commaList('python,node,bash'),
    maxTimeoutMs: z.coerce.number().int().positive().default(300_000),
    maxMemoryMb: z.coerce.number().int().positive().default(2048),
    maxCpuShares: z.coerce.number().int().positive().default(1024),
    maxOutputBytes: z.coerce.number().int().positive().default(16_777_216), // 16MB
    maxConcurrentExecutions: z.coerce.number().int().positive().default(4),
    maxQueueDepth: z.coerce.number().int().nonnegative().default(16),
    reconnectBaseMs: z.coerce.number().int().positive().default(100),
    reconnectMaxMs: z.coerce.number().int().positive().default(30_000),
    pingIntervalMs: z.coerce.number().int().positive().default(15_000),
    pingTimeoutMs: z.coerce.number().int().positive().default(5_000),
    timeoutGraceMs: z.coerce.number().int().nonnegative().default(5_000),
    sandboxDir: z.string().default('~/.fathom/sandbox'),
    logDir: z.string().default('~/.fathom/logs'),
    maxProcesses: z.coerce.number().int().positive().default(64),
    maxFileSizeBytes: z.coerce.number().int().positive().default(52_428_800), // 50MB
  })
  .refine((config) => config.reconnectBaseMs <= config.reconnectMaxMs, {
    message: 'FATHOM_RECONNECT_BASE_MS must not exceed FATHOM_RECONNECT_MAX_MS',
    path: ['reconnectBaseMs'],
  });

export type SandboxConfig = z.infer<typeof configSchema>;

// ── Helpers ──────────────────────────────────────────────────────────────────

export function expandHome(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return p.replace('~', homedir());
  }
  return p;
}

// ── Singleton ────────────────────────────────────────────────────────────────

let cached: SandboxConfig | null = null;

export function getConfig(): SandboxConfig {
  if (cached) return cached;

  const raw = {
    transport: process.env.FATHOM_TRANSPORT,
    host: process.env.FATHOM_HOST,
    port: process.env.FATHOM_PORT,
    supportedVersions: process.env.FATHOM_SUPPORTED_VERSIONS,
    languages: process.env.FATHOM_LANGUAGES,
    maxTimeoutMs: process.env.FATHOM_MAX_TIMEOUT_MS,
    maxMemoryMb: process.env.FATHOM_MAX_MEMORY_MB,
    maxCpuShares: process.env.FATHOM_MAX_CPU_SHARES,
    maxOutputBytes: process.env.FATHOM_MAX_OUTPUT_BYTES,
    maxConcurrentExecutions: process.env.FATHOM_MAX_CONCURRENT_EXECUTIONS,
    maxQueueDepth: process.env.FATHOM_MAX_QUEUE_DEPTH,
    reconnectBaseMs: process.env.FATHOM_RECONNECT_BASE_MS,
    reconnectMaxMs: process.env.FATHOM_RECONNECT_MAX_MS,
    pingIntervalMs: process.env.FATHOM_PING_INTERVAL_MS,
    pingTimeoutMs: process.env.FATHOM_PING_TIMEOUT_MS,
    timeoutGraceMs: process.env.FATHOM_TIMEOUT_GRACE_MS,
    sandboxDir: process.env.FATHOM_SANDBOX_DIR,
    logDir: process.env.FATHOM_LOG_DIR,
    maxProcesses: process.env.FATHOM_MAX_PROCESSES,
    maxFileSizeBytes: process.env.FATHOM_MAX_FILE_SIZE_BYTES,
  };

  // Strip undefined keys so Zod defaults kick in
  const cleaned = Object.fromEntries(
    Object.entries(raw).filter(([, v]) => v !== undefined),
  );

  const result = configSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigurationError(`Sandbox config error: ${result.error.message}`, {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  // Expand ~ in paths
  const config = result.data;
  config.sandboxDir = resolve(expandHome(config.sandboxDir));
  config.logDir = resolve(expandHome(config.logDir));

  cached = config;
  return config;
}

/** Reset cached config (for testing) */
export function resetConfig(): void {
  cached = null;
}

// ── Stripped Environment ─────────────────────────────────────────────────────

const ENV_ALLOWLIST = ['PATH', 'HOME', 'LANG', 'TERM', 'TMPDIR', 'USER'];

/**
 * Build a minimal environment for subprocess execution.
 * Only allowlisted vars pass through, then the request's own `env` is
 * overlaid in insertion order.
 */
export function getStrippedEnv(overlay: Record<string, string> = {}): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of ENV_ALLOWLIST) {
    const val = process.env[key];
    if (val !== undefined) {
      env[key] = val;
    }
  }
  for (const [key, value] of Object.entries(overlay)) {
    env[key] = value;
  }
  return env;
}
