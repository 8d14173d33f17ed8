/**
 * Subprocess execution backend.
 *
 * Spawns a child process per execution with:
 * - Stripped environment (no API keys/tokens), overlaid with the request env
 * - ulimit guards for process count, file size and (python/bash) memory
 * - Output streamed chunk by chunk in emission order, with the pipes paused
 *   while more than 1MB sits unread
 * - Cancel as SIGTERM → grace → SIGKILL
 * - A fresh working directory, removed when the process exits
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ValidationError } from '@fathom/shared/Types/errors.js';
import { Logger } from '@fathom/shared/Utils/logger.js';
import { getConfig, getStrippedEnv } from '../config.js';
import { AsyncChannel } from '../utils/async-channel.js';
import { generateExecutionId } from '../utils/id-generator.js';
import type { ResourceLimits } from '../execution/types.js';
import type { BackendExit, BackendHandle, ExecutionBackend, ExecutionSpec, OutputChunk } from './types.js';

const logger = new Logger('fathom:subprocess');

export const SUBPROCESS_LANGUAGES = ['python', 'node', 'bash'] as const;
export type SubprocessLanguage = (typeof SUBPROCESS_LANGUAGES)[number];

/** Map language to script filename */
const SCRIPT_FILES: Record<SubprocessLanguage, string> = {
  python: '_fathom_script.py',
  node: '_fathom_script.mjs',
  bash: '_fathom_script.sh',
};

/** stderr text that marks an allocation failure in each runtime */
const OOM_MARKERS = ['MemoryError', 'JavaScript heap out of memory', 'Cannot allocate memory'];

const STDERR_TAIL_BYTES = 4096;
const SIGKILL_GRACE_MS = 5_000;
const OUTPUT_HIGH_WATER_BYTES = 1_048_576; // 1MB unread
const OUTPUT_LOW_WATER_BYTES = 262_144;

const KNOWN_LANGUAGES: ReadonlySet<string> = new Set(SUBPROCESS_LANGUAGES);

function isSubprocessLanguage(language: string): language is SubprocessLanguage {
  return KNOWN_LANGUAGES.has(language);
}

/** Map cpu_shares (1024 = one full share) to a nice level: fewer shares, nicer process */
export function niceLevel(cpuShares: number): number {
  const level = Math.round(10 * (1 - cpuShares / 1024));
  return Math.min(19, Math.max(0, level));
}

export interface SubprocessBackendOptions {
  sandboxDir?: string;
  languages?: readonly SubprocessLanguage[];
  maxProcesses?: number;
  maxFileSizeBytes?: number;
  killGraceMs?: number;
}

/** Build the `bash -c` command line for one execution */
export function buildCommand(
  language: SubprocessLanguage,
  scriptFile: string,
  limits: ResourceLimits,
  guards: { maxProcesses: number; maxFileSizeBytes: number },
): [string, string[]] {
  const maxFileBlocks = Math.floor(guards.maxFileSizeBytes / 512);
  let ulimits = `ulimit -u ${guards.maxProcesses} -f ${maxFileBlocks}`;
  if (language !== 'node') {
    // V8 reserves far more address space than it uses, so node is capped through its heap flag instead
    ulimits += ` -v ${limits.memory_mb * 1024}`;
  }
  const nice = limits.cpu_shares !== undefined ? `nice -n ${niceLevel(limits.cpu_shares)} ` : '';

  switch (language) {
    case 'python': return ['bash', ['-c', `${ulimits} && exec ${nice}python3 ${scriptFile}`]];
    case 'node': return ['bash', ['-c', `${ulimits} && exec ${nice}node --max-old-space-size=${limits.memory_mb} ${scriptFile}`]];
    case 'bash': return ['bash', ['-c', `${ulimits} && exec ${nice}bash ${scriptFile}`]];
  }
}

interface OutputFlow {
  /** Bytes pushed to the channel and not yet polled */
  bufferedBytes: number;
  /** Set once cancel is requested: read to the end from then on */
  unpaced: boolean;
}

function resumeOutput(entry: RunningProcess): void {
  const { stdout, stderr } = entry.child;
  if (stdout?.isPaused()) stdout.resume();
  if (stderr?.isPaused()) stderr.resume();
}

interface RunningProcess {
  child: ChildProcess;
  output: AsyncChannel<OutputChunk>;
  flow: OutputFlow;
  exit: Promise<BackendExit>;
  cancelRequested: boolean;
  killTimer: ReturnType<typeof setTimeout> | null;
}

export class SubprocessBackend implements ExecutionBackend {
  readonly languages: readonly SubprocessLanguage[];
  private readonly sandboxDir: string;
  private readonly maxProcesses: number;
  private readonly maxFileSizeBytes: number;
  private readonly killGraceMs: number;
  private readonly processes = new WeakMap<BackendHandle, RunningProcess>();
  private readonly live = new Set<BackendHandle>();

  constructor(options: SubprocessBackendOptions = {}) {
    const needsConfig = options.sandboxDir === undefined
      || options.maxProcesses === undefined
      || options.maxFileSizeBytes === undefined;
    const config = needsConfig ? getConfig() : null;

    this.sandboxDir = options.sandboxDir ?? config?.sandboxDir ?? '';
    this.maxProcesses = options.maxProcesses ?? config?.maxProcesses ?? 64;
    this.maxFileSizeBytes = options.maxFileSizeBytes ?? config?.maxFileSizeBytes ?? 52_428_800;
    this.killGraceMs = options.killGraceMs ?? SIGKILL_GRACE_MS;
    this.languages = options.languages ?? SUBPROCESS_LANGUAGES;
  }

  async start(spec: ExecutionSpec): Promise<BackendHandle> {
    const language = spec.language;
    if (!isSubprocessLanguage(language) || !this.languages.includes(language)) {
      throw new ValidationError(`Subprocess backend cannot run ${spec.language}`);
    }

    // Request ids come from the peer, so the directory gets a local name
    const workingDir = join(this.sandboxDir, generateExecutionId());
    await mkdir(workingDir, { recursive: true });

    const scriptFile = SCRIPT_FILES[language];
    await writeFile(join(workingDir, scriptFile), spec.code, 'utf-8');

    const [cmd, args] = buildCommand(language, scriptFile, spec.limits, {
      maxProcesses: this.maxProcesses,
      maxFileSizeBytes: this.maxFileSizeBytes,
    });

    const child = spawn(cmd, args, {
      cwd: workingDir,
      env: getStrippedEnv(spec.env),
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    const handle: BackendHandle = { executionId: spec.executionId };
    const output = new AsyncChannel<OutputChunk>();
    const flow: OutputFlow = { bufferedBytes: 0, unpaced: false };
    let stderrTail = '';

    // Nobody is reading fast enough: stop reading the pipes so the process blocks on write
    const forward = (chunk: OutputChunk): void => {
      output.push(chunk);
      flow.bufferedBytes += Buffer.byteLength(chunk.data, 'utf-8');
      if (!flow.unpaced && flow.bufferedBytes >= OUTPUT_HIGH_WATER_BYTES) {
        child.stdout.pause();
        child.stderr.pause();
      }
    };

    child.stdout.setEncoding('utf-8');
    child.stderr.setEncoding('utf-8');
    child.stdout.on('data', (data: string) => forward({ stream: 'stdout', data }));
    child.stderr.on('data', (data: string) => {
      stderrTail = (stderrTail + data).slice(-STDERR_TAIL_BYTES);
      forward({ stream: 'stderr', data });
    });

    child.stdin.on('error', (error) => {
      // The script may exit without reading stdin
      logger.debug('stdin closed early', { executionId: spec.executionId, error });
    });
    if (spec.stdin !== undefined) {
      child.stdin.write(spec.stdin);
    }
    child.stdin.end();

    const exit = new Promise<BackendExit>((resolve) => {
      let settled = false;

      // Spawn errors (e.g. command not found)
      child.on('error', (err) => {
        if (settled) return;
        settled = true;
        output.push({ stream: 'stderr', data: err.message });
        output.close();
        resolve({ exitCode: 127, signal: null, oom: false });
      });

      child.on('close', (code, signal) => {
        if (settled) return;
        settled = true;
        output.close();
        const entry = this.processes.get(handle);
        const requested = entry?.cancelRequested ?? false;
        const oom = !requested && (
          signal === 'SIGKILL'
          || code === 137
          || (code !== 0 && OOM_MARKERS.some((marker) => stderrTail.includes(marker)))
        );
        resolve({ exitCode: code, signal, oom });
      });
    }).then(async (result) => {
      const entry = this.processes.get(handle);
      if (entry?.killTimer) clearTimeout(entry.killTimer);
      this.live.delete(handle);
      await this.cleanup(workingDir);
      return result;
    });

    this.processes.set(handle, { child, output, flow, exit, cancelRequested: false, killTimer: null });
    this.live.add(handle);
    logger.debug('Process started', { executionId: spec.executionId, pid: child.pid ?? null, language });
    return handle;
  }

  async signalCancel(handle: BackendHandle): Promise<void> {
    const entry = this.lookup(handle);
    // Paused pipes never end, and the exit waits for them
    entry.flow.unpaced = true;
    resumeOutput(entry);
    if (entry.cancelRequested || entry.child.exitCode !== null || entry.child.signalCode !== null) return;
    entry.cancelRequested = true;
    entry.child.kill('SIGTERM');

    // Grace period, then SIGKILL
    entry.killTimer = setTimeout(() => {
      if (entry.child.exitCode === null && entry.child.signalCode === null) {
        entry.child.kill('SIGKILL');
      }
    }, this.killGraceMs);
    entry.killTimer.unref();
  }

  async pollOutput(handle: BackendHandle): Promise<OutputChunk | null> {
    const entry = this.lookup(handle);
    const chunk = await entry.output.next();
    if (chunk) {
      entry.flow.bufferedBytes -= Buffer.byteLength(chunk.data, 'utf-8');
    }
    if (entry.flow.bufferedBytes <= OUTPUT_LOW_WATER_BYTES) {
      resumeOutput(entry);
    }
    return chunk;
  }

  async wait(handle: BackendHandle): Promise<BackendExit> {
    return this.lookup(handle).exit;
  }

  async shutdown(): Promise<void> {
    const handles = [...this.live];
    await Promise.all(handles.map((handle) => this.signalCancel(handle)));
    await Promise.all(handles.map((handle) => this.wait(handle)));
  }

  private lookup(handle: BackendHandle): RunningProcess {
    const entry = this.processes.get(handle);
    if (!entry) {
      throw new ValidationError(`No process for execution ${handle.executionId}`);
    }
    return entry;
  }

  private async cleanup(workingDir: string): Promise<void> {
    try {
      await rm(workingDir, { recursive: true, force: true });
    } catch (error) {
      logger.warn('Failed to remove working directory', { workingDir, error });
    }
  }
}
