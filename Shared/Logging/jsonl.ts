/**
 * JSONL (JSON Lines) audit logger with daily file rotation.
 * One file per UTC day: `<prefix>-YYYY-MM-DD.jsonl` inside the log directory.
 */

import { appendFile, readFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';

/**
 * Base interface for audit entries
 * All audit entries must have a timestamp
 */
export interface BaseAuditEntry {
  timestamp: string;
  [key: string]: unknown;
}

export interface AuditReadOptions<T> {
  /** Day to read, `YYYY-MM-DD` (default: today) */
  day?: string;
  /** Maximum number of entries to return (default: 100) */
  limit?: number;
  filter?: (entry: T) => boolean;
  /** Sort by timestamp descending (most recent first) - default: true */
  sortDescending?: boolean;
}

/**
 * @example
 * ```typescript
 * interface RunEntry extends BaseAuditEntry {
 *   execution_id: string;
 *   status: string;
 * }
 *
 * const audit = new JsonlLogger<RunEntry>('/tmp/fathom-logs', 'executions');
 * await audit.write({ timestamp: createTimestamp(), execution_id: 'exec_1', status: 'completed' });
 * ```
 */
export class JsonlLogger<T extends BaseAuditEntry> {
  private readonly logDir: string;
  private readonly prefix: string;
  private initialized: boolean = false;

  constructor(logDir: string, prefix: string) {
    this.logDir = logDir;
    this.prefix = prefix;
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.logDir, { recursive: true });
    this.initialized = true;
  }

  /**
   * Path of the file holding entries for `day` (`YYYY-MM-DD`, default today)
   */
  pathFor(day: string = createTimestamp().slice(0, 10)): string {
    return join(this.logDir, `${this.prefix}-${day}.jsonl`);
  }

  /**
   * Append an entry to the file of the day its timestamp falls on
   */
  async write(entry: T): Promise<void> {
    await this.ensureDir();
    const line = JSON.stringify(entry) + '\n';
    await appendFile(this.pathFor(entry.timestamp.slice(0, 10)), line, 'utf-8');
  }

  async read(options: AuditReadOptions<T> = {}): Promise<T[]> {
    const path = this.pathFor(options.day);
    if (!existsSync(path)) {
      return [];
    }

    const content = await readFile(path, 'utf-8');
    const lines = content.trim().split('\n').filter(Boolean);

    let entries: T[] = [];
    for (const line of lines) {
      const parsed = parseLine<T>(line);
      if (parsed) entries.push(parsed);
    }

    if (options.filter) {
      entries = entries.filter(options.filter);
    }

    const sortDescending = options.sortDescending ?? true;
    entries.sort((a, b) => {
      const timeA = new Date(a.timestamp).getTime();
      const timeB = new Date(b.timestamp).getTime();
      return sortDescending ? timeB - timeA : timeA - timeB;
    });

    const limit = options.limit ?? 100;
    return entries.slice(0, limit);
  }

  getDir(): string {
    return this.logDir;
  }
}

function parseLine<T extends BaseAuditEntry>(line: string): T | null {
  try {
    const value: unknown = JSON.parse(line);
    if (typeof value === 'object' && value !== null && 'timestamp' in value && typeof value.timestamp === 'string') {
      // Entries are only ever written by write(), which takes a T
      return value as T;
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Create a timestamped audit entry
 * Helper to ensure consistent timestamp format
 */
export function createTimestamp(): string {
  return new Date().toISOString();
}
