/**
 * Shared logger for Fathom services
 * Uses console.error for ALL log levels to keep stdout clean for the stdio protocol transport
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Fields bound to a logger and merged into every line it writes */
export type LogFields = Record<string, string | number | boolean>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const VALID_LOG_LEVELS: readonly string[] = ['debug', 'info', 'warn', 'error'];

function isValidLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && VALID_LOG_LEVELS.includes(value);
}

/**
 * JSON replacer that serializes Error objects (whose properties are non-enumerable).
 */
function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    const obj: Record<string, unknown> = { message: value.message, name: value.name };
    if (value.stack) obj.stack = value.stack;
    if ('code' in value) obj.code = value.code;
    return obj;
  }
  return value;
}

export class Logger {
  private level: LogLevel;
  private context: string;
  private fields: LogFields;

  constructor(context: string = 'fathom', fields: LogFields = {}) {
    this.context = context;
    this.fields = fields;
    const envLevel = process.env.LOG_LEVEL;
    this.level = isValidLogLevel(envLevel) ? envLevel : 'info';
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private mergeData(data: unknown): unknown {
    if (Object.keys(this.fields).length === 0) return data;
    if (data === undefined) return { ...this.fields };
    if (data instanceof Error) return { ...this.fields, error: data };
    if (typeof data === 'object' && data !== null && !Array.isArray(data)) {
      return { ...this.fields, ...data };
    }
    return { ...this.fields, data };
  }

  private formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    const base = `[${timestamp}] [${level.toUpperCase()}] [${this.context}] ${message}`;
    const merged = this.mergeData(data);
    if (merged !== undefined) {
      return `${base} ${JSON.stringify(merged, errorReplacer)}`;
    }
    return base;
  }

  debug(message: string, data?: unknown): void {
    if (this.shouldLog('debug')) {
      console.error(this.formatMessage('debug', message, data));
    }
  }

  info(message: string, data?: unknown): void {
    if (this.shouldLog('info')) {
      console.error(this.formatMessage('info', message, data));
    }
  }

  warn(message: string, data?: unknown): void {
    if (this.shouldLog('warn')) {
      console.error(this.formatMessage('warn', message, data));
    }
  }

  error(message: string, data?: unknown): void {
    if (this.shouldLog('error')) {
      console.error(this.formatMessage('error', message, data));
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(context: string): Logger {
    const child = new Logger(`${this.context}:${context}`, this.fields);
    child.level = this.level;
    return child;
  }

  /**
   * Create a logger with the same context that stamps `fields` on every line,
   * e.g. `log.with({ connectionId })`.
   */
  with(fields: LogFields): Logger {
    const bound = new Logger(this.context, { ...this.fields, ...fields });
    bound.level = this.level;
    return bound;
  }

  setContext(context: string): void {
    this.context = context;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

/** Default logger instance */
export const logger = new Logger();
