import { appendFile, stat, rename, unlink, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Log levels in order of severity (higher = more severe)
 */
export const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

/**
 * Context attached to log entries. Command-scoped loggers carry the command
 * id so one instruction can be followed across interpreter, executor and
 * store entries.
 */
export interface LogContext {
  commandId?: string;
  tutorId?: string;
  operation?: string;
  [key: string]: unknown;
}

/**
 * One JSON line in the log file
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  stack?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  path: string;
  maxSize: number;
  maxFiles: number;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  path: 'tutor-command.log',
  maxSize: 10 * 1024 * 1024, // 10MB
  maxFiles: 5,
};

/**
 * Logger - Structured JSON-lines logger with level filtering and size-based
 * rotation (`app.log` → `app.log.1` → … → `app.log.<maxFiles>`).
 */
export class Logger {
  private config: LoggerConfig;
  private defaultContext: LogContext;

  constructor(config: Partial<LoggerConfig> = {}, defaultContext: LogContext = {}) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
    this.defaultContext = defaultContext;
  }

  get level(): LogLevel {
    return this.config.level;
  }

  set level(level: LogLevel) {
    this.config.level = level;
  }

  get path(): string {
    return this.config.path;
  }

  shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.level];
  }

  /**
   * Creates a logger that writes to the same file with extra default context
   */
  child(context: LogContext): Logger {
    return new Logger(this.config, { ...this.defaultContext, ...context });
  }

  formatEntry(level: LogLevel, message: string, context?: LogContext, error?: Error): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    const merged = { ...this.defaultContext, ...context };
    if (Object.keys(merged).length > 0) {
      entry.context = merged;
    }
    if (error?.stack) {
      entry.stack = error.stack;
    }
    return entry;
  }

  async write(entry: LogEntry): Promise<void> {
    const dir = dirname(this.config.path);
    if (dir && dir !== '.') {
      await mkdir(dir, { recursive: true });
    }
    await this.rotateIfNeeded();
    await appendFile(this.config.path, JSON.stringify(entry) + '\n', { encoding: 'utf-8' });
  }

  async debug(message: string, context?: LogContext): Promise<void> {
    if (!this.shouldLog('debug')) return;
    await this.write(this.formatEntry('debug', message, context));
  }

  async info(message: string, context?: LogContext): Promise<void> {
    if (!this.shouldLog('info')) return;
    await this.write(this.formatEntry('info', message, context));
  }

  async warn(message: string, context?: LogContext): Promise<void> {
    if (!this.shouldLog('warn')) return;
    await this.write(this.formatEntry('warn', message, context));
  }

  /**
   * Logs an error; the stack goes to the file, never to the tutor
   */
  async error(message: string, error?: unknown, context?: LogContext): Promise<void> {
    if (!this.shouldLog('error')) return;

    const err = error instanceof Error ? error : undefined;
    const entry = this.formatEntry('error', message, context, err);

    if (error !== undefined && !(error instanceof Error)) {
      entry.context = { ...entry.context, errorDetails: String(error) };
    }
    await this.write(entry);
  }

  async rotateIfNeeded(): Promise<void> {
    const size = await fileSize(this.config.path);
    if (size !== null && size >= this.config.maxSize) {
      await this.rotate();
    }
  }

  /**
   * Shifts rotated files up by one and moves the current file to `.1`,
   * dropping the oldest once `maxFiles` are kept.
   */
  async rotate(): Promise<void> {
    const base = this.config.path;
    await removeIfExists(`${base}.${this.config.maxFiles}`);

    for (let i = this.config.maxFiles - 1; i >= 1; i--) {
      await renameIfExists(`${base}.${i}`, `${base}.${i + 1}`);
    }
    await renameIfExists(base, `${base}.1`);
  }

  /**
   * Lists the current log file and its rotated siblings that exist on disk
   */
  async listLogFiles(): Promise<string[]> {
    const candidates = [this.config.path];
    for (let i = 1; i <= this.config.maxFiles; i++) {
      candidates.push(`${this.config.path}.${i}`);
    }

    const files: string[] = [];
    for (const candidate of candidates) {
      if ((await fileSize(candidate)) !== null) {
        files.push(candidate);
      }
    }
    return files;
  }
}

async function fileSize(path: string): Promise<number | null> {
  try {
    return (await stat(path)).size;
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
}

async function removeIfExists(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (error) {
    if (!isNotFound(error)) throw error;
  }
}

async function renameIfExists(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (error) {
    if (!isNotFound(error)) throw error;
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Awaits a log write that records finished work. A failed write goes to
 * stderr and does not fail that work.
 */
export async function settleLog(write: Promise<void>, source: string): Promise<void> {
  try {
    await write;
  } catch (error) {
    console.error(`Failed to write ${source} log:`, error);
  }
}
