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
 * Context information for log entries
 */
export interface LogContext {
  sessionId?: string;
  operation?: string;
  [key: string]: unknown;
}

/**
 * Structured log entry format
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  stack?: string;
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  level: LogLevel;
  path: string;
  maxSize: number;
  maxFiles: number;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  path: 'agent.log',
  maxSize: 10 * 1024 * 1024, // 10MB
  maxFiles: 5,
};

/**
 * Write queue shared by a logger and its children so that lines land in
 * order and flush/close cover every writer of the same file
 */
export interface LogSink {
  pending: Promise<void>;
  closed: boolean;
  /** Set after the first failed write has been reported */
  failed: boolean;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Logger - Structured JSON logger with level filtering and rotation
 *
 * Created once at startup and passed to the components that log. Call
 * `close()` at shutdown to wait for pending writes.
 *
 * The level methods never reject: a failed write is reported once on
 * stderr. `write` itself rejects on failure.
 */
export class Logger {
  private config: LoggerConfig;
  private defaultContext: LogContext;
  private sink: LogSink;

  /**
   * @param config - Logger configuration
   * @param defaultContext - Default context to include in all log entries
   */
  constructor(config: Partial<LoggerConfig> = {}, defaultContext: LogContext = {}, sink?: LogSink) {
    this.config = { ...DEFAULT_LOGGER_CONFIG, ...config };
    this.defaultContext = defaultContext;
    this.sink = sink ?? { pending: Promise.resolve(), closed: false, failed: false };
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

  get closed(): boolean {
    return this.sink.closed;
  }

  shouldLog(level: LogLevel): boolean {
    return !this.sink.closed && LOG_LEVELS[level] >= LOG_LEVELS[this.config.level];
  }

  /**
   * Creates a child logger with additional default context
   */
  child(context: LogContext): Logger {
    return new Logger(this.config, { ...this.defaultContext, ...context }, this.sink);
  }

  formatEntry(level: LogLevel, message: string, context?: LogContext, error?: Error): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    const mergedContext = { ...this.defaultContext, ...context };
    if (Object.keys(mergedContext).length > 0) {
      entry.context = mergedContext;
    }

    if (error?.stack) {
      entry.stack = error.stack;
    }

    return entry;
  }

  /**
   * Queues a log entry behind any pending writes
   */
  write(entry: LogEntry): Promise<void> {
    if (this.sink.closed) {
      return Promise.reject(new Error('Logger is closed'));
    }

    const line = JSON.stringify(entry) + '\n';
    const next = this.sink.pending.then(() => this.append(line));
    // The caller receives the failure; later writes still run.
    this.sink.pending = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  private async append(line: string): Promise<void> {
    const dir = dirname(this.config.path);
    if (dir && dir !== '.') {
      await mkdir(dir, { recursive: true });
    }

    await this.rotateIfNeeded();
    await appendFile(this.config.path, line, { encoding: 'utf-8' });
  }

  async debug(message: string, context?: LogContext): Promise<void> {
    if (!this.shouldLog('debug')) return;
    await this.emit(this.formatEntry('debug', message, context));
  }

  async info(message: string, context?: LogContext): Promise<void> {
    if (!this.shouldLog('info')) return;
    await this.emit(this.formatEntry('info', message, context));
  }

  async warn(message: string, context?: LogContext): Promise<void> {
    if (!this.shouldLog('warn')) return;
    await this.emit(this.formatEntry('warn', message, context));
  }

  /**
   * Logs an error message with stack trace
   */
  async error(message: string, error?: Error | unknown, context?: LogContext): Promise<void> {
    if (!this.shouldLog('error')) return;

    const err = error instanceof Error ? error : undefined;
    const entry = this.formatEntry('error', message, context, err);

    if (error && !(error instanceof Error)) {
      entry.context = {
        ...entry.context,
        errorDetails: String(error),
      };
    }

    await this.emit(entry);
  }

  private async emit(entry: LogEntry): Promise<void> {
    try {
      await this.write(entry);
    } catch (error) {
      if (this.sink.failed) return;
      this.sink.failed = true;
      process.stderr.write(
        `Logging to ${this.config.path} failed: ${error instanceof Error ? error.message : String(error)}\n`
      );
    }
  }

  /**
   * Waits for every queued write
   */
  async flush(): Promise<void> {
    await this.sink.pending;
  }

  /**
   * Flushes pending writes; later log calls are dropped
   */
  async close(): Promise<void> {
    this.sink.closed = true;
    await this.sink.pending;
  }

  /**
   * Rotates log files if current file exceeds maxSize
   */
  async rotateIfNeeded(): Promise<void> {
    try {
      const stats = await stat(this.config.path);
      if (stats.size >= this.config.maxSize) {
        await this.rotate();
      }
    } catch (error) {
      if (!isMissing(error)) throw error;
    }
  }

  /**
   * Shifts agent.log → agent.log.1 → … keeping at most maxFiles old files
   */
  async rotate(): Promise<void> {
    await this.removeIfExists(`${this.config.path}.${this.config.maxFiles}`);

    for (let i = this.config.maxFiles - 1; i >= 1; i--) {
      await this.renameIfExists(`${this.config.path}.${i}`, `${this.config.path}.${i + 1}`);
    }

    await this.renameIfExists(this.config.path, `${this.config.path}.1`);
  }

  private async removeIfExists(path: string): Promise<void> {
    try {
      await unlink(path);
    } catch (error) {
      if (!isMissing(error)) throw error;
    }
  }

  private async renameIfExists(from: string, to: string): Promise<void> {
    try {
      await rename(from, to);
    } catch (error) {
      if (!isMissing(error)) throw error;
    }
  }
}
