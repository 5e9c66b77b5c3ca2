/**
 * Structured Logger with Context and Multiple Sinks
 *
 * Leveled, contextual logging used by every stage of the analyzer. Progress
 * and diagnostics go to stderr so that stdout carries only the report.
 *
 * Sinks:
 * - console: Human-readable lines on stderr (default)
 * - memory: Ring buffer for tests and programmatic access
 * - file: JSON lines appended to a log file (--log-file)
 *
 * Usage:
 *   import { logger } from '../observability/logger.js';
 *   logger.info('Collected page', { page: 2, conversations: 50 });
 *   logger.withContext({ conversationId: '42' }).warn('No messages');
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import chalk from 'chalk';

// ─── Types ───────────────────────────────────────────────────────────

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: LogSink[];
  /** Default context merged into every log entry */
  defaultContext?: Record<string, unknown>;
}

// ─── Level Priority ──────────────────────────────────────────────────

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  trace: chalk.gray,
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
  silent: (text) => text,
};

// ─── Sinks ───────────────────────────────────────────────────────────

/** Console sink: one human-readable line per entry, on stderr */
export class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    const time = entry.timestamp.slice(11, 19);
    const level = LEVEL_COLORS[entry.level](entry.level.toUpperCase().padEnd(5));
    const dataStr =
      entry.data && Object.keys(entry.data).length > 0 ? ' ' + chalk.dim(JSON.stringify(entry.data)) : '';
    process.stderr.write(`${chalk.dim(time)} ${level} ${entry.message}${dataStr}\n`);
  }
}

/** Memory sink: ring buffer for tests and programmatic queries */
export class MemorySink implements LogSink {
  private buffer: LogEntry[] = [];
  private maxSize: number;

  constructor(maxSize = 1000) {
    this.maxSize = maxSize;
  }

  write(entry: LogEntry): void {
    this.buffer.push(entry);
    if (this.buffer.length > this.maxSize) {
      this.buffer.shift();
    }
  }

  getEntries(filter?: { level?: LogLevel; limit?: number }): LogEntry[] {
    let entries = this.buffer;

    if (filter?.level) {
      const minPriority = LEVEL_PRIORITY[filter.level];
      entries = entries.filter((e) => LEVEL_PRIORITY[e.level] >= minPriority);
    }

    if (filter?.limit) {
      entries = entries.slice(-filter.limit);
    }

    return entries;
  }

  clear(): void {
    this.buffer = [];
  }
}

/** File sink: append JSON lines to a log file */
export class FileSink implements LogSink {
  private filePath: string;
  private initialized = false;
  private disabled = false;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  write(entry: LogEntry): void {
    if (this.disabled) return;

    try {
      if (!this.initialized) {
        mkdirSync(dirname(this.filePath), { recursive: true });
        this.initialized = true;
      }
      appendFileSync(this.filePath, JSON.stringify(entry) + '\n');
    } catch (err) {
      // A broken log file must not stop the run; report once and stop writing.
      this.disabled = true;
      process.stderr.write(`Log file ${this.filePath} disabled: ${err instanceof Error ? err.message : String(err)}\n`);
    }
  }
}

// ─── Logger ──────────────────────────────────────────────────────────

export class StructuredLogger {
  private minLevel: LogLevel;
  private sinks: LogSink[];
  private defaultContext: Record<string, unknown>;

  constructor(config: LoggerConfig = {}) {
    this.minLevel = config.level ?? 'info';
    this.sinks = config.sinks ?? [new ConsoleSink()];
    this.defaultContext = config.defaultContext ?? {};
  }

  /** Create a child logger with additional default context */
  withContext(context: Record<string, unknown>): StructuredLogger {
    return new StructuredLogger({
      level: this.minLevel,
      sinks: this.sinks,
      defaultContext: { ...this.defaultContext, ...context },
    });
  }

  get level(): LogLevel {
    return this.minLevel;
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.log('trace', message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(data || Object.keys(this.defaultContext).length > 0
        ? { data: { ...this.defaultContext, ...data } }
        : {}),
    };

    for (const sink of this.sinks) {
      sink.write(entry);
    }
  }
}

// ─── Global singleton ────────────────────────────────────────────────

/**
 * Global logger instance. Defaults to the console sink at 'info' level.
 * `configureLogger()` replaces it once the run configuration is known.
 */
export let logger = new StructuredLogger();

export function configureLogger(config: LoggerConfig): StructuredLogger {
  logger = new StructuredLogger(config);
  return logger;
}

/**
 * Create a logger for a specific component (adds the component name to context).
 *
 * Example:
 *   const log = createComponentLogger('collector');
 *   log.info('Fetching page', { page: 3 });
 */
export function createComponentLogger(component: string, base: StructuredLogger = logger): StructuredLogger {
  return base.withContext({ component });
}

/** Logger that discards everything. Default for library callers that pass none. */
export function createSilentLogger(): StructuredLogger {
  return new StructuredLogger({ level: 'silent', sinks: [] });
}
