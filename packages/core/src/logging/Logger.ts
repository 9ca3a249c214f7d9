/**
 * Logger - lightweight leveled logging
 *
 * Features:
 * - 5 log levels: silent, errors, warnings, info, debug
 * - Context objects appended as JSON
 * - Console and file output (or both via MultiLogger)
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.info('Formatted file', { path: 'src/a.ts' });
 *
 *   const logger = createLogger('info', { logFile: 'declsort.log' });
 */

import { createWriteStream, writeFileSync, mkdirSync, accessSync, statSync, constants, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';

export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'errors', 'warnings', 'info', 'debug'];

export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  trace(message: string, context?: Record<string, unknown>): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

const METHOD_LEVELS = {
  error: LOG_LEVEL_PRIORITY.errors,
  warn: LOG_LEVEL_PRIORITY.warnings,
  info: LOG_LEVEL_PRIORITY.info,
  debug: LOG_LEVEL_PRIORITY.debug,
  trace: LOG_LEVEL_PRIORITY.debug,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

/**
 * JSON.stringify that survives circular references
 */
function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    return value;
  });
}

function formatMessage(message: string, context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  try {
    return `${message} ${safeStringify(context)}`;
  } catch {
    return `${message} [context serialization failed]`;
  }
}

/**
 * Console-based Logger. Methods below the threshold are no-ops.
 *
 * Everything goes to stderr so that `--stdout` output stays clean.
 */
export class ConsoleLogger implements Logger {
  private readonly priority: number;

  constructor(logLevel: LogLevel = 'info') {
    this.priority = LOG_LEVEL_PRIORITY[logLevel];
  }

  private shouldLog(methodLevel: number): boolean {
    return this.priority >= methodLevel;
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(METHOD_LEVELS.error)) return;
    console.error(formatMessage(`[ERROR] ${message}`, context));
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(METHOD_LEVELS.warn)) return;
    console.error(formatMessage(`[WARN] ${message}`, context));
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(METHOD_LEVELS.info)) return;
    console.error(formatMessage(`[INFO] ${message}`, context));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(METHOD_LEVELS.debug)) return;
    console.error(formatMessage(`[DEBUG] ${message}`, context));
  }

  trace(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(METHOD_LEVELS.trace)) return;
    console.error(formatMessage(`[TRACE] ${message}`, context));
  }
}

/**
 * File-based Logger
 *
 * Writes timestamped lines through a write stream. The file is truncated on
 * construction and parent directories are created. Throws when the target
 * directory is not writable or the path is a directory.
 */
export class FileLogger implements Logger {
  private readonly priority: number;
  private readonly stream: WriteStream;

  constructor(logLevel: LogLevel, filePath: string) {
    this.priority = LOG_LEVEL_PRIORITY[logLevel];
    const resolvedPath = resolve(filePath);

    const dir = dirname(resolvedPath);
    mkdirSync(dir, { recursive: true });

    try {
      accessSync(dir, constants.W_OK);
    } catch {
      throw new Error(`Cannot write log file: directory '${dir}' is not writable`);
    }

    let isDirectory = false;
    try {
      isDirectory = statSync(resolvedPath).isDirectory();
    } catch {
      // not created yet
    }
    if (isDirectory) {
      throw new Error(`Cannot write log file: '${resolvedPath}' is a directory`);
    }

    writeFileSync(resolvedPath, '');
    this.stream = createWriteStream(resolvedPath, { flags: 'a' });
    this.stream.on('error', (err) => {
      console.error(`[WARN] Log file stream failed: ${err.message}`);
    });
  }

  private shouldLog(methodLevel: number): boolean {
    return this.priority >= methodLevel;
  }

  private writeLine(level: string, message: string, context?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    this.stream.write(formatMessage(`${timestamp} [${level}] ${message}`, context) + '\n');
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(METHOD_LEVELS.error)) return;
    this.writeLine('ERROR', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(METHOD_LEVELS.warn)) return;
    this.writeLine('WARN', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(METHOD_LEVELS.info)) return;
    this.writeLine('INFO', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(METHOD_LEVELS.debug)) return;
    this.writeLine('DEBUG', message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog(METHOD_LEVELS.trace)) return;
    this.writeLine('TRACE', message, context);
  }

  /** Resolves once everything written so far is flushed. */
  close(): Promise<void> {
    return new Promise((done) => {
      this.stream.end(done);
    });
  }
}

/**
 * Fans every call out to several loggers, each filtering on its own level.
 */
export class MultiLogger implements Logger {
  private readonly loggers: Logger[];

  constructor(loggers: Logger[]) {
    this.loggers = loggers;
  }

  error(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.error(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.warn(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.info(message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.debug(message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.trace(message, context);
  }

  async close(): Promise<void> {
    for (const logger of this.loggers) {
      if (logger instanceof FileLogger) {
        await logger.close();
      }
    }
  }
}

/**
 * Create a Logger for the given level.
 *
 * With `logFile`, returns a MultiLogger writing to console and file; the
 * file always records at debug level.
 */
export function createLogger(level: LogLevel, options?: { logFile?: string }): Logger {
  const consoleLogger = new ConsoleLogger(level);

  if (options?.logFile) {
    const fileLogger = new FileLogger('debug', options.logFile);
    return new MultiLogger([consoleLogger, fileLogger]);
  }

  return consoleLogger;
}

/**
 * Flush file-backed loggers. No-op for console loggers.
 */
export async function closeLogger(logger: Logger): Promise<void> {
  if (logger instanceof MultiLogger || logger instanceof FileLogger) {
    await logger.close();
  }
}
