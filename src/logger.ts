/**
 * Centralized logging system with multiple output levels
 */

import { appendFileSync, existsSync, mkdirSync, readdirSync, renameSync, statSync, unlinkSync } from 'fs';
import { basename, dirname, extname, join } from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

export interface LoggerOptions {
  minLevel?: LogLevel;
  context?: string;
  maxLogs?: number;
}

/**
 * Accepts the usual spellings operators put in LOG_LEVEL (INFO, warning, critical).
 */
export function normalizeLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  if (!value) return fallback;
  const lowered = value.trim().toLowerCase();
  if (lowered === 'warning') return 'warn';
  if (lowered === 'critical' || lowered === 'fatal') return 'error';
  const match = LEVELS.find(level => level === lowered);
  return match ?? fallback;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Renames a non-empty log file to `<stem>-<YYYYMMDD-HHMMSS><ext>` using its
 * mtime, then keeps only the newest `maxFiles` rotated files (0 keeps all).
 */
export function rotateLogFile(logFile: string, maxFiles: number): string | null {
  if (!existsSync(logFile)) return null;
  const current = statSync(logFile);
  if (current.size === 0) return null;

  const mtime = current.mtime;
  const stamp =
    `${mtime.getUTCFullYear()}${pad2(mtime.getUTCMonth() + 1)}${pad2(mtime.getUTCDate())}` +
    `-${pad2(mtime.getUTCHours())}${pad2(mtime.getUTCMinutes())}${pad2(mtime.getUTCSeconds())}`;
  const ext = extname(logFile);
  const stem = basename(logFile, ext);
  const dir = dirname(logFile);
  const rotated = join(dir, `${stem}-${stamp}${ext}`);
  renameSync(logFile, rotated);

  if (maxFiles > 0) {
    const rotatedFiles = readdirSync(dir)
      .filter(name => name.startsWith(`${stem}-`) && name.endsWith(ext))
      .sort();
    while (rotatedFiles.length > maxFiles) {
      const oldest = rotatedFiles.shift();
      if (oldest) unlinkSync(join(dir, oldest));
    }
  }

  return rotated;
}

export class Logger {
  private logs: LogEntry[] = [];
  private maxLogs: number;
  private minLevel: LogLevel;
  private context?: string;
  private enableFile = false;
  private logFile = './logs/cleaner.log';
  private parent?: Logger;

  constructor(options: LoggerOptions = {}, parent?: Logger) {
    this.minLevel = options.minLevel ?? 'info';
    this.maxLogs = options.maxLogs ?? 1000;
    this.context = options.context;
    this.parent = parent;
  }

  /**
   * Child logger sharing this logger's level, buffer and file sink
   */
  child(context: string): Logger {
    return new Logger({ context }, this.root());
  }

  private root(): Logger {
    return this.parent ? this.parent.root() : this;
  }

  private shouldLog(level: LogLevel): boolean {
    const minIndex = LEVELS.indexOf(this.root().minLevel);
    return LEVELS.indexOf(level) >= minIndex;
  }

  private formatMessage(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const context = entry.context ? `[${entry.context}]` : '';

    let message = `${timestamp} ${level} ${context} ${entry.message}`;

    if (entry.data && Object.keys(entry.data).length > 0) {
      message += '\n  ' + JSON.stringify(entry.data, null, 2).split('\n').join('\n  ');
    }

    if (entry.error) {
      message += `\n  Error: ${entry.error.message}\n  Stack: ${entry.error.stack}`;
    }

    return message;
  }

  private getConsoleColor(level: LogLevel): string {
    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m',    // Cyan
      info: '\x1b[32m',     // Green
      warn: '\x1b[33m',     // Yellow
      error: '\x1b[31m'     // Red
    };
    return colors[level];
  }

  private record(entry: LogEntry): void {
    const root = this.root();
    root.logs.push(entry);
    if (root.logs.length > root.maxLogs) {
      root.logs = root.logs.slice(-root.maxLogs);
    }
  }

  private write(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    this.record(entry);

    const formatted = this.formatMessage(entry);
    const color = this.getConsoleColor(entry.level);
    const reset = '\x1b[0m';

    switch (entry.level) {
      case 'error':
        console.error(`${color}${formatted}${reset}`);
        break;
      case 'warn':
        console.warn(`${color}${formatted}${reset}`);
        break;
      default:
        console.log(`${color}${formatted}${reset}`);
    }

    this.writeToFile(formatted);
  }

  private writeToFile(line: string): void {
    const root = this.root();
    if (!root.enableFile) return;
    try {
      appendFileSync(root.logFile, line + '\n');
    } catch (error) {
      root.enableFile = false;
      console.error(`Failed to write log file ${root.logFile}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  debug(message: string, data?: Record<string, unknown>, context?: string): void {
    this.write({ timestamp: new Date(), level: 'debug', message, data, context: context ?? this.context });
  }

  info(message: string, data?: Record<string, unknown>, context?: string): void {
    this.write({ timestamp: new Date(), level: 'info', message, data, context: context ?? this.context });
  }

  warn(message: string, data?: Record<string, unknown>, context?: string): void {
    this.write({ timestamp: new Date(), level: 'warn', message, data, context: context ?? this.context });
  }

  error(message: string, error?: Error, context?: string): void {
    this.write({
      timestamp: new Date(),
      level: 'error',
      message,
      error,
      context: context ?? this.context
    });
  }

  success(message: string): void {
    const formatted = `✅ ${message}`;
    console.log(`\x1b[32m${formatted}\x1b[0m`);
    this.writeToFile(formatted);
  }

  /**
   * Start appending to a log file, rotating the previous run's file first
   */
  configureFile(logFile: string, maxFiles: number = 5): void {
    const root = this.root();
    mkdirSync(dirname(logFile), { recursive: true });
    rotateLogFile(logFile, maxFiles);
    root.logFile = logFile;
    root.enableFile = true;
  }

  disableFile(): void {
    this.root().enableFile = false;
  }

  getLogs(level?: LogLevel): LogEntry[] {
    const logs = this.root().logs;
    return level ? logs.filter(log => log.level === level) : logs;
  }

  clear(): void {
    this.root().logs = [];
  }

  setMinLevel(level: LogLevel): void {
    this.root().minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.root().minLevel;
  }
}

// Singleton instance
export const logger = new Logger({ minLevel: normalizeLogLevel(process.env.LOG_LEVEL) });

/**
 * Custom error class for application errors
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string = 'UNKNOWN_ERROR',
    public statusCode: number = 500,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error handler wrapper for async functions
 */
export function handleError(error: unknown, context?: string): AppError {
  if (error instanceof AppError) {
    logger.error(error.message, error, context);
    return error;
  }

  if (error instanceof Error) {
    const appError = new AppError(error.message, 'INTERNAL_ERROR', 500);
    logger.error(error.message, error, context);
    return appError;
  }

  const appError = new AppError(String(error), 'UNKNOWN_ERROR', 500);
  logger.error(String(error), undefined, context);
  return appError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
