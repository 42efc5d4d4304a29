/**
 * Logger Service for Tagsmith
 *
 * Keeps structured entries in memory for the current run and, when given a
 * log directory, appends them as JSON lines to a daily file (YYYY-MM-DD.log).
 * A file that reaches maxFileSize is renamed to YYYY-MM-DD.N.log before the
 * next write.
 *
 * Levels: ERROR (failed files), WARN (skipped files and candidates), INFO (progress)
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  APIError,
  type ErrorCategory,
  type PipelineError,
  errorMessage,
  isPipelineError,
} from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────

export type LogLevel = 'ERROR' | 'WARN' | 'INFO';

export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  category: ErrorCategory | null;
  filePath: string | null;
  step: string | null;
  /** HTTP status of a failed API call */
  statusCode: number | null;
  /** Message of the underlying error */
  cause: string | null;
}

/** Optional context attached to a log call */
export type LogContext = Partial<Omit<LogEntry, 'timestamp' | 'level' | 'message'>>;

export interface LoggerOptions {
  /** Directory for daily log files. Null or absent keeps the log in memory only. */
  logDir?: string | null;
  /** Least severe level that is recorded (default: INFO) */
  minLevel?: LogLevel;
  /** Size in bytes at which the day's file is rotated (default: 10MB) */
  maxFileSize?: number;
  /** Clock (for testing) */
  now?: () => Date;
}

export interface LogSummary {
  counts: Record<LogLevel, number>;
  errorsByCategory: Partial<Record<ErrorCategory, number>>;
  /** File the entries went to, or null when file logging is off */
  logFilePath: string | null;
}

// ─── Constants ───────────────────────────────────────────────────────────

const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

const SEVERITY: Record<LogLevel, number> = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
};

// ─── Helper Functions ────────────────────────────────────────────────────

/**
 * Daily log file name for a local date, e.g. 2025-02-17.log
 */
export function getLogFileName(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}.log`;
}

/**
 * First free rotation name for a log file: 2025-02-17.1.log, 2025-02-17.2.log, ...
 */
export function nextRotationPath(logFilePath: string, exists: (p: string) => boolean): string {
  const ext = path.extname(logFilePath);
  const base = logFilePath.slice(0, logFilePath.length - ext.length);
  let index = 1;
  while (exists(`${base}.${index}${ext}`)) {
    index++;
  }
  return `${base}.${index}${ext}`;
}

/**
 * Serializes an entry as one JSON line. Empty context fields are left out.
 */
export function serializeLogEntry(entry: LogEntry): string {
  const record: Record<string, string | number> = {
    time: entry.timestamp,
    level: entry.level,
    msg: entry.message,
  };
  if (entry.category !== null) record.category = entry.category;
  if (entry.filePath !== null) record.file = entry.filePath;
  if (entry.step !== null) record.step = entry.step;
  if (entry.statusCode !== null) record.status = entry.statusCode;
  if (entry.cause !== null) record.cause = entry.cause;
  return JSON.stringify(record);
}

export function isAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
  return SEVERITY[level] <= SEVERITY[minLevel];
}

export function createLogEntry(level: LogLevel, message: string, context: LogContext, at: Date): LogEntry {
  return {
    timestamp: at.toISOString(),
    level,
    message,
    category: context.category ?? null,
    filePath: context.filePath ?? null,
    step: context.step ?? null,
    statusCode: context.statusCode ?? null,
    cause: context.cause ?? null,
  };
}

/**
 * Context carried by a PipelineError, including the HTTP status of an APIError.
 */
export function errorContext(error: PipelineError): LogContext {
  return {
    category: error.category,
    filePath: error.filePath,
    step: error.step,
    statusCode: error instanceof APIError ? error.statusCode : null,
    cause: error.cause?.message ?? null,
  };
}

// ─── Logger Class ────────────────────────────────────────────────────────

/**
 * Usage:
 * ```typescript
 * const logger = new Logger({ logDir: '/path/to/logs' });
 * await logger.initialize();
 * logger.logSkippedFile('/music/notes.txt', 'Unsupported format: .txt');
 * logger.logPipelineError(new WriteError('disk full', { filePath: '/music/song.mp3' }));
 * ```
 */
export class Logger {
  private readonly logDir: string | null;
  private readonly minLevel: LogLevel;
  private readonly maxFileSize: number;
  private readonly now: () => Date;
  private readonly entries: LogEntry[] = [];

  /** Set once the log directory exists; cleared if a write fails */
  private fileReady = false;

  constructor(options: LoggerOptions = {}) {
    this.logDir = options.logDir ?? null;
    this.minLevel = options.minLevel ?? 'INFO';
    this.maxFileSize = options.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.now = options.now ?? ((): Date => new Date());
  }

  /**
   * Creates the log directory. When that fails the logger keeps working in
   * memory and records why as a warning.
   */
  async initialize(): Promise<void> {
    if (this.logDir === null) return;

    try {
      await fs.promises.mkdir(this.logDir, { recursive: true });
      this.fileReady = true;
    } catch (error: unknown) {
      this.disableFileLogging(`cannot create "${this.logDir}": ${errorMessage(error)}`);
    }
  }

  /** Today's log file, or null when file logging is off */
  getLogFilePath(): string | null {
    if (this.logDir === null || !this.fileReady) return null;
    return path.join(this.logDir, getLogFileName(this.now()));
  }

  error(message: string, context: LogContext = {}): void {
    this.record('ERROR', message, context);
  }

  warn(message: string, context: LogContext = {}): void {
    this.record('WARN', message, context);
  }

  info(message: string, context: LogContext = {}): void {
    this.record('INFO', message, context);
  }

  logPipelineError(error: PipelineError, level: LogLevel = 'ERROR'): void {
    this.record(level, error.message, errorContext(error));
  }

  /**
   * Logs any thrown value at ERROR. A PipelineError brings its own context;
   * the given context fills in for anything else.
   */
  logError(error: unknown, context: LogContext = {}): void {
    if (isPipelineError(error)) {
      this.logPipelineError(error);
    } else {
      this.error(errorMessage(error), context);
    }
  }

  logSkippedFile(filePath: string, reason: string): void {
    this.warn(`File skipped: ${reason}`, { filePath, step: 'processing' });
  }

  /** Entries of this run in order, optionally of one level only */
  getEntries(level?: LogLevel): LogEntry[] {
    return level === undefined ? [...this.entries] : this.entries.filter((e) => e.level === level);
  }

  getSummary(): LogSummary {
    const counts: Record<LogLevel, number> = { ERROR: 0, WARN: 0, INFO: 0 };
    const errorsByCategory: Partial<Record<ErrorCategory, number>> = {};

    for (const entry of this.entries) {
      counts[entry.level]++;
      if (entry.level === 'ERROR' && entry.category !== null) {
        errorsByCategory[entry.category] = (errorsByCategory[entry.category] ?? 0) + 1;
      }
    }

    return { counts, errorsByCategory, logFilePath: this.getLogFilePath() };
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private record(level: LogLevel, message: string, context: LogContext): void {
    if (!isAtLeast(level, this.minLevel)) return;

    const entry = createLogEntry(level, message, context, this.now());
    this.entries.push(entry);

    const logFilePath = this.getLogFilePath();
    if (logFilePath === null) return;

    try {
      if (fs.existsSync(logFilePath) && fs.statSync(logFilePath).size >= this.maxFileSize) {
        fs.renameSync(logFilePath, nextRotationPath(logFilePath, fs.existsSync));
      }
      fs.appendFileSync(logFilePath, serializeLogEntry(entry) + '\n', 'utf-8');
    } catch (error: unknown) {
      this.disableFileLogging(`cannot write "${logFilePath}": ${errorMessage(error)}`);
    }
  }

  private disableFileLogging(reason: string): void {
    this.fileReady = false;
    this.entries.push(createLogEntry('WARN', `File logging disabled: ${reason}`, { step: 'logging' }, this.now()));
  }
}
