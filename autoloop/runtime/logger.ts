/**
 * Session Logger: structured events for the session log and the console.
 *
 * Every entry is one JSON object appended to the session's .jsonl file.
 * The console gets the same JSON line, or a coloured
 * `[timestamp] [LEVEL] message` line in text format.
 */

import { appendFile } from 'fs/promises';
import type { LogEntry, LogFields, LogFormat, LogLevel } from '../types/index.js';

export interface LogContext {
  session: string;
  iteration: number;
}

export interface SessionLoggerOptions {
  format: LogFormat;
  /** Session log file; omit to log to the console only */
  logFile?: string;
  context: () => LogContext;
  write?: (line: string) => void;
  now?: () => Date;
  color?: boolean;
}

const LEVEL_COLORS: Record<LogLevel, number> = {
  ERROR: 31,
  WARN: 33,
  INFO: 34,
  SUCCESS: 32,
};

export function supportsColor(stream: { isTTY?: boolean } = process.stdout): boolean {
  if (process.env.NO_COLOR) return false;
  if (process.env.TERM === 'dumb') return false;
  return stream.isTTY === true;
}

function paint(code: number, text: string): string {
  return `\x1b[${code}m${text}\x1b[0m`;
}

export function formatTextLine(entry: LogEntry, color: boolean): string {
  const line = `[${entry.timestamp}] [${entry.level}] ${entry.message}`;
  return color ? paint(LEVEL_COLORS[entry.level], line) : line;
}

export class SessionLogger {
  private readonly options: SessionLoggerOptions;
  private readonly write: (line: string) => void;
  private readonly now: () => Date;
  private readonly color: boolean;
  private logFile: string | undefined;
  private pending: Promise<void> = Promise.resolve();

  constructor(options: SessionLoggerOptions) {
    this.options = options;
    this.write = options.write ?? ((line: string) => console.log(line));
    this.now = options.now ?? (() => new Date());
    this.color = options.color ?? supportsColor();
    this.logFile = options.logFile;
  }

  /** Start (or stop, with undefined) mirroring entries into a file */
  setLogFile(logFile: string | undefined): void {
    this.logFile = logFile;
  }

  info(message: string, fields?: LogFields): Promise<void> {
    return this.log('INFO', message, fields);
  }

  warn(message: string, fields?: LogFields): Promise<void> {
    return this.log('WARN', message, fields);
  }

  error(message: string, fields?: LogFields): Promise<void> {
    return this.log('ERROR', message, fields);
  }

  success(message: string, fields?: LogFields): Promise<void> {
    return this.log('SUCCESS', message, fields);
  }

  /**
   * Resolves once every entry logged so far has reached the file.
   */
  flush(): Promise<void> {
    return this.pending;
  }

  log(level: LogLevel, message: string, fields: LogFields = {}): Promise<void> {
    const entry = this.buildEntry(level, message, fields);
    const json = JSON.stringify(entry);

    this.write(this.options.format === 'json' ? json : formatTextLine(entry, this.color));

    const logFile = this.logFile;
    if (!logFile) return this.pending;

    // Chain appends so entries land in the order they were logged. A failed
    // append rejects its own caller without breaking the chain.
    const appended = this.pending.then(() => appendFile(logFile, json + '\n', 'utf-8'));
    this.pending = appended.catch(() => undefined);
    return appended;
  }

  private buildEntry(level: LogLevel, message: string, fields: LogFields): LogEntry {
    const { session, iteration } = this.options.context();
    const entry: LogEntry = {
      timestamp: this.now().toISOString(),
      level,
      message,
      session,
      iteration,
    };

    for (const [key, value] of Object.entries(fields)) {
      if (value !== undefined && !(key in entry)) {
        entry[key] = value;
      }
    }

    return entry;
  }
}
