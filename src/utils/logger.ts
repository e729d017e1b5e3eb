/**
 * Logging Utility
 *
 * Structured JSON logging for the data connector. Lines go to stderr so that
 * command output on stdout stays machine-readable; callers can attach sinks to
 * observe entries without parsing them back.
 */

import { createWriteStream } from 'fs';
import type { LogLevel } from '../contracts/types.js';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
  error?: unknown;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  level?: LogLevel;
  /** Append JSON lines to this file as well */
  filePath?: string;
  /** Write colorized lines to stderr (default true) */
  console?: boolean;
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const match = LEVELS.find((level) => level === value?.toLowerCase());
  return match ?? fallback;
}

export class Logger {
  private logLevel: LogLevel;
  private logStream: NodeJS.WritableStream | null = null;
  private readonly consoleEnabled: boolean;
  private readonly sinks = new Set<LogSink>();

  constructor(options: LoggerOptions = {}) {
    this.logLevel = options.level ?? 'info';
    this.consoleEnabled = options.console ?? true;

    if (options.filePath) {
      const stream = createWriteStream(options.filePath, { flags: 'a' });
      stream.on('error', (error: Error) => {
        // File logging not available, use console only
        this.logStream = null;
        console.error(`Log file disabled: ${error.message}`);
      });
      this.logStream = stream;
    }
  }

  get level(): LogLevel {
    return this.logLevel;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  /**
   * Register a sink; returns a function that removes it again.
   */
  addSink(sink: LogSink): () => void {
    this.sinks.add(sink);
    return () => {
      this.sinks.delete(sink);
    };
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data);
  }

  error(message: string, error?: unknown): void {
    this.log('error', message, undefined, error);
  }

  private log(level: LogLevel, message: string, data?: unknown, error?: unknown): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    if (data !== undefined) {
      entry.data = data;
    }

    if (error !== undefined) {
      entry.error = error instanceof Error ? {
        message: error.message,
        stack: error.stack,
        name: error.name,
      } : error;
    }

    for (const sink of this.sinks) {
      sink(entry);
    }

    const logString = JSON.stringify(entry);

    if (this.consoleEnabled) {
      console.error(this.colorizeLog(level, logString));
    }

    if (this.logStream) {
      this.logStream.write(logString + '\n');
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  private colorizeLog(level: LogLevel, message: string): string {
    const colors: Record<LogLevel, string> = {
      debug: '\x1b[36m', // Cyan
      info: '\x1b[32m',  // Green
      warn: '\x1b[33m',  // Yellow
      error: '\x1b[31m', // Red
    };

    const reset = '\x1b[0m';
    return `${colors[level]}${message}${reset}`;
  }
}

export const logger = new Logger({
  level: parseLogLevel(process.env.COHORT_LOG_LEVEL),
  filePath: process.env.COHORT_LOG_FILE,
});
