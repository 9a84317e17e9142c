/**
 * File logger for the monitor.
 *
 * Appends `[time] [LEVEL] [scope] message` lines to the shepherd log and
 * echoes debug output to stderr in verbose mode. stdout is reserved for
 * the rendered event stream.
 */

import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { describeError } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Logger whose lines carry a narrower scope */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  /** Log file path; null keeps records off disk */
  filePath: string | null;
  verbose?: boolean;
  scope?: string;
}

interface Sink {
  filePath: string | null;
  verbose: boolean;
}

class ShepherdLogger implements Logger {
  constructor(
    private readonly sink: Sink,
    private readonly scope: string
  ) {}

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  child(scope: string): Logger {
    return new ShepherdLogger(this.sink, `${this.scope}:${scope}`);
  }

  private write(level: LogLevel, message: string): void {
    const line = formatLogLine(level, this.scope, message);

    if (this.sink.verbose && level === 'debug') {
      process.stderr.write(`${line}\n`);
    }

    if (!this.sink.filePath) return;

    try {
      appendFileSync(this.sink.filePath, `${line}\n`);
    } catch (err) {
      const failedPath = this.sink.filePath;
      // Shared by every child, so this reports once
      this.sink.filePath = null;
      process.stderr.write(`[shepherd] Logging to ${failedPath} disabled: ${describeError(err)}\n`);
    }
  }
}

/**
 * Format one log record
 */
export function formatLogLine(level: LogLevel, scope: string, message: string, now: Date = new Date()): string {
  return `[${now.toISOString()}] [${level.toUpperCase()}] [${scope}] ${message}`;
}

/**
 * Create the root logger; the log directory is created on demand
 */
export function createLogger(options: LoggerOptions): Logger {
  let filePath = options.filePath;
  if (filePath) {
    try {
      mkdirSync(dirname(filePath), { recursive: true });
    } catch (err) {
      process.stderr.write(`[shepherd] Cannot create log directory for ${filePath}: ${describeError(err)}\n`);
      filePath = null;
    }
  }
  return new ShepherdLogger({ filePath, verbose: options.verbose === true }, options.scope ?? 'shepherd');
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
