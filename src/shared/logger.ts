/**
 * STL Relay: Structured Logging
 *
 * Writes timestamped log entries to one process-wide sink: standard output
 * by default, or an append-mode log file. Never throws; logging failures
 * are swallowed.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/** A destination for finished log lines. */
export interface LogSink {
  readonly destination: string;
  write(line: string): void;
  close(): void;
}

const STDOUT_DESTINATION = '<stdout>';

/** Never closed: closing the process's stdout breaks everything after it. */
const stdoutSink: LogSink = {
  destination: STDOUT_DESTINATION,
  write(line: string): void {
    process.stdout.write(line);
  },
  close(): void {},
};

class FileSink implements LogSink {
  private fd: number | null;

  constructor(
    readonly destination: string,
    fd: number,
  ) {
    this.fd = fd;
  }

  write(line: string): void {
    if (this.fd === null) return;
    fs.writeSync(this.fd, line);
  }

  close(): void {
    if (this.fd === null) return;
    const fd = this.fd;
    this.fd = null;
    fs.closeSync(fd);
  }
}

let activeSink: LogSink = stdoutSink;

function formatArg(a: unknown): string {
  if (a instanceof Error) {
    return `${a.name}: ${a.message}${a.stack ? `\n${a.stack}` : ''}`;
  }
  if (typeof a === 'object' && a !== null) {
    try {
      return JSON.stringify(a);
    } catch {
      return String(a);
    }
  }
  return String(a);
}

export function formatLine(level: LogLevel, name: string, args: unknown[]): string {
  const timestamp = new Date().toISOString();
  const message = args.map(formatArg).join(' ');
  return `[${timestamp}] [${level}] [${name}] ${message}\n`;
}

/**
 * Open an append-mode log file. Any failure falls back to standard output
 * and the reason is written there.
 */
export function openLogSink(filePath?: string): LogSink {
  if (!filePath) return stdoutSink;

  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const fd = fs.openSync(filePath, 'a');
    return new FileSink(filePath, fd);
  } catch (err) {
    stdoutSink.write(
      formatLine('WARN', 'logger', [`Cannot open log file ${filePath}, using standard output:`, err]),
    );
    return stdoutSink;
  }
}

export function isStdoutSink(sink: LogSink): boolean {
  return sink === stdoutSink;
}

/** Route every logger to `sink`. */
export function setLogSink(sink: LogSink): void {
  activeSink = sink;
}

export function getLogSink(): LogSink {
  return activeSink;
}

/**
 * Close the active sink unless it is stdout, then fall back to stdout.
 * Safe to call any number of times.
 */
export function closeLogSink(): void {
  const sink = activeSink;
  activeSink = stdoutSink;
  if (sink === stdoutSink) return;

  try {
    sink.close();
  } catch (err) {
    stdoutSink.write(formatLine('ERROR', 'logger', [`Failed to close log file ${sink.destination}:`, err]));
  }
}

/**
 * Create a logger for a specific module.
 */
export function createLogger(name: string): Logger {
  function log(level: LogLevel, ...args: unknown[]): void {
    try {
      activeSink.write(formatLine(level, name, args));
    } catch {
      // Logging must never throw. Swallow silently.
    }
  }

  return {
    debug: (...args: unknown[]) => log('DEBUG', ...args),
    info: (...args: unknown[]) => log('INFO', ...args),
    warn: (...args: unknown[]) => log('WARN', ...args),
    error: (...args: unknown[]) => log('ERROR', ...args),
  };
}
