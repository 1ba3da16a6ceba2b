/**
 * Run log.
 *
 * Components receive a `Logger` instead of writing to a process-wide file, so
 * tests can capture diagnostics in memory. The CLI composes a file sink with a
 * console sink.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Destination for formatted log entries.
 */
export interface LogSink {
  write(level: LogLevel, message: string, timestamp: Date): void;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Formats one log line: `[2024-01-01T00:00:00.000Z] [INFO ] message`.
 */
export function formatLogLine(level: LogLevel, message: string, timestamp: Date): string {
  return `[${timestamp.toISOString()}] [${level.toUpperCase().padEnd(5)}] ${message}`;
}

/**
 * Appends timestamped lines to a file, creating its directory on first use.
 */
export function createFileLogSink(filePath: string): LogSink {
  let prepared = false;
  return {
    write(level, message, timestamp) {
      if (!prepared) {
        mkdirSync(dirname(filePath), { recursive: true });
        prepared = true;
      }
      appendFileSync(filePath, formatLogLine(level, message, timestamp) + '\n', 'utf-8');
    },
  };
}

/**
 * Mirrors entries to the console the way the CLI reports progress.
 */
export function createConsoleLogSink(minLevel: LogLevel = 'info'): LogSink {
  const order: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };
  return {
    write(level, message) {
      if (order[level] < order[minLevel]) return;
      if (level === 'error') {
        console.error(`[ERROR] ${message}`);
      } else if (level === 'warn') {
        console.warn(`[WARN] ${message}`);
      } else {
        console.log(message);
      }
    },
  };
}

export interface MemoryLogSink extends LogSink {
  readonly lines: string[];
}

/**
 * Keeps formatted lines in memory.
 */
export function createMemoryLogSink(): MemoryLogSink {
  const lines: string[] = [];
  return {
    lines,
    write(level, message, timestamp) {
      lines.push(formatLogLine(level, message, timestamp));
    },
  };
}

/**
 * Builds a logger that fans each entry out to every sink.
 */
export function createLogger(sinks: LogSink[], now: () => Date = () => new Date()): Logger {
  const emit = (level: LogLevel, message: string) => {
    const timestamp = now();
    for (const sink of sinks) {
      sink.write(level, message, timestamp);
    }
  };
  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
}
