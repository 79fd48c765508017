/**
 * Structured JSON-lines logging.
 * Standard output belongs to the descriptor protocol and the pcap stream, so records go to
 * stderr, or are appended to the --debug-file when one is given.
 */

import { appendFileSync } from 'node:fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogRecord {
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Optional extra key-value for context. */
  [key: string]: unknown;
}

export interface LoggerOptions {
  /** Lower the threshold to 'debug' (default threshold is 'warn'). */
  debug?: boolean;
  /** Append records to this file instead of stderr. */
  debugFile?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = 'warn';
let logFile: string | undefined;

export function configureLogger(options: LoggerOptions): void {
  threshold = options.debug === true ? 'debug' : 'warn';
  const file = options.debugFile?.trim();
  logFile = file !== undefined && file !== '' ? options.debugFile : undefined;
}

export function resetLogger(): void {
  threshold = 'warn';
  logFile = undefined;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

function isoTimestamp(): string {
  return new Date().toISOString();
}

function write(record: LogRecord): void {
  const line = JSON.stringify(record) + '\n';
  if (logFile !== undefined) {
    try {
      appendFileSync(logFile, line);
      return;
    } catch (err) {
      // Unwritable debug file: fall through to stderr so the record is not lost.
      const reason = err instanceof Error ? err.message : String(err);
      process.stderr.write(
        JSON.stringify({ timestamp: isoTimestamp(), level: 'warn', message: 'Debug file not writable', file: logFile, error: reason }) + '\n'
      );
    }
  }
  process.stderr.write(line);
}

function log(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
  if (!isLevelEnabled(level)) return;
  const record: LogRecord = {
    timestamp: isoTimestamp(),
    level,
    message,
    ...extra,
  };
  write(record);
}

export function logDebug(message: string, extra?: Record<string, unknown>): void {
  log('debug', message, extra);
}

export function logInfo(message: string, extra?: Record<string, unknown>): void {
  log('info', message, extra);
}

export function logWarn(message: string, extra?: Record<string, unknown>): void {
  log('warn', message, extra);
}

export function logError(message: string, extra?: Record<string, unknown>): void {
  log('error', message, extra);
}
