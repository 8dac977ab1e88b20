/**
 * Lineage logger
 * Writes to stderr (stdout carries command output and MCP JSON-RPC) and
 * optionally appends to a log file.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

let globalLogLevel: LogLevel = 'info';
let logFileStream: fs.WriteStream | null = null;

export function configureLogger(options: {
  level?: LogLevel;
  file?: string | null;
}): void {
  if (options.level) {
    globalLogLevel = options.level;
  }
  if (options.file !== undefined) {
    closeLogger();
    if (options.file) {
      fs.mkdirSync(path.dirname(options.file), { recursive: true });
      logFileStream = fs.createWriteStream(options.file, { flags: 'a' });
    }
  }
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[globalLogLevel];
}

function formatLogLine(
  level: LogLevel,
  message: string,
  args: unknown[],
  timestamp: string = new Date().toISOString(),
): string {
  const levelTag = level.toUpperCase().padEnd(5);
  const extra = args.length > 0
    ? ' ' + args.map((a) => (typeof a === 'string' ? a : JSON.stringify(a))).join(' ')
    : '';
  return `[${timestamp}] ${levelTag} ${message}${extra}`;
}

function write(level: LogLevel, message: string, args: unknown[]): void {
  if (!shouldLog(level)) return;
  const line = formatLogLine(level, message, args) + '\n';
  process.stderr.write(line);
  logFileStream?.write(line);
}

export function closeLogger(): void {
  if (logFileStream) {
    logFileStream.end();
    logFileStream = null;
  }
}

export function createLogger(prefix?: string): Logger {
  const p = prefix ? `[${prefix}] ` : '';
  return {
    debug(message: string, ...args: unknown[]) {
      write('debug', p + message, args);
    },
    info(message: string, ...args: unknown[]) {
      write('info', p + message, args);
    },
    warn(message: string, ...args: unknown[]) {
      write('warn', p + message, args);
    },
    error(message: string, ...args: unknown[]) {
      write('error', p + message, args);
    },
  };
}
