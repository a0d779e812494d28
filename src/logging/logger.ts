import { appendFileSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import type { LogLevel } from '../config/settings.js';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface FileLoggerOptions {
  file: string;
  level?: LogLevel;
  now?: () => Date;
}

export function formatLogLine(time: Date, level: LogLevel, message: string): string {
  return `${time.toISOString()} - ${level.toUpperCase()} - ${message}\n`;
}

/**
 * Append-only log file. The quiz owns the terminal, so diagnostics never go
 * to stdout.
 */
export function createFileLogger(options: FileLoggerOptions): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const now = options.now ?? (() => new Date());
  let dirReady = false;

  const write = (level: LogLevel, message: string): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    if (!dirReady) {
      mkdirSync(dirname(options.file), { recursive: true });
      dirReady = true;
    }
    appendFileSync(options.file, formatLogLine(now(), level, message));
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
