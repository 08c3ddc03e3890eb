/**
 * Logging
 *
 * Leveled logger with a colorized console sink and an optional plain-text
 * file sink. Pipeline components take a Logger and default to silentLogger.
 */

import chalk from 'chalk';
import { createWriteStream, mkdirSync, type WriteStream } from 'node:fs';
import { dirname } from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogContext = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export interface LoggerOptions {
  /** Minimum level for the console sink */
  level?: LogLevel;
  /** Append every message at debug level and above to this file */
  file?: string;
  /** Console writer; the CLI routes this through the spinner */
  write?: (line: string) => void;
}

export interface ClosableLogger extends Logger {
  close(): Promise<void>;
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

const CONSOLE_PREFIX: Record<Exclude<LogLevel, 'silent'>, () => string> = {
  debug: () => chalk.dim('·'),
  info: () => chalk.blue('ℹ'),
  warn: () => chalk.yellow('⚠'),
  error: () => chalk.red('✗'),
};

export function formatContext(context?: LogContext): string {
  if (!context) return '';
  const parts = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${value}`);
  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}

function openLogFile(file: string): WriteStream {
  mkdirSync(dirname(file), { recursive: true });
  return createWriteStream(file, { flags: 'a', encoding: 'utf-8' });
}

export function createLogger(options: LoggerOptions = {}): ClosableLogger {
  const threshold = LEVEL_RANK[options.level ?? 'info'];
  const write = options.write ?? ((line: string) => console.log(line));

  const stream = options.file ? openLogFile(options.file) : null;

  const emit = (level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext) => {
    const suffix = formatContext(context);
    if (stream) {
      stream.write(`${new Date().toISOString()} [${level.toUpperCase()}] ${message}${suffix}\n`);
    }
    if (LEVEL_RANK[level] >= threshold) {
      const text = level === 'debug' ? chalk.dim(message + suffix) : message + chalk.dim(suffix);
      write(`${CONSOLE_PREFIX[level]()} ${text}`);
    }
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),
    close: () =>
      new Promise<void>((resolve, reject) => {
        if (!stream) {
          resolve();
          return;
        }
        stream.once('error', reject);
        stream.end(() => resolve());
      }),
  };
}
