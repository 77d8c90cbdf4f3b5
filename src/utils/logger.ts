import chalk from 'chalk';
import { envVar } from '../config/branding.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  setLevel(level: LogLevel): void;
}

export function parseLogLevel(value: string | undefined): LogLevel | null {
  if (!value) return null;
  const lower = value.toLowerCase();
  return LEVELS.find((l) => l === lower) ?? null;
}

/**
 * Leveled logger writing to stderr, so command output on stdout stays clean.
 */
class ConsoleLogger implements Logger {
  private level: LogLevel;

  constructor(level: LogLevel) {
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    const prefix = {
      debug: chalk.gray('[debug]'),
      info: chalk.blue('[info] '),
      warn: chalk.yellow('[warn] '),
      error: chalk.red('[error]'),
      silent: '',
    }[level];
    let line = `${prefix} ${message}`;
    if (meta && Object.keys(meta).length > 0) {
      line += ' ' + chalk.gray(JSON.stringify(meta));
    }
    process.stderr.write(line + '\n');
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write('error', message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

function initialLevel(): LogLevel {
  if (process.env[envVar('VERBOSE')] === '1') return 'debug';
  return parseLogLevel(process.env[envVar('LOG_LEVEL')]) ?? 'error';
}

export const logger: Logger = new ConsoleLogger(initialLevel());
