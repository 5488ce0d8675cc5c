/**
 * Console logger for long-running parts of taskrelay (worker, store sync).
 *
 * - One line per event: `<time> <LEVEL> [scope] message`
 * - Level comes from config `logLevel`; DEBUG=1 in the environment forces debug
 * - CLI commands print their own output with console.log + chalk
 */

import chalk from 'chalk';
import type { LogLevel } from '../types/index.js';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = process.env.DEBUG ? 'debug' : 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = process.env.DEBUG ? 'debug' : level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function formatArg(arg: unknown): string {
  if (typeof arg === 'string') return arg;
  if (arg instanceof Error) return arg.stack ?? arg.message;
  return JSON.stringify(arg);
}

export class Logger {
  constructor(private readonly scope?: string) {}

  child(scope: string): Logger {
    return new Logger(this.scope ? `${this.scope}:${scope}` : scope);
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

    const ts = chalk.dim(new Date().toISOString());
    const scope = this.scope ? chalk.dim(`[${this.scope}] `) : '';
    const rest = args.length > 0 ? ' ' + args.map(formatArg).join(' ') : '';
    const line = `${ts} ${colorLevel(level)} ${scope}${message}${rest}`;

    if (level === 'error' || level === 'warn') {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

function colorLevel(level: LogLevel): string {
  switch (level) {
    case 'debug':
      return chalk.gray('DEBUG');
    case 'info':
      return chalk.blue('INFO ');
    case 'warn':
      return chalk.yellow('WARN ');
    case 'error':
      return chalk.red('ERROR');
  }
}

export const logger = new Logger();
