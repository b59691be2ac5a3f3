// Tasklane Logger - leveled console output with component prefixes

import type { LogLevel } from './types.js';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  child(component: string): Logger;
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return (LEVELS as string[]).includes(value);
}

class ConsoleLogger implements Logger {
  constructor(
    private prefix: string,
    private level: LogLevel,
  ) {}

  private shouldLog(level: LogLevel): boolean {
    if (this.level === 'silent') return false;
    return LEVELS.indexOf(this.level) <= LEVELS.indexOf(level);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) console.log(`${this.prefix} ${message}`, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) console.log(`${this.prefix} ${message}`, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) console.warn(`${this.prefix} ${message}`, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) console.error(`${this.prefix} ${message}`, ...args);
  }

  child(component: string): Logger {
    return new ConsoleLogger(`[${component}]`, this.level);
  }
}

/**
 * Create a logger for a component. Level precedence: explicit argument,
 * then TASKLANE_LOG_LEVEL, then `silent` under test, then `info`.
 */
export function createLogger(component: string, level?: LogLevel): Logger {
  const fromEnv = process.env['TASKLANE_LOG_LEVEL'];
  const resolved: LogLevel =
    level ??
    (fromEnv && isLogLevel(fromEnv) ? fromEnv : undefined) ??
    (process.env['NODE_ENV'] === 'test' ? 'silent' : 'info');
  return new ConsoleLogger(`[${component}]`, resolved);
}
