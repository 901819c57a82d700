import type { LogkbEvent } from '../types/events';
import { formatPrefix } from './prefix';
import type { Logger } from './types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface ConsoleLoggerOptions {
  /** Messages below this level are dropped. Structured events always print at `debug`. */
  level?: LogLevel;
  bindings?: Record<string, unknown>;
}

export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly bindings: Record<string, unknown>;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.bindings = options.bindings ?? {};
  }

  log(event: LogkbEvent): void {
    if (this.enabled('debug')) {
      console.log(JSON.stringify(event));
    }
  }

  trace(event: LogkbEvent, message: string): void {
    if (this.enabled('debug')) {
      console.log(formatPrefix(this.bindings, message), JSON.stringify(event));
    }
  }

  debug(message: string): void {
    if (this.enabled('debug')) console.debug(formatPrefix(this.bindings, message));
  }

  info(message: string): void {
    if (this.enabled('info')) console.info(formatPrefix(this.bindings, message));
  }

  warn(message: string): void {
    if (this.enabled('warn')) console.warn(formatPrefix(this.bindings, message));
  }

  error(error: Error, message?: string): void {
    if (!this.enabled('error')) return;
    if (message) {
      console.error(formatPrefix(this.bindings, message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ConsoleLogger({ level: this.level, bindings: { ...this.bindings, ...bindings } });
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}
