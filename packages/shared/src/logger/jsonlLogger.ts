import * as fs from 'fs/promises';
import type { LogkbEvent } from '../types/events';
import { redact } from '../redaction';
import { formatPrefix } from './prefix';
import type { Logger } from './types';

/**
 * Appends structured events to a JSONL trace file and forwards human-readable
 * messages to the console. Event payloads are redacted before they hit disk.
 */
export class JsonlLogger implements Logger {
  private readonly filePath: string;
  private readonly bindings: Record<string, unknown>;

  constructor(filePath: string, bindings: Record<string, unknown> = {}) {
    this.filePath = filePath;
    this.bindings = bindings;
  }

  async log(event: LogkbEvent): Promise<void> {
    const line = JSON.stringify(redact(event)) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Logging must never fail a build.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: LogkbEvent, _message: string): Promise<void> {
    await this.log(event);
  }

  debug(message: string): void {
    console.debug(formatPrefix(this.bindings, message));
  }

  info(message: string): void {
    console.info(formatPrefix(this.bindings, message));
  }

  warn(message: string): void {
    console.warn(formatPrefix(this.bindings, message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(formatPrefix(this.bindings, message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings });
  }
}
