import * as fs from 'fs/promises';
import * as path from 'path';
import type { CacheEvent } from '../types/events';
import type { Logger } from './types';

/**
 * Appends structured cache events to a JSON Lines file. Plain messages go to
 * the console, prefixed with the logger's bindings.
 */
export class JsonlLogger implements Logger {
  private filePath: string;
  private readonly bindings: Record<string, unknown>;

  constructor(filePath: string, bindings: Record<string, unknown> = {}) {
    this.filePath = filePath;
    this.bindings = bindings;
  }

  async log(event: CacheEvent): Promise<void> {
    const record = Object.keys(this.bindings).length > 0 ? { ...event, ...this.bindings } : event;
    const line = JSON.stringify(record) + '\n';
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Write failures are reported on stderr, not thrown.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: CacheEvent, _message: string): Promise<void> {
    await this.log(event);
  }

  debug(message: string): void {
    console.debug(this.withPrefix(message));
  }

  info(message: string): void {
    console.info(this.withPrefix(message));
  }

  warn(message: string): void {
    console.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(this.withPrefix(message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
