import * as fs from 'fs/promises';
import type { SearchEvent } from '../types/events';
import { prefixMessage } from './consoleLogger';
import type { Logger } from './types';

/**
 * Appends structured events to a JSON Lines file, one event per line.
 * Plain messages go to stderr with the logger's bindings as a prefix.
 */
export class JsonlLogger implements Logger {
  private filePath: string;
  private readonly bindings: Record<string, unknown>;

  constructor(filePath: string, bindings: Record<string, unknown> = {}) {
    this.filePath = filePath;
    this.bindings = bindings;
  }

  get path(): string {
    return this.filePath;
  }

  async log(event: SearchEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // A broken log sink must not fail the search.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: SearchEvent, _message: string): Promise<void> {
    await this.log(event);
  }

  debug(message: string): void {
    console.debug(prefixMessage(this.bindings, message));
  }

  info(message: string): void {
    console.error(prefixMessage(this.bindings, message));
  }

  warn(message: string): void {
    console.warn(prefixMessage(this.bindings, message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(prefixMessage(this.bindings, message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings });
  }
}
