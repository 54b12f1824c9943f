import * as fs from 'fs/promises';
import { ConstifyEvent } from '../types/events';
import { redactForLogs } from '../redaction';
import { ConsoleLoggerOptions, formatPrefix } from './consoleLogger';
import type { Logger } from './types';

/**
 * Appends structured events to a JSONL trace file; plain messages go to the console.
 */
export class JsonlLogger implements Logger {
  private filePath: string;
  private readonly options: ConsoleLoggerOptions;
  private readonly bindings: Record<string, unknown>;

  constructor(
    filePath: string,
    options: ConsoleLoggerOptions = {},
    bindings: Record<string, unknown> = {},
  ) {
    this.filePath = filePath;
    this.options = options;
    this.bindings = bindings;
  }

  async log(event: ConstifyEvent): Promise<void> {
    const line = JSON.stringify(redactForLogs(event)) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Logging must not fail a file's pipeline.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  debug(message: string): void {
    if (!this.options.verbose) return;
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
    return new JsonlLogger(this.filePath, this.options, { ...this.bindings, ...bindings });
  }
}
