import { ConstifyEvent, ConstifyEventType, Logger, ScopedLogger } from '@constify/shared';

/**
 * Logger that keeps everything in memory for assertions.
 */
export class RecordingLogger implements Logger {
  readonly events: ConstifyEvent[] = [];
  readonly messages: string[] = [];

  log(event: ConstifyEvent): void {
    this.events.push(event);
  }

  debug(message: string): void {
    this.messages.push(`debug: ${message}`);
  }

  info(message: string): void {
    this.messages.push(`info: ${message}`);
  }

  warn(message: string): void {
    this.messages.push(`warn: ${message}`);
  }

  error(error: Error, message?: string): void {
    this.messages.push(`error: ${message ?? error.message}`);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  eventsOf<T extends ConstifyEventType>(type: T): Extract<ConstifyEvent, { type: T }>[] {
    return this.events.filter((e): e is Extract<ConstifyEvent, { type: T }> => e.type === type);
  }
}
