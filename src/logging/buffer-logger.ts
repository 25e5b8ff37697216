/**
 * Buffer Logger
 * Keeps every event in memory for assertions
 */

import type { LogEvent, LogEventType, LoggerOptions } from '../types/logger';
import { BaseLogger } from './base-logger';

export class BufferLogger extends BaseLogger {
  private readonly events: LogEvent[] = [];

  constructor(options: LoggerOptions = {}) {
    super(options, 'debug');
  }

  getEvents(): LogEvent[] {
    return [...this.events];
  }

  clear(): void {
    this.events.length = 0;
  }

  getEventsByType(eventType: LogEventType): LogEvent[] {
    return this.events.filter((e) => e.eventType === eventType);
  }

  hasEventType(eventType: LogEventType): boolean {
    return this.events.some((e) => e.eventType === eventType);
  }

  getEventsMatching(pattern: RegExp): LogEvent[] {
    return this.events.filter((e) => pattern.test(e.message));
  }

  protected emit(event: LogEvent): void {
    this.events.push(event);
  }
}

export function createBufferLogger(options?: LoggerOptions): BufferLogger {
  return new BufferLogger(options);
}
