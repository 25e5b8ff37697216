/**
 * Console Logger
 *
 * Writes to stderr by default so that stdout carries only the shell and its
 * rendered engine events.
 */

import type { LogEvent, LogEventType, LoggerOptions } from '../types/logger';
import { BaseLogger } from './base-logger';

export interface ConsoleLoggerOptions extends LoggerOptions {
  /** One JSON object per line instead of pretty output */
  jsonOutput?: boolean;
  /** Prefix pretty lines with the time of day (UTC) */
  includeTimestamp?: boolean;
  stream?: NodeJS.WritableStream;
}

const PLAIN_EVENT_TYPES: ReadonlySet<LogEventType> = new Set<LogEventType>(['debug', 'info', 'warn', 'error']);

export function formatPretty(event: LogEvent, includeTimestamp: boolean): string {
  const parts: string[] = [];
  if (includeTimestamp) {
    parts.push(event.timestamp.slice(11, 23));
  }
  parts.push(event.level.toUpperCase().padEnd(5));
  parts.push(PLAIN_EVENT_TYPES.has(event.eventType) ? event.message : `${event.eventType}: ${event.message}`);

  const { project, state, cycle } = event.metadata;
  const tags: string[] = [];
  if (typeof project === 'string') tags.push(`project=${project}`);
  if (typeof state === 'string') tags.push(`state=${state}`);
  if (typeof cycle === 'number') tags.push(`cycle=${cycle}`);
  if (tags.length > 0) {
    parts.push(`[${tags.join(' ')}]`);
  }
  return parts.join(' ');
}

export class ConsoleLogger extends BaseLogger {
  private readonly jsonOutput: boolean;
  private readonly includeTimestamp: boolean;
  private readonly stream: NodeJS.WritableStream;

  constructor(options: ConsoleLoggerOptions = {}) {
    super(options, 'info');
    this.jsonOutput = options.jsonOutput ?? false;
    this.includeTimestamp = options.includeTimestamp ?? true;
    this.stream = options.stream ?? process.stderr;
  }

  protected emit(event: LogEvent): void {
    const line = this.jsonOutput ? JSON.stringify(event) : formatPretty(event, this.includeTimestamp);
    this.stream.write(`${line}\n`);
  }
}

export function createConsoleLogger(options?: ConsoleLoggerOptions): ConsoleLogger {
  return new ConsoleLogger(options);
}
