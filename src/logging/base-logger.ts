/**
 * Level filtering, context merging and redaction shared by every Logger.
 * Subclasses decide where a finished LogEvent goes.
 */

import { DEFAULT_REDACT_PATTERNS, levelForEvent, redactSecrets, shouldLog } from '../types/logger';
import type { Logger, LogEvent, LogEventType, LoggerOptions, LogLevel, LogMetadata } from '../types/logger';

export abstract class BaseLogger implements Logger {
  protected minLevel: LogLevel;
  protected context: Partial<LogMetadata> = {};
  private readonly redactPatterns: RegExp[];

  protected constructor(options: LoggerOptions, defaultLevel: LogLevel) {
    this.minLevel = options.minLevel ?? defaultLevel;
    this.redactPatterns = options.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', 'debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', 'info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', 'warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', 'error', message, metadata);
  }

  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    this.log(levelForEvent(eventType), eventType, message, metadata);
  }

  setContext(context: Partial<LogMetadata>): void {
    this.context = { ...this.context, ...context };
  }

  protected abstract emit(event: LogEvent): void;

  private log(level: LogLevel, eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }

    const merged: LogMetadata = { ...this.context, ...metadata };
    for (const [key, value] of Object.entries(merged)) {
      if (typeof value === 'string') {
        merged[key] = redactSecrets(value, this.redactPatterns);
      }
    }

    this.emit({
      timestamp: new Date().toISOString(),
      level,
      eventType,
      message: redactSecrets(message, this.redactPatterns),
      metadata: merged,
    });
  }
}
