/**
 * Logger interface
 * Structured logging with event types and metadata
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured event types for the engine lifecycle
 */
export type LogEventType =
  // State machine
  | 'state_changed'
  | 'invalid_transition'
  // Projects and persistence
  | 'project_loaded'
  | 'state_saved'
  // Manager backend
  | 'backend_call_started'
  | 'backend_call_completed'
  | 'backend_call_failed'
  // Handshake
  | 'instruction_written'
  | 'result_detected'
  | 'result_archived'
  | 'watcher_started'
  | 'watcher_stopped'
  | 'timeout_fired'
  // History compaction
  | 'summary_updated'
  | 'summary_failed'
  // General
  | 'debug'
  | 'info'
  | 'warn'
  | 'error';

/**
 * Base metadata included in log events
 */
export interface LogMetadata {
  /** Active project name */
  project?: string;
  /** Engine state at the time of the event */
  state?: string;
  /** Dispatch cycle token */
  cycle?: number;
  [key: string]: unknown;
}

export interface LogEvent {
  /** ISO 8601 */
  timestamp: string;
  level: LogLevel;
  eventType: LogEventType;
  message: string;
  metadata: LogMetadata;
}

export interface LoggerOptions {
  /** Minimum log level to emit */
  minLevel?: LogLevel;
  /** Patterns to redact from messages and string metadata */
  redactPatterns?: RegExp[];
}

/**
 * What the engine and its collaborators log through
 */
export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, metadata?: LogMetadata): void;

  /**
   * Log a structured event; the level is derived from the event type
   */
  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void;

  /**
   * Merge context (the active project) into all subsequent logs
   */
  setContext(context: Partial<LogMetadata>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

/**
 * Map a structured event type to the level it is logged at
 */
export function levelForEvent(eventType: LogEventType): LogLevel {
  switch (eventType) {
    case 'error':
    case 'backend_call_failed':
      return 'error';
    case 'warn':
    case 'invalid_transition':
    case 'timeout_fired':
    case 'summary_failed':
      return 'warn';
    case 'debug':
    case 'state_saved':
      return 'debug';
    default:
      return 'info';
  }
}

/**
 * Secret patterns to redact. Manager CLIs echo keys in error output now and then.
 */
export const DEFAULT_REDACT_PATTERNS: RegExp[] = [
  /(?:api[_-]?key|apikey)[=:\s]*['"]?([a-zA-Z0-9_-]{20,})['"]?/gi,
  /Bearer\s+[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/gi,
  /sk-ant-[a-zA-Z0-9-_]{40,}/gi,
  /sk-[a-zA-Z0-9]{48}/g,
  /AIza[0-9A-Za-z_-]{35}/g,
];

export function redactSecrets(text: string, patterns: RegExp[] = DEFAULT_REDACT_PATTERNS): string {
  let result = text;
  for (const pattern of patterns) {
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => {
      const visible = Math.min(4, Math.floor(match.length / 4));
      return match.slice(0, visible) + '[REDACTED]';
    });
  }
  return result;
}
