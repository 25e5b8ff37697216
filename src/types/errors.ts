/**
 * Engine error taxonomy.
 * Each kind maps to an ERROR transition with a readable message, except
 * ValidationError, which is returned to the caller with no state change.
 */

import type { FileSystemError } from './file-system';

export type OrchestratorErrorKind =
  | 'validation'
  | 'invalid_state'
  | 'persistence'
  | 'file_write'
  | 'file_read'
  | 'watcher'
  | 'result_timeout'
  | 'backend_auth'
  | 'backend_call'
  | 'unhandled';

export abstract class OrchestratorError extends Error {
  abstract readonly kind: OrchestratorErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed caller input */
export class ValidationError extends OrchestratorError {
  readonly kind = 'validation';

  constructor(
    message: string,
    readonly field?: string
  ) {
    super(message);
  }
}

/** A command arrived in a state that cannot take it (no project, nothing to answer) */
export class InvalidStateError extends OrchestratorError {
  readonly kind = 'invalid_state';
}

/** Project state could not be loaded or saved */
export class PersistenceError extends OrchestratorError {
  readonly kind = 'persistence';
}

/** The instruction file (or a handshake directory) could not be written */
export class FileWriteError extends OrchestratorError {
  readonly kind = 'file_write';

  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  static fromFileSystem(action: string, error: FileSystemError): FileWriteError {
    return new FileWriteError(`Failed to ${action}: ${error.message}`, error.path, { cause: error.cause });
  }
}

/** The result file could not be read or archived */
export class FileReadError extends OrchestratorError {
  readonly kind = 'file_read';

  constructor(
    message: string,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }

  static fromFileSystem(action: string, error: FileSystemError): FileReadError {
    return new FileReadError(`Failed to ${action}: ${error.message}`, error.path, { cause: error.cause });
  }
}

/** The result watcher failed to start or crashed */
export class WatcherError extends OrchestratorError {
  readonly kind = 'watcher';
}

/** The Worker produced no result within the deadline */
export class ResultTimeout extends OrchestratorError {
  readonly kind = 'result_timeout';

  constructor(readonly timeoutMs: number) {
    super(`Worker result timeout: no result file after ${Math.round(timeoutMs / 1000)} seconds`);
  }
}

/** The Manager backend rejected its credentials */
export class BackendAuthError extends OrchestratorError {
  readonly kind = 'backend_auth';
}

/** The Manager backend failed or timed out */
export class BackendCallError extends OrchestratorError {
  readonly kind = 'backend_call';
}

/** Anything not anticipated. Always logged with its stack. */
export class UnhandledError extends OrchestratorError {
  readonly kind = 'unhandled';

  static wrap(cause: unknown): UnhandledError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new UnhandledError(`Unexpected error: ${detail}`, { cause });
  }
}

/**
 * Normalize anything thrown inside the engine into the taxonomy
 */
export function toOrchestratorError(error: unknown): OrchestratorError {
  return error instanceof OrchestratorError ? error : UnhandledError.wrap(error);
}
