/**
 * CLI Types
 *
 * Type definitions for CLI argument parsing
 */

import type { BackendToolName } from '../types/effective-config';

/** Parsed CLI arguments */
export interface ParsedArgs {
  /** Task text to start with (positional words joined by spaces) */
  input: string;

  /** Project to select on startup */
  project: string | null;

  /** Manager backend (claude|codex|mock) */
  backend: BackendToolName | null;

  /** Model passed to the Manager CLI */
  model: string | null;

  /** Directory holding projects.json */
  dataDirectory: string | null;

  /** Seconds to wait for the Worker result file */
  resultTimeoutSeconds: number | null;

  /** Seconds allowed for one Manager call */
  backendTimeoutSeconds: number | null;

  /** Summarize every N turns (0 disables the periodic trigger) */
  summarizationInterval: number | null;

  /** Turns sent to the Manager per call */
  maxHistoryTurns: number | null;

  /** Show help and exit */
  help: boolean;

  /** Show version and exit */
  version: boolean;

  /** Run the given task once without the interactive shell */
  noInteractive: boolean;

  /** Show state changes */
  verbose: boolean;

  /** Debug-level logs */
  debug: boolean;

  /** One JSON line per engine event */
  jsonOutput: boolean;
}

/** Default values for parsed arguments */
export const DEFAULT_ARGS: ParsedArgs = {
  input: '',
  project: null,
  backend: null,
  model: null,
  dataDirectory: null,
  resultTimeoutSeconds: null,
  backendTimeoutSeconds: null,
  summarizationInterval: null,
  maxHistoryTurns: null,
  help: false,
  version: false,
  noInteractive: false,
  verbose: false,
  debug: false,
  jsonOutput: false,
};

/** Result of parsing arguments */
export type ParseResult = { success: true; args: ParsedArgs } | { success: false; error: string };
