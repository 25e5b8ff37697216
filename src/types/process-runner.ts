/**
 * ProcessRunner interface
 * Abstracts subprocess execution for the CLI-backed Manager
 */

export interface SpawnOptions {
  args: string[];
  cwd: string;
  /** Environment variables (merged with process.env) */
  env?: Record<string, string>;
  /** Number of stderr lines to keep */
  tailLines?: number;
}

export interface SpawnResult {
  exitCode: number;
  durationMs: number;
  /** Complete stdout */
  stdout: string;
  /** Last N lines of stderr */
  stderrTail: string[];
  /** Whether the process was terminated by a signal */
  interrupted: boolean;
  signal?: string;
}

export interface ProcessRunner {
  /**
   * Spawn a subprocess and wait for it to exit.
   * Rejects when the executable cannot be started.
   */
  spawn(command: string, options: SpawnOptions): Promise<SpawnResult>;

  /**
   * Signal every process this runner started
   */
  killAll?(signal?: NodeJS.Signals): void;
}
