/**
 * EffectiveConfig type
 * Centralized configuration object passed through the system
 */

/**
 * Manager backends the CLI can drive
 */
export type BackendToolName = 'claude' | 'codex' | 'mock';

/**
 * Deadlines, in milliseconds
 */
export interface TimeoutConfig {
  /** How long to wait for the Worker's result file */
  resultWaitMs: number;
  /** Overall bound on one Manager call (summarization included) */
  backendCallMs: number;
  /** Bounded wait when closing the result watcher */
  watcherStopMs: number;
}

/**
 * Conversation history and compaction settings
 */
export interface HistoryConfig {
  /** Summarize every N turns; 0 disables the periodic trigger */
  summarizationInterval: number;
  /** Turns sent to the Manager per call */
  maxHistoryTurns: number;
  /** Prompt budget; a warning is logged above 90% */
  maxContextTokens: number;
  /** Budget handed to the summarization call */
  summaryMaxTokens: number;
}

export interface WatcherConfig {
  /** Wait for the result file to stop changing for this long before reporting it */
  debounceMs: number;
  /** Poll instead of using native events (network shares, containers, tests) */
  usePolling: boolean;
}

/**
 * Names of the handshake files and directories, relative to the workspace root
 */
export interface HandshakeConfig {
  instructionsDir: string;
  logsDir: string;
  instructionFileName: string;
  resultFileName: string;
  processedDirName: string;
  /** Where per-project state lives inside the workspace */
  stateDirName: string;
}

export interface BackendConfig {
  tool: BackendToolName;
  model?: string;
  /** Override the executable (defaults to the tool name) */
  executablePath?: string;
}

export interface VerbosityConfig {
  verbose: boolean;
  debug: boolean;
  jsonOutput: boolean;
}

export interface InteractivityConfig {
  interactive: boolean;
}

export interface PathConfig {
  workingDirectory: string;
  /** Holds projects.json */
  dataDirectory: string;
}

/**
 * Source of a configuration value (for debugging/logging)
 */
export type ConfigSource = 'cli' | 'repo' | 'user' | 'default';

export interface EffectiveConfig {
  schemaVersion: '1.0.0';
  timeouts: TimeoutConfig;
  history: HistoryConfig;
  watcher: WatcherConfig;
  handshake: HandshakeConfig;
  backend: BackendConfig;
  verbosity: VerbosityConfig;
  interactivity: InteractivityConfig;
  paths: PathConfig;
  /** Timestamp when config was resolved (ISO 8601) */
  resolvedAt: string;
  /** Source of each resolved value, keyed by setting name */
  sources?: Record<string, ConfigSource>;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Omit<EffectiveConfig, 'resolvedAt' | 'paths'> = {
  schemaVersion: '1.0.0',
  timeouts: {
    resultWaitMs: 600_000,
    backendCallMs: 120_000,
    watcherStopMs: 2_000,
  },
  history: {
    summarizationInterval: 10,
    maxHistoryTurns: 20,
    maxContextTokens: 30_000,
    summaryMaxTokens: 1_000,
  },
  watcher: {
    debounceMs: 500,
    usePolling: false,
  },
  handshake: {
    instructionsDir: 'dev_instructions',
    logsDir: 'dev_logs',
    instructionFileName: 'next_step.txt',
    resultFileName: 'worker_output.txt',
    processedDirName: 'processed',
    stateDirName: '.handoff',
  },
  backend: {
    tool: 'claude',
  },
  verbosity: {
    verbose: false,
    debug: false,
    jsonOutput: false,
  },
  interactivity: {
    interactive: true,
  },
};
