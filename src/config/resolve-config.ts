/**
 * Configuration Resolution
 * Single-pass config resolution with explicit precedence
 * CLI flags > repo config > user config > defaults
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { parseFileConfig } from '../schemas/validators';
import type { FileConfig } from '../schemas/validators';
import { DEFAULT_CONFIG } from '../types/effective-config';
import type { BackendToolName, ConfigSource, EffectiveConfig } from '../types/effective-config';

export const CONFIG_DIR_NAME = '.handoff';
export const CONFIG_FILE_NAME = 'config.json';

/**
 * CLI flags that can override configuration
 */
export interface CliFlags {
  backend?: BackendToolName;
  model?: string;
  dataDirectory?: string;
  resultTimeoutSeconds?: number;
  backendTimeoutSeconds?: number;
  summarizationInterval?: number;
  maxHistoryTurns?: number;
  verbose?: boolean;
  debug?: boolean;
  jsonOutput?: boolean;
  noInteractive?: boolean;
  workingDirectory?: string;
}

export interface ResolveConfigOptions {
  workingDirectory?: string;
  /** Where the user config lives under `.config/handoff` */
  homeDirectory?: string;
  now?: Date;
}

export interface ResolvedConfig {
  config: EffectiveConfig;
  /** Config files that were present but unusable */
  warnings: string[];
}

export function repoConfigPath(workingDirectory: string): string {
  return join(workingDirectory, CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

export function userConfigPath(homeDirectory: string): string {
  return join(homeDirectory, '.config', 'handoff', CONFIG_FILE_NAME);
}

/**
 * Load and validate a JSON config file. Missing files are not an error.
 */
function loadConfigFile(path: string, warnings: string[]): FileConfig | null {
  if (!existsSync(path)) {
    return null;
  }
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    warnings.push(`Ignoring ${path}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
  const parsed = parseFileConfig(content);
  if (!parsed.success || !parsed.data) {
    warnings.push(`Ignoring ${path}: ${(parsed.errors ?? ['invalid config']).join('; ')}`);
    return null;
  }
  return parsed.data;
}

function seconds(value: number): number {
  return Math.round(value * 1000);
}

/**
 * Resolve configuration from all sources with explicit precedence
 */
export function resolveConfig(cliFlags: CliFlags, options: ResolveConfigOptions = {}): ResolvedConfig {
  const cwd = options.workingDirectory ?? cliFlags.workingDirectory ?? process.cwd();
  const home = options.homeDirectory ?? homedir();
  const warnings: string[] = [];

  const repoConfig = loadConfigFile(repoConfigPath(cwd), warnings);
  const userConfig = loadConfigFile(userConfigPath(home), warnings);

  // Track sources for debugging
  const sources: Record<string, ConfigSource> = {};

  function resolveValue<K extends keyof FileConfig>(
    key: K,
    cli: FileConfig[K] | undefined,
    defaultVal: NonNullable<FileConfig[K]>
  ): NonNullable<FileConfig[K]> {
    const candidates: Array<[ConfigSource, FileConfig[K] | undefined]> = [
      ['cli', cli],
      ['repo', repoConfig?.[key]],
      ['user', userConfig?.[key]],
    ];
    for (const [source, value] of candidates) {
      if (value !== undefined && value !== null) {
        sources[key] = source;
        return value;
      }
    }
    sources[key] = 'default';
    return defaultVal;
  }

  function resolveOptional<K extends 'model' | 'executablePath'>(key: K, cli: string | undefined): string | undefined {
    const value = cli ?? repoConfig?.[key] ?? userConfig?.[key];
    if (value !== undefined) {
      sources[key] = cli !== undefined ? 'cli' : repoConfig?.[key] !== undefined ? 'repo' : 'user';
    }
    return value;
  }

  const defaults = DEFAULT_CONFIG;

  // A relative data directory is taken relative to the working directory
  const dataDirectory = resolve(
    cwd,
    resolveValue('dataDirectory', cliFlags.dataDirectory, join(home, '.config', 'handoff'))
  );

  const config: EffectiveConfig = {
    schemaVersion: '1.0.0',
    resolvedAt: (options.now ?? new Date()).toISOString(),

    timeouts: {
      resultWaitMs: seconds(
        resolveValue('resultTimeoutSeconds', cliFlags.resultTimeoutSeconds, defaults.timeouts.resultWaitMs / 1000)
      ),
      backendCallMs: seconds(
        resolveValue('backendTimeoutSeconds', cliFlags.backendTimeoutSeconds, defaults.timeouts.backendCallMs / 1000)
      ),
      watcherStopMs: defaults.timeouts.watcherStopMs,
    },

    history: {
      summarizationInterval: resolveValue(
        'summarizationInterval',
        cliFlags.summarizationInterval,
        defaults.history.summarizationInterval
      ),
      maxHistoryTurns: resolveValue('maxHistoryTurns', cliFlags.maxHistoryTurns, defaults.history.maxHistoryTurns),
      maxContextTokens: resolveValue('maxContextTokens', undefined, defaults.history.maxContextTokens),
      summaryMaxTokens: resolveValue('summaryMaxTokens', undefined, defaults.history.summaryMaxTokens),
    },

    watcher: {
      debounceMs: seconds(resolveValue('debounceSeconds', undefined, defaults.watcher.debounceMs / 1000)),
      usePolling: resolveValue('usePolling', undefined, defaults.watcher.usePolling),
    },

    handshake: {
      ...defaults.handshake,
      instructionsDir: resolveValue('instructionsDir', undefined, defaults.handshake.instructionsDir),
      logsDir: resolveValue('logsDir', undefined, defaults.handshake.logsDir),
      instructionFileName: resolveValue('instructionFileName', undefined, defaults.handshake.instructionFileName),
      resultFileName: resolveValue('resultFileName', undefined, defaults.handshake.resultFileName),
    },

    backend: {
      tool: resolveValue('backend', cliFlags.backend, defaults.backend.tool),
      model: resolveOptional('model', cliFlags.model),
      executablePath: resolveOptional('executablePath', undefined),
    },

    verbosity: {
      verbose: cliFlags.verbose ?? defaults.verbosity.verbose,
      debug: cliFlags.debug ?? defaults.verbosity.debug,
      jsonOutput: cliFlags.jsonOutput ?? defaults.verbosity.jsonOutput,
    },

    interactivity: {
      interactive: !(cliFlags.noInteractive ?? false),
    },

    paths: {
      workingDirectory: cwd,
      dataDirectory,
    },

    sources,
  };

  return { config, warnings };
}

/**
 * Validate a backend name
 */
export function isBackendToolName(value: string): value is BackendToolName {
  return value === 'claude' || value === 'codex' || value === 'mock';
}
