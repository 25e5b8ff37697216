/**
 * Engine Factory
 * Builds an OrchestrationEngine and its collaborators from an EffectiveConfig
 */

import { join } from 'path';
import { OrchestrationEngine } from '../core/orchestration-engine';
import type { OrchestrationEngineDependencies } from '../core/orchestration-engine';
import { ClaudeManagerBackend } from '../engines/claude-manager-backend';
import { CodexManagerBackend } from '../engines/codex-manager-backend';
import { createRealProcessRunner } from '../engines/real-process-runner';
import { ScriptedManagerBackend } from '../engines/scripted-manager-backend';
import { createChokidarWatcherFactory } from '../io/chokidar-result-watcher';
import { createJsonProjectStore } from '../io/project-store';
import type { JsonProjectStore } from '../io/project-store';
import { createRealFileSystem } from '../io/real-file-system';
import { createConsoleLogger } from '../logging/console-logger';
import { SystemClock } from '../types/clock';
import type { EffectiveConfig } from '../types/effective-config';
import type { EngineObserver } from '../types/engine-observer';
import type { Logger, LogLevel } from '../types/logger';
import type { BackendResponse, ManagerBackend } from '../types/manager-backend';
import type { ProcessRunner } from '../types/process-runner';

/**
 * Replies played by `--backend mock`: one instruction, then completion
 */
export const DEMO_SCRIPT: readonly BackendResponse[] = [
  {
    status: 'INSTRUCTION',
    content:
      'Create a file named HELLO.md containing a one-line greeting. ' +
      'Then write a short report of what you changed to the result file.',
  },
  { status: 'COMPLETE', content: 'Demo task finished.' },
];

export interface BackendDependencies {
  processRunner: ProcessRunner;
  logger: Logger;
}

/**
 * Pick the Manager backend named by the config
 */
export function createManagerBackend(config: EffectiveConfig, deps: BackendDependencies): ManagerBackend {
  const { handshake, backend } = config;
  const options = {
    processRunner: deps.processRunner,
    logger: deps.logger,
    workingDirectory: config.paths.workingDirectory,
    promptFiles: {
      instructionFileName: join(handshake.instructionsDir, handshake.instructionFileName),
      resultFileName: join(handshake.logsDir, handshake.resultFileName),
    },
    executablePath: backend.executablePath,
    model: backend.model,
  };

  switch (backend.tool) {
    case 'claude':
      return new ClaudeManagerBackend(options);
    case 'codex':
      return new CodexManagerBackend(options);
    case 'mock':
      return new ScriptedManagerBackend({ replies: [...DEMO_SCRIPT] });
  }
}

export function logLevelFor(config: EffectiveConfig): LogLevel {
  if (config.verbosity.debug) return 'debug';
  if (config.verbosity.verbose) return 'info';
  return 'warn';
}

export interface RealEngineBundle {
  engine: OrchestrationEngine;
  store: JsonProjectStore;
  deps: OrchestrationEngineDependencies;
  processRunner: ProcessRunner;
}

/**
 * Create the engine with real implementations
 */
export function createRealEngine(config: EffectiveConfig, observer?: EngineObserver): RealEngineBundle {
  const logger = createConsoleLogger({
    minLevel: logLevelFor(config),
    jsonOutput: config.verbosity.jsonOutput,
  });
  const fileSystem = createRealFileSystem();
  const clock = new SystemClock();
  const processRunner = createRealProcessRunner();

  const store = createJsonProjectStore({
    fileSystem,
    dataDirectory: config.paths.dataDirectory,
    stateDirName: config.handshake.stateDirName,
    logger,
  });

  const deps: OrchestrationEngineDependencies = {
    logger,
    fileSystem,
    clock,
    store,
    backend: createManagerBackend(config, { processRunner, logger }),
    watcherFactory: createChokidarWatcherFactory(config, logger, clock),
  };

  return { engine: new OrchestrationEngine(config, deps, observer), store, deps, processRunner };
}
