#!/usr/bin/env node

import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { parseArgs, toCliFlags } from './cli/arg-parser';
import { printUsage } from './cli/help';
import { createTerminalApp } from './cli/terminal-app';
import { resolveConfig } from './config/resolve-config';
import { createRealEngine } from './orchestration/engine-factory';
import { ExitCode, getExitCodeDescription } from './types/exit-codes';
import { createInquirerPrompter } from './ui/inquirer-prompter';
import { createSpinnerService } from './ui/spinner-service';

// Engine
export { OrchestrationEngine, createOrchestrationEngine } from './core/orchestration-engine';
export type { OrchestrationEngineDependencies } from './core/orchestration-engine';
export { getStateDescription, isValidTransition } from './core/state-machine';
export { createRealEngine, createManagerBackend } from './orchestration/engine-factory';

// Manager backends
export { ClaudeManagerBackend } from './engines/claude-manager-backend';
export { CodexManagerBackend } from './engines/codex-manager-backend';
export { ScriptedManagerBackend } from './engines/scripted-manager-backend';
export { parseManagerReply } from './engines/response-parser';

// Storage and handshake
export { JsonProjectStore, createJsonProjectStore } from './io/project-store';
export { MemoryFileSystem } from './io/memory-file-system';

// Configuration
export { resolveConfig } from './config/resolve-config';
export { DEFAULT_CONFIG } from './types/effective-config';
export type { EffectiveConfig } from './types/effective-config';

// Types
export type { EngineState } from './types/engine-state';
export type { EngineObserver, EngineObserverEvent } from './types/engine-observer';
export type { Project, ProjectState, Turn } from './types/project';
export type { ManagerBackend, BackendResponse } from './types/manager-backend';
export { ExitCode } from './types/exit-codes';

const packageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
  const parsed = packageJsonSchema.safeParse(raw);
  return parsed.success ? parsed.data.version : 'unknown';
}

/**
 * CLI entry point. Resolves to the process exit code.
 */
export async function main(argv: string[]): Promise<ExitCode> {
  const parsed = parseArgs(argv);
  if (!parsed.success) {
    console.error(parsed.error);
    console.error('');
    printUsage();
    return ExitCode.USAGE_ERROR;
  }
  const args = parsed.args;

  if (args.help) {
    printUsage();
    return ExitCode.SUCCESS;
  }
  if (args.version) {
    console.log(readVersion());
    return ExitCode.SUCCESS;
  }
  if (args.noInteractive && args.project === null) {
    console.error('Error: --no-interactive needs --project <name>');
    return ExitCode.USAGE_ERROR;
  }

  const { config, warnings } = resolveConfig(toCliFlags(args));
  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  const bundle = createRealEngine(config);
  const app = createTerminalApp({
    engine: bundle.engine,
    store: bundle.store,
    prompter: createInquirerPrompter({ interactive: config.interactivity.interactive }),
    spinner: createSpinnerService({ quiet: config.verbosity.jsonOutput }),
    render: { json: config.verbosity.jsonOutput, verbose: config.verbosity.verbose },
    input: process.stdin,
    output: process.stdout,
    workingDirectory: config.paths.workingDirectory,
  });

  try {
    return args.noInteractive && args.project !== null
      ? await app.runOnce(args.project, args.input)
      : await app.runInteractive({ project: args.project, task: args.input });
  } finally {
    await bundle.engine.shutdown();
    bundle.processRunner.killAll?.('SIGTERM');
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      if (code !== ExitCode.SUCCESS && code !== ExitCode.USAGE_ERROR) {
        console.error(getExitCodeDescription(code));
      }
      process.exit(code);
    },
    (error: unknown) => {
      console.error('Error:', error instanceof Error ? error.message : String(error));
      process.exit(ExitCode.UNEXPECTED_ERROR);
    }
  );
}
