/**
 * CLI Argument Parser
 *
 * Parses command line arguments into structured ParsedArgs
 */

import { isBackendToolName } from '../config/resolve-config';
import type { CliFlags } from '../config/resolve-config';
import type { BackendToolName } from '../types/effective-config';
import { DEFAULT_ARGS } from './types';
import type { ParsedArgs, ParseResult } from './types';

type Parsed<T> = { value: T } | { error: string };

function parsePositiveNumber(value: string, name: string): Parsed<number> {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed <= 0) {
    return { error: `${name} must be a positive number` };
  }
  return { value: parsed };
}

function parseInteger(value: string, name: string, min: number): Parsed<number> {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    return { error: `${name} must be an integer of at least ${min}` };
  }
  return { value: parsed };
}

function parseBackend(value: string, name: string): Parsed<BackendToolName> {
  if (!isBackendToolName(value)) {
    return { error: `${name} must be one of: claude, codex, mock` };
  }
  return { value };
}

function parseText(value: string): Parsed<string> {
  return { value };
}

/**
 * Get the value for an argument, handling both --arg value and --arg=value formats
 */
function getArgValue(args: string[], index: number, argName: string): Parsed<string> & { skip: number } {
  const arg = args[index] ?? '';

  const eq = arg.indexOf('=');
  if (eq !== -1) {
    const value = arg.slice(eq + 1);
    return value === '' ? { error: `${argName}= requires a value`, skip: 0 } : { value, skip: 0 };
  }

  const nextArg = args[index + 1];
  if (nextArg === undefined || nextArg.startsWith('--')) {
    return { error: `${argName} requires a value`, skip: 0 };
  }
  return { value: nextArg, skip: 1 };
}

type ValueOption = {
  [K in keyof ParsedArgs]: ParsedArgs[K] extends boolean | string ? never : K;
}[keyof ParsedArgs];

/**
 * Options that take a value: target field and parser
 */
const VALUE_OPTIONS: Record<string, (args: ParsedArgs, raw: string, name: string) => string | undefined> = {
  '--project': (args, raw) => assign(args, 'project', parseText(raw)),
  '--backend': (args, raw, name) => assign(args, 'backend', parseBackend(raw, name)),
  '--model': (args, raw) => assign(args, 'model', parseText(raw)),
  '--data-dir': (args, raw) => assign(args, 'dataDirectory', parseText(raw)),
  '--result-timeout': (args, raw, name) => assign(args, 'resultTimeoutSeconds', parsePositiveNumber(raw, name)),
  '--backend-timeout': (args, raw, name) => assign(args, 'backendTimeoutSeconds', parsePositiveNumber(raw, name)),
  '--summary-interval': (args, raw, name) => assign(args, 'summarizationInterval', parseInteger(raw, name, 0)),
  '--max-history-turns': (args, raw, name) => assign(args, 'maxHistoryTurns', parseInteger(raw, name, 1)),
};

function assign<K extends ValueOption>(
  args: ParsedArgs,
  key: K,
  parsed: Parsed<NonNullable<ParsedArgs[K]>>
): string | undefined {
  if ('error' in parsed) {
    return parsed.error;
  }
  args[key] = parsed.value;
  return undefined;
}

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[]): ParseResult {
  const args = argv.slice(2); // Remove node and script path
  const result: ParsedArgs = { ...DEFAULT_ARGS };
  const words: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    const argBase = arg.split('=')[0] ?? arg;

    switch (argBase) {
      case '--help':
      case '-h':
        result.help = true;
        break;

      case '--version':
      case '-v':
        result.version = true;
        break;

      case '--mock':
        result.backend = 'mock';
        break;

      case '--no-interactive':
        result.noInteractive = true;
        break;

      case '--verbose':
        result.verbose = true;
        break;

      case '--debug':
        result.debug = true;
        break;

      case '--json':
        result.jsonOutput = true;
        break;

      default: {
        const option = VALUE_OPTIONS[argBase];
        if (option) {
          const raw = getArgValue(args, i, argBase);
          if ('error' in raw) {
            return { success: false, error: `Error: ${raw.error}` };
          }
          const error = option(result, raw.value, argBase);
          if (error) {
            return { success: false, error: `Error: ${error}` };
          }
          i += raw.skip;
          break;
        }
        if (arg.startsWith('--')) {
          return { success: false, error: `Error: Unknown option: ${argBase}` };
        }
        words.push(arg);
      }
    }
  }

  result.input = words.join(' ');
  return { success: true, args: result };
}

/**
 * Config-layer view of the parsed flags; unset flags stay undefined
 */
export function toCliFlags(args: ParsedArgs): CliFlags {
  return {
    backend: args.backend ?? undefined,
    model: args.model ?? undefined,
    dataDirectory: args.dataDirectory ?? undefined,
    resultTimeoutSeconds: args.resultTimeoutSeconds ?? undefined,
    backendTimeoutSeconds: args.backendTimeoutSeconds ?? undefined,
    summarizationInterval: args.summarizationInterval ?? undefined,
    maxHistoryTurns: args.maxHistoryTurns ?? undefined,
    verbose: args.verbose,
    debug: args.debug,
    jsonOutput: args.jsonOutput,
    noInteractive: args.noInteractive,
  };
}
