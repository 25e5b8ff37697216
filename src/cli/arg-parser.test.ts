/**
 * Tests for CLI Argument Parser
 */

import { describe, it, expect } from 'vitest';
import { parseArgs, toCliFlags } from './arg-parser';
import type { ParsedArgs } from './types';

function parseOk(...argv: string[]): ParsedArgs {
  const result = parseArgs(['node', 'handoff', ...argv]);
  if (!result.success) {
    throw new Error(`Expected success, got: ${result.error}`);
  }
  return result.args;
}

function parseError(...argv: string[]): string {
  const result = parseArgs(['node', 'handoff', ...argv]);
  if (result.success) {
    throw new Error('Expected a parse error');
  }
  return result.error;
}

describe('parseArgs', () => {
  describe('basic functionality', () => {
    it('should start with no task text', () => {
      const args = parseOk();
      expect(args.input).toBe('');
      expect(args.project).toBeNull();
      expect(args.backend).toBeNull();
    });

    it('should join positional words into the task text', () => {
      expect(parseOk('Add', 'a', 'CSV', 'export').input).toBe('Add a CSV export');
    });

    it('should set help and version flags', () => {
      expect(parseOk('--help').help).toBe(true);
      expect(parseOk('-h').help).toBe(true);
      expect(parseOk('--version').version).toBe(true);
      expect(parseOk('-v').version).toBe(true);
    });

    it('should set the boolean flags', () => {
      const args = parseOk('--verbose', '--debug', '--json', '--no-interactive');
      expect(args.verbose).toBe(true);
      expect(args.debug).toBe(true);
      expect(args.jsonOutput).toBe(true);
      expect(args.noInteractive).toBe(true);
    });
  });

  describe('value options', () => {
    it('should accept both --opt value and --opt=value', () => {
      expect(parseOk('--project', 'demo').project).toBe('demo');
      expect(parseOk('--project=demo').project).toBe('demo');
    });

    it('should keep = signs inside the value', () => {
      expect(parseOk('--model=name=with=equals').model).toBe('name=with=equals');
    });

    it('should parse the backend', () => {
      expect(parseOk('--backend', 'codex').backend).toBe('codex');
      expect(parseOk('--mock').backend).toBe('mock');
    });

    it('should reject an unknown backend', () => {
      expect(parseError('--backend', 'ollama')).toBe('Error: --backend must be one of: claude, codex, mock');
    });

    it('should parse timeouts in seconds', () => {
      const args = parseOk('--result-timeout', '90', '--backend-timeout=2.5');
      expect(args.resultTimeoutSeconds).toBe(90);
      expect(args.backendTimeoutSeconds).toBe(2.5);
    });

    it('should reject a non-positive timeout', () => {
      expect(parseError('--result-timeout', '0')).toBe('Error: --result-timeout must be a positive number');
      expect(parseError('--backend-timeout', 'soon')).toBe('Error: --backend-timeout must be a positive number');
    });

    it('should allow a summary interval of zero', () => {
      expect(parseOk('--summary-interval', '0').summarizationInterval).toBe(0);
    });

    it('should reject fractional turn counts', () => {
      expect(parseError('--max-history-turns', '2.5')).toBe(
        'Error: --max-history-turns must be an integer of at least 1'
      );
    });

    it('should require a value', () => {
      expect(parseError('--project')).toBe('Error: --project requires a value');
      expect(parseError('--project', '--verbose')).toBe('Error: --project requires a value');
      expect(parseError('--project=')).toBe('Error: --project= requires a value');
    });

    it('should not treat an option value as task text', () => {
      const args = parseOk('--project', 'demo', 'Add', 'export');
      expect(args.project).toBe('demo');
      expect(args.input).toBe('Add export');
    });
  });

  it('should reject unknown options', () => {
    expect(parseError('--fast')).toBe('Error: Unknown option: --fast');
  });
});

describe('toCliFlags', () => {
  it('should leave unset options undefined', () => {
    const flags = toCliFlags(parseOk('--data-dir', '/tmp/handoff', '--no-interactive'));
    expect(flags).toEqual({
      backend: undefined,
      model: undefined,
      dataDirectory: '/tmp/handoff',
      resultTimeoutSeconds: undefined,
      backendTimeoutSeconds: undefined,
      summarizationInterval: undefined,
      maxHistoryTurns: undefined,
      verbose: false,
      debug: false,
      jsonOutput: false,
      noInteractive: true,
    });
  });
});
