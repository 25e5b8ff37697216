/**
 * Prompter interface
 * Questions asked outside the shell's own line reader (`project add`)
 */

import type { Result } from './result';

export interface InputOptions {
  message: string;
  /** Used for an empty answer, and in non-interactive mode */
  default?: string;
  /** Return true if valid, or an error message */
  validate?: (input: string) => boolean | string | Promise<boolean | string>;
}

export type PrompterErrorCode = 'CANCELLED' | 'NON_INTERACTIVE' | 'IO_ERROR';

export interface PrompterError {
  code: PrompterErrorCode;
  message: string;
  cause?: Error;
}

export interface Prompter {
  /** Ask for one line of text; the answer comes back trimmed */
  input(options: InputOptions): Promise<Result<string, PrompterError>>;
  isInteractive(): boolean;
}

export function createPrompterError(code: PrompterErrorCode, message?: string, cause?: Error): PrompterError {
  const defaultMessages: Record<PrompterErrorCode, string> = {
    CANCELLED: 'Prompt cancelled',
    NON_INTERACTIVE: 'Cannot prompt in non-interactive mode',
    IO_ERROR: 'Prompt failed',
  };
  return { code, message: message ?? defaultMessages[code], cause };
}
