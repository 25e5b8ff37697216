/**
 * Inquirer-based Prompter
 */

import inquirer from 'inquirer';
import { createPrompterError } from '../types/prompter';
import type { InputOptions, Prompter, PrompterError } from '../types/prompter';
import { err, ok } from '../types/result';
import type { Result } from '../types/result';

export interface InquirerPrompterConfig {
  interactive: boolean;
  /** Whether stdin is a terminal; defaults to process.stdin */
  isTTY: boolean;
}

// inquirer 8 rejects with this message when the prompt is closed with Ctrl+C
function isForceClose(error: unknown): boolean {
  return error instanceof Error && error.message.includes('User force closed');
}

export class InquirerPrompter implements Prompter {
  private readonly config: InquirerPrompterConfig;

  constructor(config: Partial<InquirerPrompterConfig> = {}) {
    this.config = {
      interactive: config.interactive ?? true,
      isTTY: config.isTTY ?? process.stdin.isTTY ?? false,
    };
  }

  isInteractive(): boolean {
    return this.config.interactive && this.config.isTTY;
  }

  async input(options: InputOptions): Promise<Result<string, PrompterError>> {
    if (!this.isInteractive()) {
      if (options.default === undefined) {
        return err(createPrompterError('NON_INTERACTIVE', `Cannot ask "${options.message}" without a terminal`));
      }
      return ok(options.default);
    }

    let answer: string;
    try {
      const response = await inquirer.prompt<{ answer: string }>([
        { type: 'input', name: 'answer', message: options.message, default: options.default, validate: options.validate },
      ]);
      answer = response.answer;
    } catch (error) {
      if (isForceClose(error)) {
        return err(createPrompterError('CANCELLED'));
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      return err(createPrompterError('IO_ERROR', `Prompt failed: ${cause.message}`, cause));
    }
    return ok(answer.trim());
  }
}

export function createInquirerPrompter(config?: Partial<InquirerPrompterConfig>): Prompter {
  return new InquirerPrompter(config);
}
