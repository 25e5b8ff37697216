/**
 * Manager backend that shells out to an installed LLM CLI
 */

import type { Logger } from '../types/logger';
import { redactSecrets } from '../types/logger';
import type { BackendResponse, ManagerBackend, NextStepRequest } from '../types/manager-backend';
import type { ProcessRunner, SpawnResult } from '../types/process-runner';
import { BackendAuthError, BackendCallError } from '../types/errors';
import { buildNextStepPrompt, buildSummaryPrompt, checkPromptBudget } from './prompt-builder';
import type { PromptFiles } from './prompt-builder';
import { parseManagerReply } from './response-parser';

export interface CliManagerBackendOptions {
  processRunner: ProcessRunner;
  logger: Logger;
  /** Directory the CLI runs in */
  workingDirectory: string;
  promptFiles: PromptFiles;
  /** Path to the CLI executable (defaults to the tool name) */
  executablePath?: string;
  model?: string;
}

const AUTH_FAILURE_PATTERN = /unauthori[sz]ed|invalid api key|authentication|\b401\b|\b403\b|permission denied|not logged in/i;

/**
 * Base class: subclasses supply the executable and its argument layout
 */
export abstract class CliManagerBackend implements ManagerBackend {
  abstract readonly name: string;
  protected readonly processRunner: ProcessRunner;
  protected readonly logger: Logger;
  protected readonly executablePath: string;
  protected readonly workingDirectory: string;
  protected readonly model: string | undefined;
  private readonly promptFiles: PromptFiles;

  constructor(options: CliManagerBackendOptions) {
    this.processRunner = options.processRunner;
    this.logger = options.logger;
    this.executablePath = options.executablePath ?? this.getDefaultExecutablePath();
    this.workingDirectory = options.workingDirectory;
    this.model = options.model;
    this.promptFiles = options.promptFiles;
  }

  protected abstract getDefaultExecutablePath(): string;

  protected abstract buildArgs(prompt: string): string[];

  async getNextStep(request: NextStepRequest): Promise<BackendResponse> {
    const prompt = buildNextStepPrompt(request, this.promptFiles);
    checkPromptBudget(prompt, request.maxContextTokens, this.logger);
    return parseManagerReply(await this.run(prompt));
  }

  async summarize(text: string, maxTokens: number): Promise<string> {
    const summary = (await this.run(buildSummaryPrompt(text, maxTokens))).trim();
    if (summary === '') {
      throw new BackendCallError(`${this.name} returned an empty summary`);
    }
    return summary;
  }

  /**
   * Run the CLI once and return its stdout
   */
  protected async run(prompt: string): Promise<string> {
    let result: SpawnResult;
    try {
      result = await this.processRunner.spawn(this.executablePath, {
        args: this.buildArgs(prompt),
        cwd: this.workingDirectory,
        tailLines: 20,
      });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new BackendCallError(`Failed to start ${this.executablePath}: ${detail}`, { cause: error });
    }

    this.logger.debug(`${this.name} finished in ${result.durationMs}ms with exit code ${result.exitCode}`);

    if (result.interrupted) {
      throw new BackendCallError(`${this.name} was terminated by ${result.signal ?? 'a signal'}`);
    }
    if (result.exitCode !== 0) {
      const stderr = result.stderrTail.join('\n').trim();
      const detail = redactSecrets(stderr === '' ? 'no error output' : stderr);
      if (AUTH_FAILURE_PATTERN.test(stderr)) {
        throw new BackendAuthError(`${this.name} rejected its credentials: ${detail}`);
      }
      throw new BackendCallError(`${this.name} exited with code ${result.exitCode}: ${detail}`);
    }
    return result.stdout;
  }
}
