import { CliManagerBackend } from './cli-manager-backend';

/**
 * Manager backed by the Claude CLI in print mode
 */
export class ClaudeManagerBackend extends CliManagerBackend {
  readonly name = 'claude';

  protected getDefaultExecutablePath(): string {
    return 'claude';
  }

  protected buildArgs(prompt: string): string[] {
    const args = ['-p', prompt, '--output-format', 'text'];
    if (this.model) {
      args.push('--model', this.model);
    }
    return args;
  }
}
