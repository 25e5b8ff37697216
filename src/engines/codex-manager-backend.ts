import { CliManagerBackend } from './cli-manager-backend';

/**
 * Manager backed by `codex exec`. The Manager only plans, so the sandbox is read-only.
 */
export class CodexManagerBackend extends CliManagerBackend {
  readonly name = 'codex';

  protected getDefaultExecutablePath(): string {
    return 'codex';
  }

  protected buildArgs(prompt: string): string[] {
    const args = ['exec', '--sandbox', 'read-only'];
    if (this.model) {
      args.push('--model', this.model);
    }
    args.push(prompt);
    return args;
  }
}
