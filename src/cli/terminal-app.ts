/**
 * Terminal front-end
 *
 * Runs the `handoff>` shell, or a single task when started with
 * --no-interactive. Engine events arrive through `observer` and are printed
 * between spinner frames.
 */

import * as readline from 'readline';
import type { OrchestrationEngine } from '../core/orchestration-engine';
import { getStateDescription } from '../core/state-machine';
import type { EngineObserver, EngineObserverEvent } from '../types/engine-observer';
import type { EngineState } from '../types/engine-state';
import { ExitCode } from '../types/exit-codes';
import type { ProjectStore } from '../types/project-store';
import type { Prompter } from '../types/prompter';
import { renderEvent } from '../ui/event-renderer';
import type { RenderOptions } from '../ui/event-renderer';
import type { SpinnerService } from '../ui/spinner-service';
import { executeCommand } from './repl-commands';
import type { CommandContext } from './repl-commands';

export const PROMPT = 'handoff> ';

const CALLING_STATES: ReadonlySet<EngineState> = new Set<EngineState>([
  'RUNNING_WAITING_INITIAL_BACKEND',
  'RUNNING_CALLING_BACKEND',
]);

/** States in which nothing happens until the user acts */
const SETTLED_STATES: ReadonlySet<EngineState> = new Set<EngineState>([
  'IDLE',
  'PROJECT_SELECTED',
  'PAUSED_WAITING_USER_INPUT',
  'TASK_COMPLETE',
  'ERROR',
]);

export interface TerminalAppOptions {
  engine: OrchestrationEngine;
  store: ProjectStore;
  prompter: Prompter;
  spinner: SpinnerService;
  render: RenderOptions;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  workingDirectory: string;
}

export interface StartupOptions {
  /** Project to select before the first prompt */
  project: string | null;
  /** Task text started right away; empty for none */
  task: string;
}

export class TerminalApp {
  private readonly pending = new Set<Promise<void>>();
  private spinnerText = '';
  private settledWaiter: ((state: EngineState) => void) | null = null;

  readonly observer: EngineObserver = (event) => this.handleEvent(event);

  constructor(private readonly options: TerminalAppOptions) {}

  /**
   * Interactive shell. Resolves when the user quits or input ends.
   */
  async runInteractive(startup: StartupOptions): Promise<ExitCode> {
    if (startup.project !== null) {
      if (!(await this.selectProject(startup.project))) {
        return ExitCode.CONFIG_ERROR;
      }
    } else {
      await this.printStartupHint();
    }
    if (startup.task !== '') {
      await executeCommand(`start ${startup.task}`, this.context());
    }

    const rl = readline.createInterface({ input: this.options.input, output: this.options.output, prompt: PROMPT });
    // Ctrl+C leaves the shell like quit
    rl.on('SIGINT', () => rl.close());
    try {
      rl.prompt();
      for await (const line of rl) {
        const outcome = await executeCommand(line, this.context());
        if (outcome === 'quit') {
          break;
        }
        rl.prompt();
      }
    } finally {
      rl.close();
    }

    await this.drain();
    return this.options.engine.getState() === 'ERROR' ? ExitCode.ENGINE_ERROR : ExitCode.SUCCESS;
  }

  /**
   * Select a project, run one task until it needs the user or ends
   */
  async runOnce(project: string, task: string): Promise<ExitCode> {
    if (!(await this.selectProject(project))) {
      return ExitCode.CONFIG_ERROR;
    }

    await this.options.engine.startTask(task === '' ? undefined : task);
    const state = await this.waitUntilSettled();

    switch (state) {
      case 'TASK_COMPLETE':
        return ExitCode.SUCCESS;
      case 'PAUSED_WAITING_USER_INPUT':
        return ExitCode.INPUT_REQUIRED;
      case 'ERROR':
        return ExitCode.ENGINE_ERROR;
      default:
        return ExitCode.SUCCESS;
    }
  }

  handleEvent(event: EngineObserverEvent): void {
    const lines = renderEvent(event, this.options.render);
    if (event.type !== 'state_change') {
      this.write(lines);
      return;
    }

    if (CALLING_STATES.has(event.state)) {
      this.write(lines);
      this.spinnerText = `${getStateDescription(event.state)}...`;
      this.options.spinner.show(this.spinnerText);
      return;
    }

    this.options.spinner.settle();
    this.write(lines);
    if (SETTLED_STATES.has(event.state) && this.settledWaiter) {
      const resolve = this.settledWaiter;
      this.settledWaiter = null;
      resolve(event.state);
    }
  }

  /**
   * Wait for detached commands (start, input) to finish
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private context(): CommandContext {
    return {
      engine: this.options.engine,
      store: this.options.store,
      prompter: this.options.prompter,
      print: (line) => this.write([line]),
      workingDirectory: this.options.workingDirectory,
      detach: (work) => this.detach(work),
    };
  }

  private detach(work: Promise<void>): void {
    const tracked: Promise<void> = work
      .catch((error: unknown) => {
        this.write([`Error: ${error instanceof Error ? error.message : String(error)}`]);
      })
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }

  private async selectProject(name: string): Promise<boolean> {
    const project = await this.options.store.getProjectByName(name);
    if (!project) {
      this.write([`Unknown project: ${name}`]);
      return false;
    }
    const result = await this.options.engine.setActiveProject(project);
    if (!result.ok) {
      this.write([`Error: ${result.error.message}`]);
      return false;
    }
    return true;
  }

  private async printStartupHint(): Promise<void> {
    const projects = await this.options.store.loadProjects();
    this.write([
      projects.length === 0
        ? 'No projects yet. Add one with: project add'
        : 'Select a project with: project select <name>',
      'Type help for the list of commands.',
    ]);
  }

  private waitUntilSettled(): Promise<EngineState> {
    const state = this.options.engine.getState();
    if (SETTLED_STATES.has(state)) {
      return Promise.resolve(state);
    }
    return new Promise((resolve) => {
      this.settledWaiter = resolve;
    });
  }

  // Lines printed while the spinner runs would be overwritten by its next frame
  private write(lines: string[]): void {
    if (lines.length === 0) {
      return;
    }
    const resume = this.options.spinner.isSpinning;
    this.options.spinner.settle();
    for (const line of lines) {
      this.options.output.write(`${line}\n`);
    }
    if (resume) {
      this.options.spinner.show(this.spinnerText);
    }
  }
}

export function createTerminalApp(options: TerminalAppOptions): TerminalApp {
  const app = new TerminalApp(options);
  options.engine.setObserver(app.observer);
  return app;
}
