/**
 * Shell commands
 *
 * Each line typed at the `handoff>` prompt is parsed here and turned into an
 * engine call. Output goes through `print`, never straight to stdout.
 */

import type { OrchestrationEngine } from '../core/orchestration-engine';
import { getStateDescription } from '../core/state-machine';
import { OrchestratorError } from '../types/errors';
import type { Project } from '../types/project';
import type { ProjectStore } from '../types/project-store';
import type { Prompter } from '../types/prompter';
import { renderTurn } from '../ui/event-renderer';
import { getCommandHelpText } from './help';

export const DEFAULT_HISTORY_COUNT = 10;

export interface CommandContext {
  engine: OrchestrationEngine;
  store: ProjectStore;
  prompter: Prompter;
  print: (line: string) => void;
  /** Default workspace offered by `project add` */
  workingDirectory: string;
  /**
   * Hand off work that should not block the prompt (Manager calls), so that
   * `pause` and `stop` stay usable while it runs
   */
  detach: (work: Promise<void>) => void;
}

export type CommandOutcome = 'continue' | 'quit';

export interface CommandLine {
  name: string;
  /** Whitespace-separated words after the command name */
  args: string[];
  /** Everything after the command name, trimmed */
  rest: string;
}

export function parseCommandLine(line: string): CommandLine {
  const trimmed = line.trim();
  const match = /^(\S+)\s*(.*)$/s.exec(trimmed);
  if (!match) {
    return { name: '', args: [], rest: '' };
  }
  const rest = (match[2] ?? '').trim();
  return {
    name: (match[1] ?? '').toLowerCase(),
    args: rest === '' ? [] : rest.split(/\s+/),
    rest,
  };
}

export async function executeCommand(line: string, ctx: CommandContext): Promise<CommandOutcome> {
  const command = parseCommandLine(line);

  switch (command.name) {
    case '':
      return 'continue';
    case 'help':
    case '?':
      for (const helpLine of getCommandHelpText().split('\n')) {
        ctx.print(helpLine);
      }
      return 'continue';
    case 'project':
      await runProjectCommand(command, ctx);
      return 'continue';
    case 'start':
      ctx.detach(ctx.engine.startTask(command.rest === '' ? undefined : command.rest));
      return 'continue';
    case 'input':
    case 'answer':
      runInput(command, ctx);
      return 'continue';
    case 'status':
      printStatus(ctx);
      return 'continue';
    case 'history':
      printHistory(command, ctx);
      return 'continue';
    case 'pause':
      await ctx.engine.pauseTask();
      return 'continue';
    case 'stop':
      await ctx.engine.stopTask();
      return 'continue';
    case 'quit':
    case 'exit':
      return 'quit';
    default:
      ctx.print(`Unknown command: ${command.name}. Type help for the list.`);
      return 'continue';
  }
}

function runInput(command: CommandLine, ctx: CommandContext): void {
  if (command.rest === '') {
    ctx.print('Usage: input <text>');
    return;
  }
  ctx.detach(
    ctx.engine.resumeWithUserInput(command.rest).then((result) => {
      if (!result.ok) {
        ctx.print(`Error: ${result.error.message}`);
      }
    })
  );
}

async function runProjectCommand(command: CommandLine, ctx: CommandContext): Promise<void> {
  const sub: string | undefined = command.args[0];
  const rest = command.args.slice(1);
  switch (sub) {
    case 'list':
    case undefined:
      await listProjects(ctx);
      return;
    case 'add':
      await addProject(ctx);
      return;
    case 'select':
      await selectProject(rest.join(' '), ctx);
      return;
    default:
      ctx.print(`Unknown project command: ${sub}. Use project list, project add or project select <name>.`);
  }
}

async function listProjects(ctx: CommandContext): Promise<void> {
  const projects = await ctx.store.loadProjects();
  if (projects.length === 0) {
    ctx.print('No projects yet. Add one with: project add');
    return;
  }
  const active = ctx.engine.getProject()?.name;
  for (const project of projects) {
    const marker = project.name === active ? '*' : ' ';
    ctx.print(`${marker} ${project.name}  ${project.workspaceRootPath}  ${project.overallGoal}`);
  }
}

async function addProject(ctx: CommandContext): Promise<void> {
  const notBlank = (value: string): boolean | string => value.trim() !== '' || 'A value is required';

  const name = await ctx.prompter.input({ message: 'Project name:', validate: notBlank });
  if (!name.ok) {
    ctx.print(`Cancelled: ${name.error.message}`);
    return;
  }
  const workspace = await ctx.prompter.input({ message: 'Workspace directory:', default: ctx.workingDirectory });
  if (!workspace.ok) {
    ctx.print(`Cancelled: ${workspace.error.message}`);
    return;
  }
  const goal = await ctx.prompter.input({ message: 'Overall goal:', validate: notBlank });
  if (!goal.ok) {
    ctx.print(`Cancelled: ${goal.error.message}`);
    return;
  }

  let project: Project;
  try {
    project = await ctx.store.addProject({
      name: name.value,
      workspaceRootPath: workspace.value,
      overallGoal: goal.value,
    });
  } catch (error) {
    if (error instanceof OrchestratorError) {
      ctx.print(`Error: ${error.message}`);
      return;
    }
    throw error;
  }

  ctx.print(`Added project "${project.name}".`);
  await activate(project, ctx);
}

async function selectProject(name: string, ctx: CommandContext): Promise<void> {
  if (name === '') {
    ctx.print('Usage: project select <name>');
    return;
  }
  const project = await ctx.store.getProjectByName(name);
  if (!project) {
    ctx.print(`Unknown project: ${name}`);
    return;
  }
  await activate(project, ctx);
}

async function activate(project: Project, ctx: CommandContext): Promise<void> {
  const result = await ctx.engine.setActiveProject(project);
  if (!result.ok) {
    ctx.print(`Error: ${result.error.message}`);
  }
}

function printStatus(ctx: CommandContext): void {
  const state = ctx.engine.getState();
  const project = ctx.engine.getProject();
  const projectState = ctx.engine.getProjectState();

  ctx.print(`State: ${getStateDescription(state)} (${state})`);
  ctx.print(project ? `Project: ${project.name} (${project.workspaceRootPath})` : 'Project: none selected');
  if (project) {
    ctx.print(`Goal: ${project.overallGoal}`);
  }
  if (projectState) {
    ctx.print(`Turns: ${projectState.conversationHistory.length}`);
    if (projectState.pendingUserQuestion !== null) {
      ctx.print(`Waiting for your answer to: ${projectState.pendingUserQuestion}`);
    }
  }
  const lastError = ctx.engine.getLastError();
  if (lastError !== undefined) {
    ctx.print(`Last error: ${lastError}`);
  }
}

function printHistory(command: CommandLine, ctx: CommandContext): void {
  const raw = command.args[0];
  const count = raw === undefined ? DEFAULT_HISTORY_COUNT : Number(raw);
  if (!Number.isInteger(count) || count < 1) {
    ctx.print('Usage: history [n]');
    return;
  }

  const history = ctx.engine.getProjectState()?.conversationHistory;
  if (!history) {
    ctx.print('No project selected.');
    return;
  }
  if (history.length === 0) {
    ctx.print('No conversation yet.');
    return;
  }
  for (const turn of history.slice(-count)) {
    ctx.print(renderTurn(turn));
  }
}
