/**
 * Orchestration engine
 *
 * Drives the Manager/Worker loop for one active project. Every trigger (a
 * public call, a watcher hit, a timer, a finished Manager call) is posted as an
 * EngineEvent and handled one at a time under a single mutex. Manager calls run
 * outside the lock through the dispatcher; their results come back as
 * BACKEND_SETTLED events tagged with the cycle that started them, and results
 * from an older cycle are dropped.
 */

import type { Clock } from '../types/clock';
import type { EffectiveConfig } from '../types/effective-config';
import type { EngineObserver, EngineObserverEvent } from '../types/engine-observer';
import type { EngineState } from '../types/engine-state';
import {
  BackendCallError,
  FileReadError,
  FileWriteError,
  InvalidStateError,
  OrchestratorError,
  ResultTimeout,
  UnhandledError,
  ValidationError,
  WatcherError,
  toOrchestratorError,
} from '../types/errors';
import type { FileSystem } from '../types/file-system';
import type { Logger, LogMetadata } from '../types/logger';
import type { BackendResponse, ManagerBackend } from '../types/manager-backend';
import { createInitialProjectState, projectKey } from '../types/project';
import type { Project, ProjectState, Turn, TurnSender } from '../types/project';
import type { ProjectStore } from '../types/project-store';
import { err, ok } from '../types/result';
import type { Result } from '../types/result';
import type { ResultWatcher, ResultWatcherFactory } from '../types/result-watcher';
import {
  archiveResult,
  archiveStaleResult,
  ensureHandshakeDirectories,
  isResultFileEvent,
  readResult,
  resolveHandshakePaths,
  writeInstruction,
} from '../io/handshake';
import type { HandshakePaths } from '../io/handshake';
import { AsyncMutex } from './async-mutex';
import { BackendCallDispatcher } from './backend-call-dispatcher';
import type { DispatchOutcome } from './backend-call-dispatcher';
import {
  applyTransition,
  canStartFrom,
  createInitialContext,
  getStateDescription,
  isRunningState,
  restoreStateOnLoad,
} from './state-machine';
import type { EngineContext } from './state-machine';
import { renderCompactionText, selectCompactionInput, shouldSummarize } from './summarization-policy';
import { ResultTimeoutSupervisor } from './timeout-supervisor';

export interface OrchestrationEngineDependencies {
  logger: Logger;
  fileSystem: FileSystem;
  clock: Clock;
  store: ProjectStore;
  backend: ManagerBackend;
  watcherFactory: ResultWatcherFactory;
}

/**
 * Compaction result of one dispatch. Filled in as soon as summarization succeeds,
 * so it survives a next-step call that fails or times out afterwards.
 */
interface CompactionSlot {
  summary?: string;
}

export type EngineEvent =
  | { type: 'SELECT_PROJECT'; project: Project }
  | { type: 'START_TASK'; text?: string }
  | { type: 'RESUME'; text: string }
  | { type: 'PAUSE' }
  | { type: 'STOP' }
  | { type: 'RESULT_DETECTED'; path: string }
  | { type: 'RESULT_TIMEOUT'; waitId: number }
  | { type: 'BACKEND_SETTLED'; cycle: number; outcome: DispatchOutcome<BackendResponse>; summary?: string }
  | { type: 'SHUTDOWN' };

interface PendingDispatch {
  cycle: number;
  compaction: CompactionSlot;
  outcome: Promise<DispatchOutcome<BackendResponse>>;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

interface ActiveProject {
  project: Project;
  state: ProjectState;
  paths: HandshakePaths;
}

export class OrchestrationEngine {
  private context: EngineContext;
  private project: Project | null = null;
  private projectState: ProjectState | null = null;
  private paths: HandshakePaths | null = null;
  private watcher: ResultWatcher | null = null;
  /** Bumped on every dispatch and every interruption; settles from older cycles are stale */
  private cycle = 0;
  private observer: EngineObserver | undefined;

  private readonly mutex = new AsyncMutex();
  private readonly dispatcher: BackendCallDispatcher;
  private readonly supervisor: ResultTimeoutSupervisor;
  private readonly background = new Set<Promise<void>>();
  private readonly logger: Logger;

  constructor(
    private readonly config: EffectiveConfig,
    private readonly deps: OrchestrationEngineDependencies,
    observer?: EngineObserver
  ) {
    this.logger = deps.logger;
    this.observer = observer;
    this.context = createInitialContext(deps.clock.iso());
    this.dispatcher = new BackendCallDispatcher(deps.clock, deps.logger);
    this.supervisor = new ResultTimeoutSupervisor(deps.clock);
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  getState(): EngineState {
    return this.context.currentState;
  }

  getLastError(): string | undefined {
    return this.context.lastError;
  }

  getProject(): Project | null {
    return this.project;
  }

  /**
   * Snapshot of the active project's run state
   */
  getProjectState(): ProjectState | null {
    if (!this.projectState) {
      return null;
    }
    return { ...this.projectState, conversationHistory: [...this.projectState.conversationHistory] };
  }

  setObserver(observer: EngineObserver | undefined): void {
    this.observer = observer;
  }

  /**
   * Bind a project, quiescing whatever the previous one was doing
   */
  async setActiveProject(project: Project): Promise<Result<void, ValidationError>> {
    if (project.name.trim() === '') {
      return err(new ValidationError('Project name cannot be empty', 'name'));
    }
    if (!this.deps.fileSystem.isAbsolute(project.workspaceRootPath)) {
      return err(
        new ValidationError(`Workspace path must be absolute: ${project.workspaceRootPath}`, 'workspaceRootPath')
      );
    }
    await this.post({ type: 'SELECT_PROJECT', project });
    return ok(undefined);
  }

  /**
   * Start a task. Resolves once the Manager's first reply has been handled.
   */
  async startTask(text?: string): Promise<void> {
    await this.post({ type: 'START_TASK', text });
  }

  /**
   * Answer the Manager's pending question
   */
  async resumeWithUserInput(text: string): Promise<Result<void, ValidationError>> {
    if (text.trim() === '') {
      return err(new ValidationError('Input cannot be empty', 'text'));
    }
    await this.post({ type: 'RESUME', text: text.trim() });
    return ok(undefined);
  }

  async pauseTask(): Promise<void> {
    await this.post({ type: 'PAUSE' });
  }

  async stopTask(): Promise<void> {
    await this.post({ type: 'STOP' });
  }

  /**
   * Stop watching and timers and wait (bounded) for an in-flight Manager call
   */
  async shutdown(): Promise<void> {
    await this.post({ type: 'SHUTDOWN' });
    await this.whenIdle();
  }

  /**
   * Wait until every event raised in the background (watcher hits, timers) has been handled
   */
  async whenIdle(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.all([...this.background]);
    }
  }

  // ===========================================================================
  // Event loop
  // ===========================================================================

  /**
   * Handle one event under the lock. Never rejects: failures become ERROR transitions.
   */
  private async post(event: EngineEvent): Promise<void> {
    const pending = await this.mutex.runExclusive(async (): Promise<PendingDispatch | undefined> => {
      try {
        return await this.handle(event);
      } catch (error) {
        await this.fail(error);
        return undefined;
      }
    });

    if (pending) {
      const outcome = await pending.outcome;
      await this.post({ type: 'BACKEND_SETTLED', cycle: pending.cycle, outcome, summary: pending.compaction.summary });
    }
  }

  private track(promise: Promise<void>): void {
    const tracked = promise.finally(() => {
      this.background.delete(tracked);
    });
    this.background.add(tracked);
  }

  private async handle(event: EngineEvent): Promise<PendingDispatch | undefined> {
    switch (event.type) {
      case 'SELECT_PROJECT':
        await this.handleSelectProject(event.project);
        return undefined;
      case 'START_TASK':
        return this.handleStartTask(event.text);
      case 'RESUME':
        return this.handleResume(event.text);
      case 'PAUSE':
        await this.handlePause();
        return undefined;
      case 'STOP':
        await this.handleStop();
        return undefined;
      case 'RESULT_DETECTED':
        return this.handleResultDetected(event.path);
      case 'RESULT_TIMEOUT':
        await this.handleResultTimeout(event.waitId);
        return undefined;
      case 'BACKEND_SETTLED':
        await this.handleBackendSettled(event.cycle, event.outcome, event.summary);
        return undefined;
      case 'SHUTDOWN':
        await this.handleShutdown();
        return undefined;
    }
  }

  // ===========================================================================
  // Handlers
  // ===========================================================================

  private async handleSelectProject(project: Project): Promise<void> {
    await this.quiesce();
    if (!(await this.dispatcher.whenIdle(this.config.timeouts.watcherStopMs))) {
      this.logger.warn('A Manager call from the previous project is still running; its result will be discarded');
    }

    this.project = project;
    this.projectState = null;
    this.paths = resolveHandshakePaths(project.workspaceRootPath, this.config.handshake);
    this.logger.setContext({ project: project.name });
    await this.transition('LOADING_PROJECT');

    let state = await this.deps.store.loadProjectState(project);
    if (state) {
      this.projectState = state;
    } else {
      state = createInitialProjectState(projectKey(project));
      this.projectState = state;
      await this.persist();
    }

    const dirs = await ensureHandshakeDirectories(this.deps.fileSystem, this.paths);
    if (!dirs.ok) {
      throw FileWriteError.fromFileSystem('create the handshake directories', dirs.error);
    }

    let restored = restoreStateOnLoad(state.currentStatus);
    if (restored === 'PAUSED_WAITING_USER_INPUT' && state.pendingUserQuestion === null) {
      restored = 'PROJECT_SELECTED';
    }
    await this.transition(restored);

    this.logger.event('project_loaded', `Loaded project ${project.name} (${state.conversationHistory.length} turns)`, this.meta());
    this.emit({ type: 'project_loaded', project, state: restored });
    if (restored === 'PAUSED_WAITING_USER_INPUT' && state.pendingUserQuestion !== null) {
      this.emit({ type: 'user_input_needed', question: state.pendingUserQuestion });
    }
  }

  private async handleStartTask(text: string | undefined): Promise<PendingDispatch | undefined> {
    const current = this.context.currentState;
    const trimmed = text?.trim() ?? '';

    if (current === 'PAUSED_WAITING_USER_INPUT') {
      if (trimmed !== '') {
        return this.handleResume(trimmed);
      }
      this.emitStatus('The Manager is waiting for your answer; reply with input.');
      return undefined;
    }
    if (!canStartFrom(current)) {
      this.logger.warn(`Ignoring start while ${current}`, this.meta());
      this.emitStatus(`Engine busy (${getStateDescription(current)}). Pause or stop the current task first.`);
      return undefined;
    }
    if (!this.project || !this.projectState || !this.paths) {
      await this.enterError(new InvalidStateError('No active project selected to start.'));
      return undefined;
    }

    const { project, state } = this.active();
    state.pendingUserQuestion = null;
    if (trimmed !== '') {
      await this.appendTurn('user', trimmed);
    } else {
      await this.appendTurn('system', `Task started with goal: ${project.overallGoal}`);
    }

    const summarize = this.summarizationDue(state);
    await this.transition('RUNNING_WAITING_INITIAL_BACKEND');
    this.emitStatus('Asking the Manager for the first step...');
    return this.dispatchCycle(null, summarize);
  }

  private async handleResume(text: string): Promise<PendingDispatch | undefined> {
    const current = this.context.currentState;
    if (current !== 'PAUSED_WAITING_USER_INPUT' || !this.projectState) {
      await this.enterError(new InvalidStateError(`Cannot resume: not waiting for user input (state ${current})`));
      return undefined;
    }

    const { state } = this.active();
    state.pendingUserQuestion = null;
    await this.appendTurn('user', text);

    const summarize = this.summarizationDue(state);
    await this.transition('RUNNING_CALLING_BACKEND');
    this.emitStatus('Sending your answer to the Manager...');
    return this.dispatchCycle(null, summarize);
  }

  private async handleResultDetected(path: string): Promise<PendingDispatch | undefined> {
    const current = this.context.currentState;
    if (current !== 'RUNNING_WAITING_RESULT' || !this.paths) {
      this.logger.debug(`Ignoring file event for ${path} while ${current}`, this.meta());
      return undefined;
    }
    if (!isResultFileEvent(path, this.paths)) {
      this.logger.debug(`Ignoring file event for ${path}`, this.meta());
      return undefined;
    }

    const { paths } = this.active();
    // Cancel first so a deadline firing now finds the state already moved on
    this.supervisor.cancel();
    await this.stopWatcher();
    this.logger.event('result_detected', `Worker result at ${path}`, this.meta());
    await this.transition('RUNNING_PROCESSING_RESULT');

    const read = await readResult(this.deps.fileSystem, paths);
    if (!read.ok) {
      throw FileReadError.fromFileSystem('read the result file', read.error);
    }
    await this.appendTurn('worker_log', read.value);

    const archived = await archiveResult(this.deps.fileSystem, paths, this.deps.clock);
    if (!archived.ok) {
      throw FileReadError.fromFileSystem('archive the result file', archived.error);
    }
    this.logger.event('result_archived', `Archived result to ${archived.value}`, this.meta());

    await this.transition('RUNNING_CALLING_BACKEND');
    this.emitStatus('Worker result received. Asking the Manager for the next step...');
    return this.dispatchCycle(read.value, false);
  }

  private async handleResultTimeout(waitId: number): Promise<void> {
    if (this.context.currentState !== 'RUNNING_WAITING_RESULT' || waitId !== this.supervisor.currentWaitId) {
      this.logger.debug(`Ignoring stale result deadline ${waitId}`, this.meta());
      return;
    }
    this.logger.event('timeout_fired', 'No Worker result before the deadline', this.meta());
    await this.enterError(new ResultTimeout(this.config.timeouts.resultWaitMs));
  }

  private async handleBackendSettled(
    cycle: number,
    outcome: DispatchOutcome<BackendResponse>,
    summary: string | undefined
  ): Promise<void> {
    const current = this.context.currentState;
    if (cycle !== this.cycle || (current !== 'RUNNING_WAITING_INITIAL_BACKEND' && current !== 'RUNNING_CALLING_BACKEND')) {
      this.logger.debug(`Discarding Manager reply from cycle ${cycle}`, this.meta());
      return;
    }

    // Kept even when the next-step call below failed
    if (summary !== undefined) {
      await this.applySummary(summary);
    }

    switch (outcome.kind) {
      case 'busy':
        this.logger.event('backend_call_failed', 'Manager call rejected: another call is in flight', this.meta());
        throw new BackendCallError('Backend call already in progress');
      case 'timeout': {
        const seconds = Math.round(this.config.timeouts.backendCallMs / 1000);
        this.logger.event('backend_call_failed', `Manager call timed out after ${seconds}s`, this.meta());
        throw new BackendCallError(`Manager call timed out after ${seconds} seconds`);
      }
      case 'failed': {
        const error =
          outcome.error instanceof OrchestratorError
            ? outcome.error
            : new BackendCallError(`Manager call failed: ${describe(outcome.error)}`, { cause: outcome.error });
        this.logger.event('backend_call_failed', error.message, this.meta());
        throw error;
      }
      case 'ok':
        this.logger.event('backend_call_completed', `Manager replied ${outcome.value.status}`, this.meta());
        await this.interpret(outcome.value);
        return;
    }
  }

  private async handlePause(): Promise<void> {
    const current = this.context.currentState;
    if (isRunningState(current)) {
      await this.quiesce();
      await this.transition('IDLE');
      await this.appendTurn('system', 'Task processing paused by user.');
      this.emitStatus('Task paused. File watching stopped.');
      return;
    }
    if (current === 'PAUSED_WAITING_USER_INPUT') {
      this.emitStatus('Already paused waiting for user input.');
      return;
    }
    this.emitStatus('No running task, nothing to pause.');
  }

  private async handleStop(): Promise<void> {
    const from = this.context.currentState;
    await this.quiesce();

    if (!this.projectState) {
      await this.transition('IDLE');
      this.emitStatus('Stopped. No project is active.');
      return;
    }

    const { state } = this.active();
    state.lastInstructionSent = null;
    state.pendingUserQuestion = null;
    await this.appendTurn('system', `Task stopped by user from state: ${from}.`);
    await this.transition('PROJECT_SELECTED');
    this.emitStatus('Task stopped.');
  }

  private async handleShutdown(): Promise<void> {
    await this.quiesce();
    if (!(await this.dispatcher.whenIdle(this.config.timeouts.watcherStopMs))) {
      this.logger.warn('Shutting down with a Manager call still running');
    }
    this.logger.info('Engine shut down', this.meta());
  }

  // ===========================================================================
  // Manager calls
  // ===========================================================================

  private summarizationDue(state: ProjectState): boolean {
    return shouldSummarize(
      state.conversationHistory.length,
      this.config.history.summarizationInterval,
      state.contextSummary !== null
    );
  }

  /**
   * Start a Manager call for the current history. Compaction, when due, runs first
   * inside the same call; its failure keeps the previous summary.
   */
  private dispatchCycle(latestResult: string | null, summarize: boolean): PendingDispatch {
    const { project, state } = this.active();
    const cycle = ++this.cycle;
    const history = [...state.conversationHistory];
    const previousSummary = state.contextSummary;
    const { backend } = this.deps;
    const { history: historyConfig } = this.config;

    const compaction: CompactionSlot = {};

    const job = async (): Promise<BackendResponse> => {
      if (summarize) {
        const input = selectCompactionInput(history, previousSummary, historyConfig.summarizationInterval);
        try {
          compaction.summary = await backend.summarize(renderCompactionText(input), historyConfig.summaryMaxTokens);
        } catch (error) {
          this.logger.event('summary_failed', `Summarization failed, keeping the previous summary: ${describe(error)}`, {
            cycle,
          });
        }
      }
      return backend.getNextStep({
        projectGoal: project.overallGoal,
        history,
        contextSummary: compaction.summary ?? previousSummary,
        latestResult,
        maxHistoryTurns: historyConfig.maxHistoryTurns,
        maxContextTokens: historyConfig.maxContextTokens,
      });
    };

    this.logger.event('backend_call_started', `Calling ${backend.name}`, this.meta());
    return { cycle, compaction, outcome: this.dispatcher.dispatch(job, this.config.timeouts.backendCallMs) };
  }

  private async applySummary(summary: string): Promise<void> {
    const { state } = this.active();
    state.contextSummary = summary;
    state.managerTurnsSinceLastSummary = 0;
    await this.persist();
    this.logger.event('summary_updated', `Context summary updated (${summary.length} chars)`, this.meta());
  }

  private async interpret(response: BackendResponse): Promise<void> {
    const { state, paths } = this.active();

    switch (response.status) {
      case 'INSTRUCTION': {
        const stale = await archiveStaleResult(this.deps.fileSystem, paths, this.deps.clock);
        if (!stale.ok) {
          throw FileWriteError.fromFileSystem('archive the stale result file', stale.error);
        }
        if (stale.value !== null) {
          this.logger.event('result_archived', `Archived stale result to ${stale.value}`, this.meta());
        }
        const written = await writeInstruction(this.deps.fileSystem, paths, response.content);
        if (!written.ok) {
          throw FileWriteError.fromFileSystem('write the instruction file', written.error);
        }
        this.logger.event('instruction_written', `Instruction written to ${paths.instructionFile}`, this.meta());
        state.lastInstructionSent = response.content;
        await this.appendTurn('manager', response.content);
        await this.transition('RUNNING_WAITING_RESULT');
        await this.waitForResult(paths);
        this.emitStatus(`Instruction written to ${paths.instructionFile}. Waiting for the Worker...`);
        return;
      }
      case 'NEED_INPUT':
        state.pendingUserQuestion = response.content;
        await this.appendTurn('manager_clarification_request', response.content);
        await this.transition('PAUSED_WAITING_USER_INPUT');
        this.emit({ type: 'user_input_needed', question: response.content });
        return;
      case 'COMPLETE': {
        const message = response.content === '' ? 'Task marked as complete.' : response.content;
        await this.appendTurn('manager', message);
        await this.transition('TASK_COMPLETE');
        this.emit({ type: 'task_complete', message });
        return;
      }
      case 'ERROR': {
        const message = `Manager reported an error: ${response.content}`;
        await this.appendTurn('system_error', message);
        await this.enterError(new BackendCallError(message));
        return;
      }
    }
  }

  // ===========================================================================
  // Watcher and deadline
  // ===========================================================================

  private async waitForResult(paths: HandshakePaths): Promise<void> {
    const watcher = this.deps.watcherFactory({
      directory: paths.logsDir,
      onFileAdded: (path) => this.track(this.post({ type: 'RESULT_DETECTED', path })),
      onError: (error) => {
        this.logger.error(`Result watcher error: ${error.message}`, this.meta());
      },
    });

    try {
      await watcher.start();
    } catch (error) {
      if (error instanceof WatcherError) {
        throw error;
      }
      throw new WatcherError(`Failed to start the result watcher: ${describe(error)}`, { cause: error });
    }
    this.watcher = watcher;

    this.supervisor.arm(this.config.timeouts.resultWaitMs, (waitId) =>
      this.track(this.post({ type: 'RESULT_TIMEOUT', waitId }))
    );
  }

  private async stopWatcher(): Promise<void> {
    const watcher = this.watcher;
    this.watcher = null;
    if (!watcher) {
      return;
    }
    try {
      await watcher.stop();
    } catch (error) {
      this.logger.warn(`Result watcher did not stop cleanly: ${describe(error)}`, this.meta());
    }
  }

  /**
   * Stop the watcher and deadline and invalidate any in-flight Manager call
   */
  private async quiesce(): Promise<void> {
    this.cycle++;
    this.supervisor.cancel();
    await this.stopWatcher();
  }

  // ===========================================================================
  // State, history and persistence
  // ===========================================================================

  private active(): ActiveProject {
    if (!this.project || !this.projectState || !this.paths) {
      throw new UnhandledError('No active project');
    }
    return { project: this.project, state: this.projectState, paths: this.paths };
  }

  /**
   * Apply a transition in memory and mirror it into the project state.
   * Returns the previous state.
   */
  private applyState(to: EngineState, message?: string): EngineState {
    const previous = this.context.currentState;
    const result = applyTransition(this.context, to, message, this.deps.clock.iso());
    if (!result.valid) {
      this.logger.event('invalid_transition', result.description, this.meta());
      throw new UnhandledError(result.description);
    }
    this.context = result.context;
    if (this.projectState) {
      this.projectState.currentStatus = to;
    }
    this.logger.event('state_changed', result.description, this.meta());
    return previous;
  }

  private async transition(to: EngineState, message?: string): Promise<void> {
    const previous = this.applyState(to, message);
    await this.persist();
    this.emit({ type: 'state_change', state: to, previous, message });
  }

  private async enterError(error: OrchestratorError): Promise<void> {
    await this.quiesce();
    const previous = this.applyState('ERROR', error.message);
    try {
      await this.persist();
    } catch (persistError) {
      this.logger.error(`Could not save the error state: ${describe(persistError)}`, this.meta());
    }
    this.emit({ type: 'state_change', state: 'ERROR', previous, message: error.message });
    this.emit({ type: 'error', message: error.message, kind: error.kind });
  }

  private async fail(error: unknown): Promise<void> {
    const failure = toOrchestratorError(error);
    if (failure instanceof UnhandledError) {
      const cause = failure.cause instanceof Error ? failure.cause : failure;
      this.logger.error(failure.message, { ...this.meta(), stack: cause.stack });
    } else {
      this.logger.error(`${failure.name}: ${failure.message}`, this.meta());
    }
    try {
      await this.enterError(failure);
    } catch (secondary) {
      this.logger.error(`Failed to enter the error state: ${describe(secondary)}`, this.meta());
    }
  }

  private async appendTurn(sender: TurnSender, message: string): Promise<Turn> {
    const { state } = this.active();
    const turn: Turn = { sender, message, timestamp: this.deps.clock.iso() };
    state.conversationHistory.push(turn);
    if (sender === 'manager' || sender === 'manager_clarification_request') {
      state.managerTurnsSinceLastSummary += 1;
    }
    await this.persist();
    this.emit({ type: 'new_message', turn });
    return turn;
  }

  private async persist(): Promise<void> {
    if (this.project && this.projectState) {
      await this.deps.store.saveProjectState(this.project, this.projectState);
    }
  }

  // ===========================================================================
  // Observer
  // ===========================================================================

  private emitStatus(message: string): void {
    this.emit({ type: 'status_update', message });
  }

  private emit(event: EngineObserverEvent): void {
    if (!this.observer) {
      return;
    }
    try {
      this.observer(event);
    } catch (error) {
      this.logger.error(`Observer failed on ${event.type}: ${describe(error)}`, this.meta());
    }
  }

  private meta(): LogMetadata {
    return { state: this.context.currentState, cycle: this.cycle };
  }
}

export function createOrchestrationEngine(
  config: EffectiveConfig,
  deps: OrchestrationEngineDependencies,
  observer?: EngineObserver
): OrchestrationEngine {
  return new OrchestrationEngine(config, deps, observer);
}
