import { describe, it, expect, beforeEach, vi } from 'vitest';
import { OrchestrationEngine } from './orchestration-engine';
import { MemoryFileSystem } from '../io/memory-file-system';
import { JsonProjectStore } from '../io/project-store';
import { ScriptedManagerBackend } from '../engines/scripted-manager-backend';
import type { ScriptedReply, ScriptedSummary } from '../engines/scripted-manager-backend';
import { createBufferLogger } from '../logging/buffer-logger';
import type { BufferLogger } from '../logging/buffer-logger';
import { MockClock } from '../types/clock';
import { BackendAuthError } from '../types/errors';
import type { EngineObserverEvent } from '../types/engine-observer';
import type { BackendResponse } from '../types/manager-backend';
import type { Project } from '../types/project';
import { FakeWatcherFactory } from '../../tests/utils/fake-result-watcher';
import { createTestConfig } from '../../tests/utils/test-config';
import type { TestConfigOverrides } from '../../tests/utils/test-config';

const PROJECT: Project = {
  id: 'p-1',
  name: 'demo',
  workspaceRootPath: '/work/app',
  overallGoal: 'Add a CSV export',
};

const INSTRUCTION_FILE = '/work/app/dev_instructions/next_step.txt';
const RESULT_FILE = '/work/app/dev_logs/worker_output.txt';
const STATE_FILE = '/work/app/.handoff/state.json';

interface Harness {
  engine: OrchestrationEngine;
  fs: MemoryFileSystem;
  clock: MockClock;
  logger: BufferLogger;
  store: JsonProjectStore;
  backend: ScriptedManagerBackend;
  watchers: FakeWatcherFactory;
  events: EngineObserverEvent[];
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

function savedStatus(fs: MemoryFileSystem): unknown {
  const saved: unknown = JSON.parse(fs.peek(STATE_FILE) ?? '{}');
  return typeof saved === 'object' && saved !== null && 'currentStatus' in saved ? saved.currentStatus : undefined;
}

describe('OrchestrationEngine', () => {
  let fs: MemoryFileSystem;
  let clock: MockClock;
  let logger: BufferLogger;
  let store: JsonProjectStore;

  beforeEach(() => {
    fs = new MemoryFileSystem();
    fs.seedFile('/work/app/README.md', '# app');
    clock = new MockClock();
    logger = createBufferLogger();
    store = new JsonProjectStore({
      fileSystem: fs,
      dataDirectory: '/data',
      stateDirName: '.handoff',
      logger,
    });
  });

  function createHarness(
    options: { replies?: ScriptedReply[]; summaries?: ScriptedSummary[]; config?: TestConfigOverrides } = {}
  ): Harness {
    const backend = new ScriptedManagerBackend({ replies: options.replies, summaries: options.summaries });
    const watchers = new FakeWatcherFactory();
    const events: EngineObserverEvent[] = [];
    const engine = new OrchestrationEngine(
      createTestConfig(options.config),
      { logger, fileSystem: fs, clock, store, backend, watcherFactory: watchers.factory },
      (event) => events.push(event)
    );
    return { engine, fs, clock, logger, store, backend, watchers, events };
  }

  function senders(h: Harness): string[] {
    return h.engine.getProjectState()?.conversationHistory.map((turn) => turn.sender) ?? [];
  }

  describe('project selection', () => {
    it('should bind a new project and persist a fresh state', async () => {
      const h = createHarness();

      const result = await h.engine.setActiveProject(PROJECT);

      expect(result.ok).toBe(true);
      expect(h.engine.getState()).toBe('PROJECT_SELECTED');
      expect(h.engine.getProject()).toEqual(PROJECT);
      expect(h.engine.getProjectState()?.projectId).toBe('p-1');
      expect(savedStatus(fs)).toBe('PROJECT_SELECTED');
      expect(await fs.exists('/work/app/dev_instructions')).toBe(true);
      expect(await fs.exists('/work/app/dev_logs')).toBe(true);
      expect(h.events.filter((e) => e.type === 'project_loaded')).toHaveLength(1);
    });

    it('should reject a relative workspace path without changing state', async () => {
      const h = createHarness();

      const result = await h.engine.setActiveProject({ ...PROJECT, workspaceRootPath: 'work/app' });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Workspace path must be absolute: work/app');
      }
      expect(h.engine.getState()).toBe('IDLE');
    });

    it('should restore an unanswered question after a restart', async () => {
      const first = createHarness({ replies: [{ status: 'NEED_INPUT', content: 'Which delimiter?' }] });
      await first.engine.setActiveProject(PROJECT);
      await first.engine.startTask('Export orders');
      expect(first.engine.getState()).toBe('PAUSED_WAITING_USER_INPUT');

      const second = createHarness();
      await second.engine.setActiveProject(PROJECT);

      expect(second.engine.getState()).toBe('PAUSED_WAITING_USER_INPUT');
      expect(second.engine.getProjectState()?.pendingUserQuestion).toBe('Which delimiter?');
      expect(second.engine.getProjectState()?.conversationHistory).toHaveLength(2);
      expect(second.events).toContainEqual({ type: 'user_input_needed', question: 'Which delimiter?' });
    });

    it('should come back as PROJECT_SELECTED after a saved error', async () => {
      const first = createHarness({ replies: [new Error('socket hang up')] });
      await first.engine.setActiveProject(PROJECT);
      await first.engine.startTask('Export orders');
      expect(savedStatus(fs)).toBe('ERROR');

      const second = createHarness();
      await second.engine.setActiveProject(PROJECT);

      expect(second.engine.getState()).toBe('PROJECT_SELECTED');
      expect(second.engine.getLastError()).toBeUndefined();
    });
  });

  describe('task cycle', () => {
    it('should write the first instruction and wait for the result', async () => {
      const h = createHarness({ replies: [{ status: 'INSTRUCTION', content: 'Create src/export.ts' }] });
      await h.engine.setActiveProject(PROJECT);

      await h.engine.startTask('Export orders');

      expect(h.engine.getState()).toBe('RUNNING_WAITING_RESULT');
      expect(fs.peek(INSTRUCTION_FILE)).toBe('Create src/export.ts');
      expect(h.engine.getProjectState()?.lastInstructionSent).toBe('Create src/export.ts');
      expect(senders(h)).toEqual(['user', 'manager']);
      expect(h.watchers.created).toHaveLength(1);
      expect(h.watchers.latest.options.directory).toBe('/work/app/dev_logs');
      expect(h.watchers.latest.isRunning).toBe(true);
      // only the result deadline is left
      expect(clock.pendingCount()).toBe(1);
      expect(savedStatus(fs)).toBe('RUNNING_WAITING_RESULT');
      expect(h.backend.requests[0]?.projectGoal).toBe('Add a CSV export');
      expect(h.backend.requests[0]?.latestResult).toBeNull();
    });

    it('should record a system turn when started without text', async () => {
      const h = createHarness({ replies: [{ status: 'COMPLETE', content: '' }] });
      await h.engine.setActiveProject(PROJECT);

      await h.engine.startTask();

      const history = h.engine.getProjectState()?.conversationHistory ?? [];
      expect(history[0]?.message).toBe('Task started with goal: Add a CSV export');
      expect(history[1]?.message).toBe('Task marked as complete.');
      expect(h.events).toContainEqual({ type: 'task_complete', message: 'Task marked as complete.' });
    });

    it('should consume a result, archive it and ask for the next step', async () => {
      const h = createHarness({
        replies: [
          { status: 'INSTRUCTION', content: 'Create src/export.ts' },
          { status: 'COMPLETE', content: 'Export is done' },
        ],
      });
      await h.engine.setActiveProject(PROJECT);
      await h.engine.startTask('Export orders');
      const watcher = h.watchers.latest;

      fs.seedFile(RESULT_FILE, 'created src/export.ts');
      watcher.emit(RESULT_FILE);
      await h.engine.whenIdle();

      expect(h.engine.getState()).toBe('TASK_COMPLETE');
      expect(senders(h)).toEqual(['user', 'manager', 'worker_log', 'manager']);
      expect(h.backend.requests[1]?.latestResult).toBe('created src/export.ts');
      expect(h.backend.requests[1]?.history).toHaveLength(3);
      expect(fs.peek(RESULT_FILE)).toBeUndefined();
      expect(fs.filesUnder('/work/app/dev_logs/processed')).toEqual([
        '/work/app/dev_logs/processed/worker_output_20250101_000000_000.txt',
      ]);
      expect(fs.peek('/work/app/dev_logs/processed/worker_output_20250101_000000_000.txt')).toBe(
        'created src/export.ts'
      );
      expect(watcher.isRunning).toBe(false);
      expect(clock.pendingCount()).toBe(0);
      expect(h.events).toContainEqual({ type: 'task_complete', message: 'Export is done' });
      expect(savedStatus(fs)).toBe('TASK_COMPLETE');
    });

    it('should ignore files other than the result file', async () => {
      const h = createHarness({ replies: [{ status: 'INSTRUCTION', content: 'Create src/export.ts' }] });
      await h.engine.setActiveProject(PROJECT);
      await h.engine.startTask('Export orders');

      h.watchers.latest.emit('/work/app/dev_logs/notes.txt');
      await h.engine.whenIdle();

      expect(h.engine.getState()).toBe('RUNNING_WAITING_RESULT');
      expect(h.watchers.latest.stopCalls).toBe(0);
    });

    it('should mirror every state change into the project state', async () => {
      const h = createHarness({
        replies: [
          { status: 'INSTRUCTION', content: 'Create src/export.ts' },
          { status: 'COMPLETE', content: 'done' },
        ],
      });
      const mismatches: string[] = [];
      h.engine.setObserver((event) => {
        if (event.type === 'state_change' && h.engine.getProjectState()) {
          const status = h.engine.getProjectState()?.currentStatus;
          if (status !== event.state) {
            mismatches.push(`${event.state} != ${String(status)}`);
          }
        }
      });

      await h.engine.setActiveProject(PROJECT);
      await h.engine.startTask('Export orders');
      fs.seedFile(RESULT_FILE, 'ok');
      h.watchers.latest.emit(RESULT_FILE);
      await h.engine.whenIdle();

      expect(h.engine.getState()).toBe('TASK_COMPLETE');
      expect(mismatches).toEqual([]);
    });
  });

  describe('user input', () => {
    it('should pause on a question and resume with the answer', async () => {
      const h = createHarness({
        replies: [
          { status: 'NEED_INPUT', content: 'Which delimiter?' },
          { status: 'COMPLETE', content: 'done' },
        ],
      });
      await h.engine.setActiveProject(PROJECT);

      await h.engine.startTask('Export orders');
      expect(h.engine.getState()).toBe('PAUSED_WAITING_USER_INPUT');
      expect(h.engine.getProjectState()?.pendingUserQuestion).toBe('Which delimiter?');
      expect(h.events).toContainEqual({ type: 'user_input_needed', question: 'Which delimiter?' });

      const result = await h.engine.resumeWithUserInput('  Semicolons  ');

      expect(result.ok).toBe(true);
      expect(h.engine.getState()).toBe('TASK_COMPLETE');
      expect(h.engine.getProjectState()?.pendingUserQuestion).toBeNull();
      expect(h.engine.getProjectState()?.conversationHistory[2]?.message).toBe('Semicolons');
    });

    it('should treat start text while paused as the answer', async () => {
      const h = createHarness({
        replies: [
          { status: 'NEED_INPUT', content: 'Which delimiter?' },
          { status: 'COMPLETE', content: 'done' },
        ],
      });
      await h.engine.setActiveProject(PROJECT);
      await h.engine.startTask('Export orders');

      await h.engine.startTask('Commas');

      expect(h.engine.getState()).toBe('TASK_COMPLETE');
      expect(senders(h)).toEqual(['user', 'manager_clarification_request', 'user', 'manager']);
    });

    it('should reject blank input without changing state', async () => {
      const h = createHarness({ replies: [{ status: 'NEED_INPUT', content: 'Which delimiter?' }] });
      await h.engine.setActiveProject(PROJECT);
      await h.engine.startTask('Export orders');

      const result = await h.engine.resumeWithUserInput('   ');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('validation');
        expect(result.error.message).toBe('Input cannot be empty');
      }
      expect(h.engine.getState()).toBe('PAUSED_WAITING_USER_INPUT');
    });

    it('should enter ERROR when resumed while not waiting for input', async () => {
      const h = createHarness();
      await h.engine.setActiveProject(PROJECT);

      await h.engine.resumeWithUserInput('hello');

      expect(h.engine.getState()).toBe('ERROR');
      expect(h.engine.getLastError()).toBe('Cannot resume: not waiting for user input (state PROJECT_SELECTED)');
      expect(h.events).toContainEqual({
        type: 'error',
        kind: 'invalid_state',
        message: 'Cannot resume: not waiting for user input (state PROJECT_SELECTED)',
      });
    });
  });

  describe('summarization', () => {
    it('should compact the history before the first call with more than one turn', async () => {
      const h = createHarness({
        replies: [
          { status: 'NEED_INPUT', content: 'Which delimiter?' },
          { status: 'COMPLETE', content: 'done' },
        ],
      });
      await h.engine.setActiveProject(PROJECT);
      await h.engine.startTask('Export orders');
      expect(h.backend.summaryRequests).toHaveLength(0);

      await h.engine.resumeWithUserInput('Semicolons');

      expect(h.backend.summaryRequests).toEqual([
        {
          text: [
            'Conversation turns:',
            '[user] Export orders',
            '[manager_clarification_request] Which delimiter?',
            '[user] Semicolons',
          ].join('\n'),
          maxTokens: 1000,
        },
      ]);
      expect(h.backend.requests[1]?.contextSummary).toBe('Summary of 4 lines');
      expect(h.engine.getProjectState()?.contextSummary).toBe('Summary of 4 lines');
      // reset by the summary, then bumped by the final manager turn
      expect(h.engine.getProjectState()?.managerTurnsSinceLastSummary).toBe(1);
    });

    it('should keep going when summarization fails', async () => {
      const h = createHarness({
        replies: [
          { status: 'NEED_INPUT', content: 'Which delimiter?' },
          { status: 'COMPLETE', content: 'done' },
        ],
        summaries: [new Error('quota exceeded')],
      });
      await h.engine.setActiveProject(PROJECT);
      await h.engine.startTask('Export orders');

      await h.engine.resumeWithUserInput('Semicolons');

      expect(h.engine.getState()).toBe('TASK_COMPLETE');
      expect(h.engine.getProjectState()?.contextSummary).toBeNull();
      expect(h.backend.requests[1]?.contextSummary).toBeNull();
      expect(h.logger.getEventsByType('summary_failed')[0]?.message).toBe(
        'Summarization failed, keeping the previous summary: quota exceeded'
      );
    });

    it('should keep a new summary when the next-step call then fails', async () => {
      const h = createHarness({
        replies: [{ status: 'NEED_INPUT', content: 'Which delimiter?' }, new Error('manager crashed')],
        summaries: ['S1'],
      });
      await h.engine.setActiveProject(PROJECT);
      await h.engine.startTask('Export orders');

      await h.engine.resumeWithUserInput('Semicolons');

      expect(h.engine.getState()).toBe('ERROR');
      expect(h.backend.summaryRequests).toHaveLength(1);
      expect(h.engine.getProjectState()?.contextSummary).toBe('S1');
      const saved: unknown = JSON.parse(fs.peek(STATE_FILE) ?? '{}');
      expect(saved).toMatchObject({ contextSummary: 'S1', managerTurnsSinceLastSummary: 0 });
    });

    it('should keep a new summary when the next-step call times out', async () => {
      const h = createHarness({
        replies: [{ status: 'NEED_INPUT', content: 'Which delimiter?' }, () => new Promise<BackendResponse>(() => undefined)],
        summaries: ['S1'],
        config: { timeouts: { backendCallMs: 1_000 } },
      });
      await h.engine.setActiveProject(PROJECT);
      await h.engine.startTask('Export orders');

      const resumed = h.engine.resumeWithUserInput('Semicolons');
      await vi.waitFor(() => expect(h.backend.requests).toHaveLength(2));
      clock.advance(1_000);
      await resumed;

      expect(h.engine.getLastError()).toBe('Manager call timed out after 1 seconds');
      expect(h.engine.getProjectState()?.contextSummary).toBe('S1');
    });
  });

  describe('failures', () => {
    it('should enter ERROR when no project is selected', async () => {
      const h = createHarness();

      await h.engine.startTask('Export orders');

      expect(h.engine.getState()).toBe('ERROR');
      expect(h.engine.getLastError()).toBe('No active project selected to start.');
      expect(h.events).toContainEqual({ type: 'error', kind: 'invalid_state', message: 'No active project selected to start.' });
      expect(h.backend.requests).toHaveLength(0);
    });

    it('should enter ERROR when the result deadline passes', async () => {
      const h = createHarness({ replies: [{ status: 'INSTRUCTION', content: 'Create src/export.ts' }] });
      await h.engine.setActiveProject(PROJECT);
      await h.engine.startTask('Export orders');

      clock.advance(600_000);
      await h.engine.whenIdle();

      expect(h.engine.getState()).toBe('ERROR');
      expect(h.engine.getLastError()).toBe('Worker result timeout: no result file after 600 seconds');
      expect(h.watchers.latest.isRunning).toBe(false);
      expect(h.events).toContainEqual({
        type: 'error',
        message: 'Worker result timeout: no result file after 600 seconds',
        kind: 'result_timeout',
      });
    });

    it('should not fire the deadline once the result has arrived', async () => {
      const h = createHarness({
        replies: [
          { status: 'INSTRUCTION', content: 'Create src/export.ts' },
          { status: 'COMPLETE', content: 'done' },
        ],
      });
      await h.engine.setActiveProject(PROJECT);
      await h.engine.startTask('Export orders');
      fs.seedFile(RESULT_FILE, 'ok');
      h.watchers.latest.emit(RESULT_FILE);
      await h.engine.whenIdle();

      clock.advance(600_000);
      await h.engine.whenIdle();

      expect(h.engine.getState()).toBe('TASK_COMPLETE');
    });

    it('should map a credential failure to a backend_auth error', async () => {
      const h = createHarness({ replies: [new BackendAuthError('claude rejected its credentials')] });
      await h.engine.setActiveProject(PROJECT);

      await h.engine.startTask('Export orders');

      expect(h.engine.getState()).toBe('ERROR');
      expect(h.events).toContainEqual({
        type: 'error',
        message: 'claude rejected its credentials',
        kind: 'backend_auth',
      });
    });

    it('should wrap an unexpected backend failure', async () => {
      const h = createHarness({ replies: [new Error('socket hang up')] });
      await h.engine.setActiveProject(PROJECT);

      await h.engine.startTask('Export orders');

      expect(h.engine.getState()).toBe('ERROR');
      expect(h.engine.getLastError()).toBe('Manager call failed: socket hang up');
    });

    it('should record a Manager-reported error', async () => {
      const h = createHarness({ replies: [{ status: 'ERROR', content: 'repository is read-only' }] });
      await h.engine.setActiveProject(PROJECT);

      await h.engine.startTask('Export orders');

      expect(h.engine.getState()).toBe('ERROR');
      const history = h.engine.getProjectState()?.conversationHistory ?? [];
      expect(history[history.length - 1]).toMatchObject({
        sender: 'system_error',
        message: 'Manager reported an error: repository is read-only',
      });
    });

    it('should enter ERROR when the instruction cannot be written', async () => {
      const h = createHarness({ replies: [{ status: 'INSTRUCTION', content: 'Create src/export.ts' }] });
      await h.engine.setActiveProject(PROJECT);
      fs.failNext('writeFile', 'IO_ERROR', 'next_step.txt');

      await h.engine.startTask('Export orders');

      expect(h.engine.getState()).toBe('ERROR');
      expect(h.engine.getLastError()?.startsWith('Failed to write the instruction file')).toBe(true);
      expect(senders(h)).toEqual(['user']);
      expect(h.watchers.created).toHaveLength(0);
    });

    it('should enter ERROR when the watcher cannot start', async () => {
      const h = createHarness({ replies: [{ status: 'INSTRUCTION', content: 'Create src/export.ts' }] });
      h.watchers.failNextStart(new Error('too many open files'));
      await h.engine.setActiveProject(PROJECT);

      await h.engine.startTask('Export orders');

      expect(h.engine.getState()).toBe('ERROR');
      expect(h.engine.getLastError()).toBe('Failed to start the result watcher: too many open files');
      expect(clock.pendingCount()).toBe(0);
    });

    it('should time out a slow Manager call and refuse a second call while it runs', async () => {
      const h = createHarness({
        replies: [() => new Promise<BackendResponse>(() => undefined)],
        config: { timeouts: { backendCallMs: 1_000 } },
      });
      await h.engine.setActiveProject(PROJECT);

      const started = h.engine.startTask('Export orders');
      await vi.waitFor(() => expect(clock.pendingCount()).toBe(1));
      clock.advance(1_000);
      await started;

      expect(h.engine.getState()).toBe('ERROR');
      expect(h.engine.getLastError()).toBe('Manager call timed out after 1 seconds');

      await h.engine.startTask('Try again');

      expect(h.engine.getState()).toBe('ERROR');
      expect(h.engine.getLastError()).toBe('Backend call already in progress');
      expect(h.backend.requests).toHaveLength(1);
    });

    it('should log observer failures and carry on', async () => {
      const h = createHarness();
      h.engine.setObserver(() => {
        throw new Error('render failed');
      });

      await h.engine.setActiveProject(PROJECT);

      expect(h.engine.getState()).toBe('PROJECT_SELECTED');
      expect(h.logger.getEventsMatching(/^Observer failed on state_change: render failed$/).length).toBeGreaterThan(0);
    });
  });

  describe('control', () => {
    it('should pause a waiting task and stop watching', async () => {
      const h = createHarness({ replies: [{ status: 'INSTRUCTION', content: 'Create src/export.ts' }] });
      await h.engine.setActiveProject(PROJECT);
      await h.engine.startTask('Export orders');

      await h.engine.pauseTask();

      expect(h.engine.getState()).toBe('IDLE');
      expect(h.watchers.latest.isRunning).toBe(false);
      expect(clock.pendingCount()).toBe(0);
      const history = h.engine.getProjectState()?.conversationHistory ?? [];
      expect(history[history.length - 1]?.message).toBe('Task processing paused by user.');
      expect(h.events).toContainEqual({ type: 'status_update', message: 'Task paused. File watching stopped.' });
    });

    it('should archive a result left behind while paused before the next wait', async () => {
      const h = createHarness({
        replies: [
          { status: 'INSTRUCTION', content: 'Create src/export.ts' },
          { status: 'INSTRUCTION', content: 'Add a header row' },
        ],
      });
      await h.engine.setActiveProject(PROJECT);
      await h.engine.startTask('Export orders');
      await h.engine.pauseTask();
      fs.seedFile(RESULT_FILE, 'late result');

      await h.engine.startTask('go again');

      expect(h.engine.getState()).toBe('RUNNING_WAITING_RESULT');
      expect(fs.peek(RESULT_FILE)).toBeUndefined();
      expect(fs.peek('/work/app/dev_logs/processed/worker_output_20250101_000000_000.txt')).toBe('late result');
      expect(h.logger.getEventsMatching(/^Archived stale result/).map((e) => e.message)).toEqual([
        'Archived stale result to /work/app/dev_logs/processed/worker_output_20250101_000000_000.txt',
      ]);
      expect(senders(h)).toEqual(['user', 'manager', 'system', 'user', 'manager']);
    });

    it('should drop a Manager reply that arrives after a pause', async () => {
      const reply = deferred<BackendResponse>();
      const h = createHarness({ replies: [() => reply.promise] });
      await h.engine.setActiveProject(PROJECT);

      const started = h.engine.startTask('Export orders');
      await vi.waitFor(() => expect(h.backend.requests).toHaveLength(1));
      await h.engine.pauseTask();
      reply.resolve({ status: 'INSTRUCTION', content: 'Too late' });
      await started;

      expect(h.engine.getState()).toBe('IDLE');
      expect(fs.peek(INSTRUCTION_FILE)).toBeUndefined();
      expect(h.watchers.created).toHaveLength(0);
    });

    it('should report that a paused question cannot be paused again', async () => {
      const h = createHarness({ replies: [{ status: 'NEED_INPUT', content: 'Which delimiter?' }] });
      await h.engine.setActiveProject(PROJECT);
      await h.engine.startTask('Export orders');

      await h.engine.pauseTask();

      expect(h.engine.getState()).toBe('PAUSED_WAITING_USER_INPUT');
      expect(h.events).toContainEqual({ type: 'status_update', message: 'Already paused waiting for user input.' });
    });

    it('should stop a paused task and clear the pending question', async () => {
      const h = createHarness({ replies: [{ status: 'NEED_INPUT', content: 'Which delimiter?' }] });
      await h.engine.setActiveProject(PROJECT);
      await h.engine.startTask('Export orders');

      await h.engine.stopTask();

      const state = h.engine.getProjectState();
      const history = state?.conversationHistory ?? [];
      expect(h.engine.getState()).toBe('PROJECT_SELECTED');
      expect(state?.pendingUserQuestion).toBeNull();
      expect(state?.lastInstructionSent).toBeNull();
      expect(history[history.length - 1]?.message).toBe(
        'Task stopped by user from state: PAUSED_WAITING_USER_INPUT.'
      );
    });

    it('should ignore a result that appears after a stop', async () => {
      const h = createHarness({ replies: [{ status: 'INSTRUCTION', content: 'Create src/export.ts' }] });
      await h.engine.setActiveProject(PROJECT);
      await h.engine.startTask('Export orders');
      const watcher = h.watchers.latest;
      await h.engine.stopTask();
      const turns = h.engine.getProjectState()?.conversationHistory.length;

      fs.seedFile(RESULT_FILE, 'late result');
      watcher.emit(RESULT_FILE);
      await h.engine.whenIdle();

      expect(h.engine.getState()).toBe('PROJECT_SELECTED');
      expect(h.engine.getProjectState()?.conversationHistory.length).toBe(turns);
      expect(fs.peek(RESULT_FILE)).toBe('late result');
    });

    it('should not start a second task while one is running', async () => {
      const h = createHarness({ replies: [{ status: 'INSTRUCTION', content: 'Create src/export.ts' }] });
      await h.engine.setActiveProject(PROJECT);
      await h.engine.startTask('Export orders');

      await h.engine.startTask('Something else');

      expect(h.engine.getState()).toBe('RUNNING_WAITING_RESULT');
      expect(h.backend.requests).toHaveLength(1);
      expect(h.events).toContainEqual({
        type: 'status_update',
        message: 'Engine busy (Waiting for the Worker result file). Pause or stop the current task first.',
      });
    });

    it('should quiesce the old project when switching', async () => {
      const h = createHarness({ replies: [{ status: 'INSTRUCTION', content: 'Create src/export.ts' }] });
      fs.seedFile('/work/other/README.md', '# other');
      await h.engine.setActiveProject(PROJECT);
      await h.engine.startTask('Export orders');

      await h.engine.setActiveProject({ id: 'p-2', name: 'other', workspaceRootPath: '/work/other', overallGoal: 'Docs' });

      expect(h.engine.getState()).toBe('PROJECT_SELECTED');
      expect(h.engine.getProject()?.name).toBe('other');
      expect(h.watchers.latest.isRunning).toBe(false);
      expect(clock.pendingCount()).toBe(0);
    });

    it('should stop watching on shutdown', async () => {
      const h = createHarness({ replies: [{ status: 'INSTRUCTION', content: 'Create src/export.ts' }] });
      await h.engine.setActiveProject(PROJECT);
      await h.engine.startTask('Export orders');

      await h.engine.shutdown();

      expect(h.watchers.latest.isRunning).toBe(false);
      expect(clock.pendingCount()).toBe(0);
    });
  });
});
