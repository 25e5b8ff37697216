/**
 * Explicit State Machine for the orchestration engine
 *
 * All legal moves live in one table; the engine asks here before it changes
 * state and never writes its state field any other way.
 */

import type { EngineState } from '../types/engine-state';

export type { EngineState } from '../types/engine-state';

/**
 * Context carried across transitions
 */
export interface EngineContext {
  currentState: EngineState;
  /** Message attached to the most recent ERROR transition */
  lastError?: string;
  /** Timestamp of last state change */
  lastTransitionAt: string;
}

export interface TransitionResult {
  newState: EngineState;
  context: EngineContext;
  /** Whether the transition was applied */
  valid: boolean;
  /** Human-readable description of what happened */
  description: string;
}

const RUNNING_STATES: readonly EngineState[] = [
  'RUNNING_WAITING_INITIAL_BACKEND',
  'RUNNING_WAITING_RESULT',
  'RUNNING_PROCESSING_RESULT',
  'RUNNING_CALLING_BACKEND',
];

/**
 * States a fresh task may be started from
 */
const STARTABLE_STATES: readonly EngineState[] = ['IDLE', 'PROJECT_SELECTED', 'TASK_COMPLETE', 'ERROR'];

// Pause, stop and project switches can interrupt any running state
const INTERRUPT_TARGETS: EngineState[] = ['IDLE', 'PROJECT_SELECTED', 'LOADING_PROJECT', 'ERROR'];

const AFTER_BACKEND: EngineState[] = [
  'RUNNING_WAITING_RESULT',
  'PAUSED_WAITING_USER_INPUT',
  'TASK_COMPLETE',
  ...INTERRUPT_TARGETS,
];

/**
 * Valid state transitions map
 * Key: current state, Value: valid next states (self-transitions are always allowed)
 */
const VALID_TRANSITIONS: Record<EngineState, EngineState[]> = {
  IDLE: ['LOADING_PROJECT', 'PROJECT_SELECTED', 'RUNNING_WAITING_INITIAL_BACKEND', 'ERROR'],
  LOADING_PROJECT: ['PROJECT_SELECTED', 'PAUSED_WAITING_USER_INPUT', 'IDLE', 'ERROR'],
  PROJECT_SELECTED: ['RUNNING_WAITING_INITIAL_BACKEND', 'LOADING_PROJECT', 'IDLE', 'ERROR'],
  RUNNING_WAITING_INITIAL_BACKEND: AFTER_BACKEND,
  RUNNING_WAITING_RESULT: ['RUNNING_PROCESSING_RESULT', ...INTERRUPT_TARGETS],
  RUNNING_PROCESSING_RESULT: ['RUNNING_CALLING_BACKEND', ...INTERRUPT_TARGETS],
  RUNNING_CALLING_BACKEND: AFTER_BACKEND,
  PAUSED_WAITING_USER_INPUT: ['RUNNING_CALLING_BACKEND', 'PROJECT_SELECTED', 'LOADING_PROJECT', 'IDLE', 'ERROR'],
  TASK_COMPLETE: ['RUNNING_WAITING_INITIAL_BACKEND', 'PROJECT_SELECTED', 'LOADING_PROJECT', 'IDLE', 'ERROR'],
  ERROR: ['RUNNING_WAITING_INITIAL_BACKEND', 'PROJECT_SELECTED', 'LOADING_PROJECT', 'IDLE', 'ERROR'],
};

export function createInitialContext(now: string = new Date().toISOString()): EngineContext {
  return {
    currentState: 'IDLE',
    lastTransitionAt: now,
  };
}

export function isValidTransition(from: EngineState, to: EngineState): boolean {
  return from === to || VALID_TRANSITIONS[from].includes(to);
}

/**
 * Apply a transition to the context.
 * Invalid moves are reported through `valid: false` and leave the context untouched.
 */
export function applyTransition(
  context: EngineContext,
  to: EngineState,
  message?: string,
  now: string = new Date().toISOString()
): TransitionResult {
  const from = context.currentState;

  if (!isValidTransition(from, to)) {
    return {
      newState: from,
      context,
      valid: false,
      description: `Invalid transition ${from} -> ${to}`,
    };
  }

  if (to === 'ERROR' && (message === undefined || message.trim() === '')) {
    return {
      newState: from,
      context,
      valid: false,
      description: `Refusing to enter ERROR from ${from} without a message`,
    };
  }

  const newContext: EngineContext = {
    currentState: to,
    lastError: to === 'ERROR' ? message : undefined,
    lastTransitionAt: now,
  };

  return {
    newState: to,
    context: newContext,
    valid: true,
    description: message ? `${from} -> ${to}: ${message}` : `${from} -> ${to}`,
  };
}

export function isRunningState(state: EngineState): boolean {
  return RUNNING_STATES.includes(state);
}

export function canStartFrom(state: EngineState): boolean {
  return STARTABLE_STATES.includes(state);
}

/**
 * Terminal for a run, though both accept a new start
 */
export function isTerminalState(state: EngineState): boolean {
  return state === 'TASK_COMPLETE' || state === 'ERROR';
}

/**
 * State to bind after loading a saved status.
 * Only an unanswered Manager question survives a restart; a stale ERROR or an
 * interrupted run comes back as PROJECT_SELECTED.
 */
export function restoreStateOnLoad(savedStatus: EngineState): EngineState {
  return savedStatus === 'PAUSED_WAITING_USER_INPUT' ? 'PAUSED_WAITING_USER_INPUT' : 'PROJECT_SELECTED';
}

export function getStateDescription(state: EngineState): string {
  const descriptions: Record<EngineState, string> = {
    IDLE: 'Idle',
    LOADING_PROJECT: 'Loading project',
    PROJECT_SELECTED: 'Project selected, ready to start',
    RUNNING_WAITING_INITIAL_BACKEND: 'Asking the Manager for the first instruction',
    RUNNING_WAITING_RESULT: 'Waiting for the Worker result file',
    RUNNING_PROCESSING_RESULT: 'Processing the Worker result',
    RUNNING_CALLING_BACKEND: 'Asking the Manager for the next step',
    PAUSED_WAITING_USER_INPUT: 'Paused, waiting for your answer',
    TASK_COMPLETE: 'Task complete',
    ERROR: 'Error',
  };
  return descriptions[state];
}
