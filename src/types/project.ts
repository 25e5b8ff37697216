/**
 * Project and per-project run state
 */

import type { EngineState } from './engine-state';

export const TURN_SENDERS = [
  'user',
  'manager',
  'manager_clarification_request',
  'worker_log',
  'system',
  'system_error',
] as const;

export type TurnSender = (typeof TURN_SENDERS)[number];

/**
 * One message in the conversation. Immutable once appended.
 */
export interface Turn {
  readonly sender: TurnSender;
  readonly message: string;
  /** ISO 8601, assigned at creation */
  readonly timestamp: string;
  readonly metadata?: Readonly<Record<string, string>>;
}

export interface Project {
  /** Unique, user-chosen */
  name: string;
  /** Absolute directory the Worker operates in */
  workspaceRootPath: string;
  overallGoal: string;
  id?: string;
}

/**
 * Mutable run state for one project, persisted after every history append,
 * state change and summary update
 */
export interface ProjectState {
  projectId: string;
  /** Append-only; insertion order is causal order */
  conversationHistory: Turn[];
  /** Mirrors the engine state */
  currentStatus: EngineState;
  lastInstructionSent: string | null;
  contextSummary: string | null;
  pendingUserQuestion: string | null;
  managerTurnsSinceLastSummary: number;
}

/**
 * Key that ties a ProjectState to its project
 */
export function projectKey(project: Project): string {
  return project.id ?? project.name;
}

export function createInitialProjectState(projectId: string): ProjectState {
  return {
    projectId,
    conversationHistory: [],
    currentStatus: 'IDLE',
    lastInstructionSent: null,
    contextSummary: null,
    pendingUserQuestion: null,
    managerTurnsSinceLastSummary: 0,
  };
}
