/**
 * Events the engine emits to front-ends through a single callback
 */

import type { EngineState } from './engine-state';
import type { OrchestratorErrorKind } from './errors';
import type { Project, Turn } from './project';

export type EngineObserverEvent =
  | { type: 'state_change'; state: EngineState; previous: EngineState; message?: string }
  | { type: 'error'; message: string; kind: OrchestratorErrorKind }
  | { type: 'status_update'; message: string }
  | { type: 'new_message'; turn: Turn }
  | { type: 'user_input_needed'; question: string }
  | { type: 'task_complete'; message: string }
  | { type: 'project_loaded'; project: Project; state: EngineState };

export type EngineObserver = (event: EngineObserverEvent) => void;
