/**
 * Turns engine events into terminal lines
 */

import { getStateDescription } from '../core/state-machine';
import type { EngineObserverEvent } from '../types/engine-observer';
import type { Turn, TurnSender } from '../types/project';

export interface RenderOptions {
  /** One JSON object per event instead of prose */
  json: boolean;
  /** Include state changes */
  verbose: boolean;
  /** Longest turn body printed before it is cut */
  maxMessageLength?: number;
}

const DEFAULT_MAX_MESSAGE_LENGTH = 2_000;

const SENDER_TAGS: Record<TurnSender, string> = {
  user: 'you',
  manager: 'manager',
  manager_clarification_request: 'manager?',
  worker_log: 'worker',
  system: 'system',
  system_error: 'error',
};

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength)}... (${text.length - maxLength} more characters)`;
}

export function renderTurn(turn: Turn, maxLength = DEFAULT_MAX_MESSAGE_LENGTH): string {
  return `[${SENDER_TAGS[turn.sender]}] ${truncate(turn.message, maxLength)}`;
}

/**
 * Lines to print for one event; empty when the event is not shown
 */
export function renderEvent(event: EngineObserverEvent, options: RenderOptions): string[] {
  if (options.json) {
    return [JSON.stringify(event)];
  }

  switch (event.type) {
    case 'state_change':
      return options.verbose ? [`state: ${event.previous} -> ${event.state}`] : [];
    case 'error':
      return [`Error (${event.kind}): ${event.message}`];
    case 'status_update':
      return [event.message];
    case 'new_message':
      return [renderTurn(event.turn, options.maxMessageLength)];
    case 'user_input_needed':
      return [`The Manager asks: ${event.question}`, 'Answer with: input <your answer>'];
    case 'task_complete':
      return [`Task complete: ${event.message}`];
    case 'project_loaded':
      return [`Project "${event.project.name}" loaded. ${getStateDescription(event.state)}.`];
  }
}
