/**
 * Manager backend contract
 * The LLM-side collaborator that decides the next instruction
 */

import type { Turn } from './project';

export type BackendStatus = 'INSTRUCTION' | 'NEED_INPUT' | 'COMPLETE' | 'ERROR';

export interface BackendResponse {
  status: BackendStatus;
  content: string;
}

export interface NextStepRequest {
  projectGoal: string;
  /** Full history; the backend truncates to maxHistoryTurns */
  history: readonly Turn[];
  contextSummary: string | null;
  /** Worker output from the result file; null when responding to the user */
  latestResult: string | null;
  maxHistoryTurns: number;
  maxContextTokens: number;
}

export interface ManagerBackend {
  readonly name: string;

  /**
   * Ask for the next step.
   * Rejects with BackendAuthError or BackendCallError.
   */
  getNextStep(request: NextStepRequest): Promise<BackendResponse>;

  /**
   * Compact conversation text into a summary within a token budget.
   * Rejects on failure; callers keep their previous summary.
   */
  summarize(text: string, maxTokens: number): Promise<string>;
}
