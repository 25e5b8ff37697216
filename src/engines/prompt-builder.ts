/**
 * Prompt construction for the Manager
 */

import type { Logger } from '../types/logger';
import type { NextStepRequest } from '../types/manager-backend';
import type { Turn, TurnSender } from '../types/project';
import { interpolateTemplate } from '../templates/prompt-template';
import { getManagerSopTemplate } from '../templates/manager-sop.template';
import { getSummaryTemplate } from '../templates/summary.template';

/**
 * Handshake file names quoted in the operating procedure
 */
export interface PromptFiles {
  instructionFileName: string;
  resultFileName: string;
}

const SENDER_LABELS: Record<TurnSender, string> = {
  user: 'User',
  manager: 'Your previous instruction',
  manager_clarification_request: 'Your previous question to the user',
  worker_log: 'Worker output',
  system: 'System',
  system_error: 'System error',
};

export const NO_WORKER_OUTPUT = '[No output from worker]';

export function formatTurn(turn: Turn): string {
  return `${SENDER_LABELS[turn.sender]}: ${turn.message}`;
}

export function buildNextStepPrompt(request: NextStepRequest, files: PromptFiles): string {
  const parts: string[] = [
    interpolateTemplate(getManagerSopTemplate(), {
      instructionFileName: files.instructionFileName,
      resultFileName: files.resultFileName,
    }),
    '',
    `Project goal: ${request.projectGoal}`,
  ];

  if (request.contextSummary) {
    parts.push('', '--- Summary of Earlier Conversation ---', request.contextSummary);
  }

  const recent = request.maxHistoryTurns > 0 ? request.history.slice(-request.maxHistoryTurns) : [];
  parts.push('', '--- Recent Conversation (oldest first) ---');
  parts.push(...recent.map(formatTurn));

  if (request.latestResult !== null) {
    const output = request.latestResult.trim() === '' ? NO_WORKER_OUTPUT : request.latestResult;
    parts.push('', '--- Latest Worker Result ---', output);
  }

  parts.push(
    '',
    '--- Your Next Step ---',
    'Reply with the next instruction, or start with one of the markers NEED_USER_INPUT:, TASK_COMPLETE or SYSTEM_ERROR:.'
  );
  return parts.join('\n');
}

export function buildSummaryPrompt(conversation: string, maxTokens: number): string {
  return interpolateTemplate(getSummaryTemplate(), {
    conversation,
    maxTokens: String(maxTokens),
  });
}

/**
 * Rough token count (four characters per token)
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Log a warning when a prompt uses more than 90% of the context budget.
 * Returns the estimate.
 */
export function checkPromptBudget(prompt: string, maxContextTokens: number, logger: Logger): number {
  const tokens = estimateTokens(prompt);
  if (tokens > maxContextTokens * 0.9) {
    logger.warn(`Prompt is ~${tokens} tokens, close to the ${maxContextTokens} token budget`, {
      tokens,
      maxContextTokens,
    });
  }
  return tokens;
}
