import { describe, it, expect } from 'vitest';
import {
  NO_WORKER_OUTPUT,
  buildNextStepPrompt,
  buildSummaryPrompt,
  checkPromptBudget,
  estimateTokens,
  formatTurn,
} from './prompt-builder';
import { createBufferLogger } from '../logging/buffer-logger';
import type { NextStepRequest } from '../types/manager-backend';
import type { Turn } from '../types/project';

const files = { instructionFileName: 'next_step.txt', resultFileName: 'worker_output.txt' };

function turn(sender: Turn['sender'], message: string): Turn {
  return { sender, message, timestamp: '2025-01-01T00:00:00.000Z' };
}

function request(overrides: Partial<NextStepRequest> = {}): NextStepRequest {
  return {
    projectGoal: 'Add a CSV export',
    history: [],
    contextSummary: null,
    latestResult: null,
    maxHistoryTurns: 20,
    maxContextTokens: 30000,
    ...overrides,
  };
}

describe('prompt-builder', () => {
  describe('buildNextStepPrompt', () => {
    it('should quote the handshake file names and the goal', () => {
      const prompt = buildNextStepPrompt(request(), files);
      expect(prompt).toContain('`next_step.txt`');
      expect(prompt).toContain('`worker_output.txt`');
      expect(prompt).toContain('\nProject goal: Add a CSV export\n');
    });

    it('should include only the most recent turns, oldest first', () => {
      const history = [turn('user', 'first'), turn('manager', 'second'), turn('worker_log', 'third')];
      const prompt = buildNextStepPrompt(request({ history, maxHistoryTurns: 2 }), files);

      expect(prompt).not.toContain('User: first');
      expect(prompt).toContain('Your previous instruction: second\nWorker output: third');
    });

    it('should add the summary section only when a summary exists', () => {
      expect(buildNextStepPrompt(request(), files)).not.toContain('--- Summary of Earlier Conversation ---');
      expect(buildNextStepPrompt(request({ contextSummary: 'Set up the repo.' }), files)).toContain(
        '--- Summary of Earlier Conversation ---\nSet up the repo.'
      );
    });

    it('should use a placeholder for an empty worker result', () => {
      const prompt = buildNextStepPrompt(request({ latestResult: '  ' }), files);
      expect(prompt).toContain(`--- Latest Worker Result ---\n${NO_WORKER_OUTPUT}`);
    });

    it('should omit the result section when answering the user', () => {
      expect(buildNextStepPrompt(request(), files)).not.toContain('--- Latest Worker Result ---');
    });

    it('should end with the marker reminder', () => {
      const prompt = buildNextStepPrompt(request(), files);
      expect(prompt.endsWith('NEED_USER_INPUT:, TASK_COMPLETE or SYSTEM_ERROR:.')).toBe(true);
    });

    it('should keep dollar signs in messages intact', () => {
      const prompt = buildNextStepPrompt(request({ projectGoal: 'Price is $& more' }), files);
      expect(prompt).toContain('Project goal: Price is $& more');
    });
  });

  describe('formatTurn', () => {
    it('should label clarification requests', () => {
      expect(formatTurn(turn('manager_clarification_request', 'which file?'))).toBe(
        'Your previous question to the user: which file?'
      );
    });
  });

  describe('buildSummaryPrompt', () => {
    it('should embed the conversation and the budget', () => {
      const prompt = buildSummaryPrompt('[user] hello', 500);
      expect(prompt).toContain('--- Conversation ---\n[user] hello\n--- End of conversation ---');
      expect(prompt).toContain('in at most 500 tokens.');
    });
  });

  describe('token budget', () => {
    it('should estimate four characters per token, rounding up', () => {
      expect(estimateTokens('')).toBe(0);
      expect(estimateTokens('abcd')).toBe(1);
      expect(estimateTokens('abcde')).toBe(2);
    });

    it('should warn above 90% of the budget', () => {
      const logger = createBufferLogger();
      expect(checkPromptBudget('x'.repeat(40), 10, logger)).toBe(10);
      expect(logger.getEventsByType('warn')).toHaveLength(1);

      const quiet = createBufferLogger();
      checkPromptBudget('x'.repeat(36), 10, quiet);
      expect(quiet.getEventsByType('warn')).toHaveLength(0);
    });
  });
});
