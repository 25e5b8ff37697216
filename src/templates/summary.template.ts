import type { PromptTemplate } from './prompt-template';

/**
 * Compaction prompt. `conversation` is the existing summary plus the new turns.
 */
export function getSummaryTemplate(): PromptTemplate {
  return {
    description: 'Compact earlier conversation into a running summary',
    requiredVariables: ['conversation', 'maxTokens'],
    template: `You maintain the running summary of a conversation between a user, a Manager that plans
software work, and a Worker that carries it out.

Fold everything below into one updated summary. Keep decisions, open questions, files touched and
the outcome of each Worker step. Drop greetings and repetition.

--- Conversation ---
{{conversation}}
--- End of conversation ---

Reply with the summary only, in at most {{maxTokens}} tokens.`,
  };
}
