/**
 * History compaction policy
 */

import type { Turn } from '../types/project';

/**
 * Whether to compact before the next Manager call.
 * True on every multiple of `interval`, and on the first call with more than
 * one turn when no summary exists yet.
 */
export function shouldSummarize(historyLength: number, interval: number, hasSummary: boolean): boolean {
  const periodic = interval > 0 && historyLength > 0 && historyLength % interval === 0;
  const firstSummary = !hasSummary && historyLength > 1;
  return periodic || firstSummary;
}

export interface CompactionInput {
  existingSummary: string | null;
  turns: readonly Turn[];
}

/**
 * Pick what gets compacted: the existing summary plus the last `interval`
 * turns, or the whole history when there is no summary yet
 */
export function selectCompactionInput(
  history: readonly Turn[],
  existingSummary: string | null,
  interval: number
): CompactionInput {
  if (existingSummary === null || interval <= 0) {
    return { existingSummary, turns: history };
  }
  return { existingSummary, turns: history.slice(-interval) };
}

/**
 * Plain-text form of a compaction input handed to the summarization call
 */
export function renderCompactionText(input: CompactionInput): string {
  const lines: string[] = [];
  if (input.existingSummary !== null) {
    lines.push('Existing summary:', input.existingSummary, '', 'New conversation turns:');
  } else {
    lines.push('Conversation turns:');
  }
  for (const turn of input.turns) {
    lines.push(`[${turn.sender}] ${turn.message}`);
  }
  return lines.join('\n');
}
