/**
 * Manager backend that replays scripted replies.
 * Used by `--backend mock` and by tests.
 */

import type { BackendResponse, ManagerBackend, NextStepRequest } from '../types/manager-backend';

/**
 * One scripted reply: a response, an error to reject with, or a function for
 * replies that depend on the request or must be held back
 */
export type ScriptedReply =
  | BackendResponse
  | Error
  | ((request: NextStepRequest) => Promise<BackendResponse>);

export type ScriptedSummary = string | Error;

export interface SummaryRequest {
  text: string;
  maxTokens: number;
}

export interface ScriptedManagerBackendOptions {
  replies?: ScriptedReply[];
  summaries?: ScriptedSummary[];
  /** Returned once the reply queue is exhausted */
  fallback?: BackendResponse;
}

export class ScriptedManagerBackend implements ManagerBackend {
  readonly name = 'mock';
  /** Every next-step request received, with the history copied at call time */
  readonly requests: NextStepRequest[] = [];
  readonly summaryRequests: SummaryRequest[] = [];
  private readonly replies: ScriptedReply[];
  private readonly summaries: ScriptedSummary[];
  private readonly fallback: BackendResponse;

  constructor(options: ScriptedManagerBackendOptions = {}) {
    this.replies = [...(options.replies ?? [])];
    this.summaries = [...(options.summaries ?? [])];
    this.fallback = options.fallback ?? { status: 'COMPLETE', content: 'No more scripted replies.' };
  }

  enqueue(...replies: ScriptedReply[]): void {
    this.replies.push(...replies);
  }

  enqueueSummary(...summaries: ScriptedSummary[]): void {
    this.summaries.push(...summaries);
  }

  get remainingReplies(): number {
    return this.replies.length;
  }

  async getNextStep(request: NextStepRequest): Promise<BackendResponse> {
    this.requests.push({ ...request, history: [...request.history] });
    const reply = this.replies.shift();
    if (reply === undefined) {
      return this.fallback;
    }
    if (reply instanceof Error) {
      throw reply;
    }
    if (typeof reply === 'function') {
      return reply(request);
    }
    return reply;
  }

  async summarize(text: string, maxTokens: number): Promise<string> {
    this.summaryRequests.push({ text, maxTokens });
    const summary = this.summaries.shift();
    if (summary instanceof Error) {
      throw summary;
    }
    return summary ?? `Summary of ${text.split('\n').length} lines`;
  }
}
