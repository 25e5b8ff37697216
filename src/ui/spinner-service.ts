/**
 * Spinner shown while the Manager is being called.
 * ora on a TTY, plain lines elsewhere, nothing in JSON mode.
 */

import ora from 'ora';
import type { Ora } from 'ora';

export type SpinnerOutcome = 'succeed' | 'fail' | 'warn' | 'info';

export interface Spinner {
  start(): void;
  setText(text: string): void;
  /** Stop, printing a final line for the outcome when given */
  stop(outcome?: SpinnerOutcome, text?: string): void;
  readonly isSpinning: boolean;
}

export interface SpinnerServiceConfig {
  isTTY: boolean;
  /** Suppress all spinner output (JSON mode) */
  quiet: boolean;
  stream: NodeJS.WritableStream;
}

class NullSpinner implements Spinner {
  private spinning = false;

  start(): void {
    this.spinning = true;
  }

  setText(): void {}

  stop(): void {
    this.spinning = false;
  }

  get isSpinning(): boolean {
    return this.spinning;
  }
}

const OUTCOME_SYMBOLS: Record<SpinnerOutcome, string> = {
  succeed: '✅',
  fail: '❌',
  warn: '⚠️ ',
  info: 'ℹ️ ',
};

/**
 * One line per start, text change and outcome
 */
class LineSpinner implements Spinner {
  private spinning = false;

  constructor(
    private text: string,
    private readonly stream: NodeJS.WritableStream
  ) {}

  start(): void {
    this.spinning = true;
    this.stream.write(`> ${this.text}\n`);
  }

  setText(text: string): void {
    if (text === this.text) {
      return;
    }
    this.text = text;
    if (this.spinning) {
      this.stream.write(`> ${text}\n`);
    }
  }

  stop(outcome?: SpinnerOutcome, text?: string): void {
    this.spinning = false;
    if (outcome) {
      this.stream.write(`${OUTCOME_SYMBOLS[outcome]} ${text ?? this.text}\n`);
    }
  }

  get isSpinning(): boolean {
    return this.spinning;
  }
}

class OraSpinner implements Spinner {
  private readonly instance: Ora;

  constructor(text: string, stream: NodeJS.WritableStream) {
    this.instance = ora({ text, stream, color: 'cyan' });
  }

  start(): void {
    this.instance.start();
  }

  setText(text: string): void {
    this.instance.text = text;
  }

  stop(outcome?: SpinnerOutcome, text?: string): void {
    if (outcome) {
      this.instance[outcome](text);
    } else {
      this.instance.stop();
    }
  }

  get isSpinning(): boolean {
    return this.instance.isSpinning;
  }
}

/**
 * Keeps at most one spinner alive
 */
export class SpinnerService {
  private readonly config: SpinnerServiceConfig;
  private active: Spinner | null = null;

  constructor(config: Partial<SpinnerServiceConfig> = {}) {
    this.config = {
      isTTY: config.isTTY ?? process.stdout.isTTY ?? false,
      quiet: config.quiet ?? false,
      stream: config.stream ?? process.stdout,
    };
  }

  /**
   * Start a spinner, or retitle the running one
   */
  show(text: string): void {
    if (this.active?.isSpinning) {
      this.active.setText(text);
      return;
    }
    this.active = this.create(text);
    this.active.start();
  }

  /**
   * Stop the running spinner, if any
   */
  settle(outcome?: SpinnerOutcome, text?: string): void {
    if (this.active?.isSpinning) {
      this.active.stop(outcome, text);
    }
    this.active = null;
  }

  get isSpinning(): boolean {
    return this.active?.isSpinning ?? false;
  }

  private create(text: string): Spinner {
    if (this.config.quiet) {
      return new NullSpinner();
    }
    return this.config.isTTY ? new OraSpinner(text, this.config.stream) : new LineSpinner(text, this.config.stream);
  }
}

export function createSpinnerService(config?: Partial<SpinnerServiceConfig>): SpinnerService {
  return new SpinnerService(config);
}
