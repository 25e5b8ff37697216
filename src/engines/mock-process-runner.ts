/**
 * ProcessRunner stand-in for tests: returns canned results without spawning
 */

import type { ProcessRunner, SpawnOptions, SpawnResult } from '../types/process-runner';

export interface MockProcessConfig {
  exitCode?: number;
  stdout?: string;
  stderrLines?: string[];
  interrupted?: boolean;
  signal?: string;
  /** Reject as if the executable could not be started */
  throwError?: Error;
}

export interface RecordedSpawn {
  command: string;
  options: SpawnOptions;
}

export class MockProcessRunner implements ProcessRunner {
  private readonly queue: MockProcessConfig[] = [];
  private readonly callHistory: RecordedSpawn[] = [];

  constructor(private readonly defaultConfig: MockProcessConfig = {}) {}

  /**
   * Queue results for the next spawns, in order; the default applies afterwards
   */
  enqueue(...configs: MockProcessConfig[]): void {
    this.queue.push(...configs);
  }

  async spawn(command: string, options: SpawnOptions): Promise<SpawnResult> {
    this.callHistory.push({ command, options });
    const config = { ...this.defaultConfig, ...this.queue.shift() };
    if (config.throwError) {
      throw config.throwError;
    }
    return {
      exitCode: config.exitCode ?? 0,
      durationMs: 1,
      stdout: config.stdout ?? '',
      stderrTail: config.stderrLines ?? [],
      interrupted: config.interrupted ?? false,
      signal: config.signal,
    };
  }

  getCallHistory(): RecordedSpawn[] {
    return [...this.callHistory];
  }
}

export function createMockProcessRunner(defaultConfig?: MockProcessConfig): MockProcessRunner {
  return new MockProcessRunner(defaultConfig);
}
