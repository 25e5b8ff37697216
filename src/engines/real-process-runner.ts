/**
 * ProcessRunner backed by child_process.spawn
 */

import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';
import type { ProcessRunner, SpawnOptions, SpawnResult } from '../types/process-runner';

/**
 * Keeps the last N complete lines of a stream
 */
class TailBuffer {
  private lines: string[] = [];
  private partial = '';

  constructor(private readonly maxLines: number) {}

  append(data: string): void {
    const parts = (this.partial + data).split('\n');
    this.partial = parts.pop() ?? '';
    this.lines.push(...parts);
    if (this.lines.length > this.maxLines) {
      this.lines = this.lines.slice(-this.maxLines);
    }
  }

  getLines(): string[] {
    return this.partial ? [...this.lines, this.partial] : [...this.lines];
  }
}

export class RealProcessRunner implements ProcessRunner {
  private running = new Set<ChildProcess>();

  spawn(command: string, options: SpawnOptions): Promise<SpawnResult> {
    const startTime = Date.now();
    const stderrTail = new TailBuffer(options.tailLines ?? 50);
    const stdoutChunks: Buffer[] = [];

    return new Promise((resolve, reject) => {
      const child = spawn(command, options.args, {
        cwd: options.cwd,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        // The Manager CLIs read the prompt from argv; an open stdin makes some of them wait
        stdio: ['ignore', 'pipe', 'pipe'],
        shell: false,
      });
      this.running.add(child);

      child.stdout?.on('data', (data: Buffer) => {
        stdoutChunks.push(data);
      });
      child.stderr?.on('data', (data: Buffer) => {
        stderrTail.append(data.toString());
      });

      child.on('close', (code, sig) => {
        this.running.delete(child);
        const interrupted = sig !== null;
        resolve({
          exitCode: code ?? (interrupted ? 130 : 1),
          durationMs: Date.now() - startTime,
          stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
          stderrTail: stderrTail.getLines(),
          interrupted,
          signal: sig ?? undefined,
        });
      });

      child.on('error', (error) => {
        this.running.delete(child);
        reject(error);
      });
    });
  }

  killAll(signal: NodeJS.Signals = 'SIGTERM'): void {
    for (const child of this.running) {
      child.kill(signal);
    }
    this.running.clear();
  }
}

export function createRealProcessRunner(): ProcessRunner {
  return new RealProcessRunner();
}
