/**
 * Result watcher backed by chokidar
 */

import { watch } from 'chokidar';
import type { FSWatcher } from 'chokidar';
import type { Clock } from '../types/clock';
import type { EffectiveConfig } from '../types/effective-config';
import { WatcherError } from '../types/errors';
import type { Logger } from '../types/logger';
import type { ResultWatcher, ResultWatcherFactory, ResultWatcherOptions } from '../types/result-watcher';

export interface ChokidarWatcherSettings {
  debounceMs: number;
  usePolling: boolean;
  /** Bounded wait for close() */
  stopTimeoutMs: number;
}

export class ChokidarResultWatcher implements ResultWatcher {
  private watcher: FSWatcher | null = null;

  constructor(
    private readonly options: ResultWatcherOptions,
    private readonly settings: ChokidarWatcherSettings,
    private readonly logger: Logger,
    private readonly clock: Clock
  ) {}

  get isRunning(): boolean {
    return this.watcher !== null;
  }

  async start(): Promise<void> {
    if (this.watcher) {
      return;
    }

    const watcher = watch(this.options.directory, {
      depth: 0,
      persistent: true,
      ignoreInitial: true,
      usePolling: this.settings.usePolling,
      interval: 100,
      awaitWriteFinish:
        this.settings.debounceMs > 0
          ? { stabilityThreshold: this.settings.debounceMs, pollInterval: Math.min(100, this.settings.debounceMs) }
          : false,
    });
    this.watcher = watcher;

    try {
      await new Promise<void>((resolve, reject) => {
        watcher.once('ready', () => resolve());
        watcher.once('error', (error: unknown) => reject(error));
      });
    } catch (error) {
      this.watcher = null;
      await watcher.close().catch((closeError: unknown) => {
        this.logger.debug(`Closing a watcher that failed to start also failed: ${String(closeError)}`);
      });
      const detail = error instanceof Error ? error.message : String(error);
      throw new WatcherError(`Failed to watch ${this.options.directory}: ${detail}`, { cause: error });
    }

    watcher.on('add', (path: string) => this.options.onFileAdded(path));
    watcher.on('error', (error: unknown) => {
      this.options.onError(error instanceof Error ? error : new Error(String(error)));
    });

    this.logger.event('watcher_started', `Watching ${this.options.directory}`, {
      polling: this.settings.usePolling,
    });
  }

  async stop(): Promise<void> {
    const watcher = this.watcher;
    if (!watcher) {
      return;
    }
    this.watcher = null;
    watcher.removeAllListeners('add');

    let expire: () => void = () => undefined;
    const deadline = new Promise<'timeout'>((resolve) => {
      expire = () => resolve('timeout');
    });
    const timer = this.clock.schedule(this.settings.stopTimeoutMs, () => expire());

    const closed = watcher.close().then(
      () => 'closed' as const,
      (error: unknown) => {
        const detail = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Error while closing watcher: ${detail}`);
        return 'closed' as const;
      }
    );

    const outcome = await Promise.race([closed, deadline]);
    timer.cancel();

    if (outcome === 'timeout') {
      this.logger.warn(`Watcher on ${this.options.directory} did not close within ${this.settings.stopTimeoutMs}ms`);
    }
    this.logger.event('watcher_stopped', `Stopped watching ${this.options.directory}`);
  }
}

export function createChokidarWatcherFactory(
  config: EffectiveConfig,
  logger: Logger,
  clock: Clock
): ResultWatcherFactory {
  const settings: ChokidarWatcherSettings = {
    debounceMs: config.watcher.debounceMs,
    usePolling: config.watcher.usePolling,
    stopTimeoutMs: config.timeouts.watcherStopMs,
  };
  return (options) => new ChokidarResultWatcher(options, settings, logger, clock);
}
