/**
 * Result watcher contract
 * Observes the logs directory and reports file creations through a callback
 */

export interface ResultWatcher {
  /**
   * Begin watching. Resolves once the watcher is ready; rejects with WatcherError.
   */
  start(): Promise<void>;

  /**
   * Stop watching, waiting a bounded time for the underlying watcher to close
   */
  stop(): Promise<void>;

  readonly isRunning: boolean;
}

export interface ResultWatcherOptions {
  /** Directory to watch (not recursive) */
  directory: string;
  onFileAdded: (path: string) => void;
  onError: (error: Error) => void;
}

export type ResultWatcherFactory = (options: ResultWatcherOptions) => ResultWatcher;
