/**
 * Backend Call Dispatcher
 *
 * Runs one Manager call at a time off the engine's event handler and hands the
 * outcome back through a fresh SyncChannel. A call that outlives its deadline
 * is abandoned, not cancelled: the in-flight guard stays held until it settles.
 */

import type { Clock } from '../types/clock';
import type { Logger } from '../types/logger';
import { SyncChannel } from './sync-channel';

export type DispatchOutcome<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'failed'; error: unknown }
  | { kind: 'timeout' }
  | { kind: 'busy' };

type JobSettlement<T> = { kind: 'ok'; value: T } | { kind: 'failed'; error: unknown };

export class BackendCallDispatcher {
  private inFlight: Promise<void> | null = null;

  constructor(
    private readonly clock: Clock,
    private readonly logger: Logger
  ) {}

  get busy(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Start `job` and wait up to `timeoutMs` for it.
   * Returns `busy` without running anything when a call is already in flight.
   */
  dispatch<T>(job: () => Promise<T>, timeoutMs: number): Promise<DispatchOutcome<T>> {
    if (this.inFlight) {
      return Promise.resolve({ kind: 'busy' });
    }

    const channel = new SyncChannel<JobSettlement<T>>(this.clock);
    // Registered before the job starts so a deadline is always armed
    const received = channel.receive(timeoutMs);

    let settled = false;
    const run = async (): Promise<void> => {
      try {
        const value = await job();
        if (!channel.offer({ kind: 'ok', value })) {
          this.logger.debug('Backend call finished after its deadline; result discarded');
        }
      } catch (error) {
        if (!channel.offer({ kind: 'failed', error })) {
          const detail = error instanceof Error ? error.message : String(error);
          this.logger.debug(`Abandoned backend call failed: ${detail}`);
        }
      } finally {
        settled = true;
        this.inFlight = null;
      }
    };
    const running = run();
    // A job that throws synchronously has already settled here
    if (!settled) {
      this.inFlight = running;
    }

    return received.then((outcome): DispatchOutcome<T> => {
      channel.close();
      switch (outcome.kind) {
        case 'value':
          return outcome.value;
        case 'timeout':
          return { kind: 'timeout' };
        case 'closed':
          return { kind: 'failed', error: new Error('Backend call channel closed') };
      }
    });
  }

  /**
   * Wait up to `maxWaitMs` for the in-flight call, if any, to settle.
   * Returns true when nothing is in flight afterwards.
   */
  async whenIdle(maxWaitMs: number): Promise<boolean> {
    const pending = this.inFlight;
    if (!pending) {
      return true;
    }
    let expire: () => void = () => undefined;
    const deadline = new Promise<void>((resolve) => {
      expire = resolve;
    });
    const timer = this.clock.schedule(maxWaitMs, () => expire());
    await Promise.race([pending, deadline]);
    timer.cancel();
    return this.inFlight === null;
  }
}
