/**
 * Single-shot deadline for the Worker result.
 * Arming again replaces the previous deadline; each arm gets a new wait id.
 */

import type { Clock, TimerHandle } from '../types/clock';

export class ResultTimeoutSupervisor {
  private timer: TimerHandle | null = null;
  private waitId = 0;

  constructor(private readonly clock: Clock) {}

  /**
   * Arm the deadline. `onFire` receives the wait id this arm returned.
   */
  arm(timeoutMs: number, onFire: (waitId: number) => void): number {
    this.cancel();
    const id = ++this.waitId;
    this.timer = this.clock.schedule(timeoutMs, () => {
      this.timer = null;
      onFire(id);
    });
    return id;
  }

  cancel(): void {
    this.timer?.cancel();
    this.timer = null;
  }

  get armed(): boolean {
    return this.timer !== null;
  }

  /** Id of the most recent arm */
  get currentWaitId(): number {
    return this.waitId;
  }
}
