/**
 * Capacity-1 hand-off channel between a backend job and the caller awaiting it.
 * One channel per dispatch; once closed it never delivers again.
 */

import type { Clock, TimerHandle } from '../types/clock';

export type ChannelReceive<T> =
  | { kind: 'value'; value: T }
  | { kind: 'timeout' }
  | { kind: 'closed' };

export class SyncChannel<T> {
  private buffered: { value: T } | null = null;
  private closed = false;
  private waiter: ((received: ChannelReceive<T>) => void) | null = null;
  private timer: TimerHandle | null = null;

  constructor(private readonly clock: Clock) {}

  /**
   * Offer a value. Returns false when the channel is closed or already holds one.
   */
  offer(value: T): boolean {
    if (this.closed || this.buffered !== null) {
      return false;
    }
    if (this.waiter) {
      this.settle({ kind: 'value', value });
      // The consumer has its value; nothing else may be delivered
      this.closed = true;
      return true;
    }
    this.buffered = { value };
    return true;
  }

  /**
   * Wait up to `timeoutMs` for a value. Only one receive may be pending.
   */
  receive(timeoutMs: number): Promise<ChannelReceive<T>> {
    if (this.waiter) {
      throw new Error('SyncChannel already has a pending receive');
    }
    if (this.buffered !== null) {
      const { value } = this.buffered;
      this.buffered = null;
      this.closed = true;
      return Promise.resolve({ kind: 'value', value });
    }
    if (this.closed) {
      return Promise.resolve({ kind: 'closed' });
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
      this.timer = this.clock.schedule(timeoutMs, () => {
        this.timer = null;
        this.settle({ kind: 'timeout' });
      });
    });
  }

  /**
   * Close the channel. A pending receive resolves as closed; later offers are dropped.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.buffered = null;
    this.settle({ kind: 'closed' });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private settle(received: ChannelReceive<T>): void {
    this.timer?.cancel();
    this.timer = null;
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.(received);
  }
}
