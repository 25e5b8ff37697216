/**
 * Clock interface
 * Abstracts time and timers so deadlines can be driven deterministically in tests
 */

/**
 * Handle for a scheduled callback
 */
export interface TimerHandle {
  /** Cancel the callback. No-op if it already fired or was cancelled. */
  cancel(): void;
}

export interface Clock {
  now(): Date;

  /** Current time as a Unix timestamp (milliseconds) */
  timestamp(): number;

  /** Current time as an ISO 8601 string */
  iso(): string;

  /**
   * Wait for a specified duration
   */
  delay(ms: number): Promise<void>;

  /**
   * Run a callback once after `ms` milliseconds
   */
  schedule(ms: number, callback: () => void): TimerHandle;
}

/**
 * Clock backed by the system time and Node timers
 */
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  timestamp(): number {
    return Date.now();
  }

  iso(): string {
    return new Date().toISOString();
  }

  delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  schedule(ms: number, callback: () => void): TimerHandle {
    const timer = setTimeout(callback, ms);
    return {
      cancel: () => clearTimeout(timer),
    };
  }
}

interface PendingTimer {
  id: number;
  time: number;
  callback: () => void;
}

/**
 * Manually driven clock for tests.
 * Nothing fires until `advance` or `setTime` moves time past a deadline.
 */
export class MockClock implements Clock {
  private currentTime: number;
  private pending: PendingTimer[] = [];
  private nextId = 1;

  constructor(initialTime?: Date) {
    this.currentTime = (initialTime ?? new Date('2025-01-01T00:00:00.000Z')).getTime();
  }

  now(): Date {
    return new Date(this.currentTime);
  }

  timestamp(): number {
    return this.currentTime;
  }

  iso(): string {
    return new Date(this.currentTime).toISOString();
  }

  delay(ms: number): Promise<void> {
    return new Promise((resolve) => {
      this.schedule(ms, resolve);
    });
  }

  schedule(ms: number, callback: () => void): TimerHandle {
    const timer: PendingTimer = { id: this.nextId++, time: this.currentTime + ms, callback };
    this.pending.push(timer);
    return {
      cancel: () => {
        this.pending = this.pending.filter((t) => t.id !== timer.id);
      },
    };
  }

  /**
   * Number of callbacks that have not fired or been cancelled
   */
  pendingCount(): number {
    return this.pending.length;
  }

  /**
   * Advance time and fire every callback that is now due, earliest first
   */
  advance(ms: number): void {
    this.setTime(new Date(this.currentTime + ms));
  }

  setTime(time: Date): void {
    this.currentTime = time.getTime();
    for (;;) {
      const due = this.pending
        .filter((t) => t.time <= this.currentTime)
        .sort((a, b) => a.time - b.time || a.id - b.id)[0];
      if (!due) {
        return;
      }
      this.pending = this.pending.filter((t) => t.id !== due.id);
      due.callback();
    }
  }
}
