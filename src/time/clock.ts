/**
 * Game Clocks
 * Monotonic time sources in seconds
 */

import { performance } from 'perf_hooks';

export interface Clock {
  /** Current time in seconds. Never decreases. */
  now(): number;
}

/**
 * Host monotonic timer.
 */
export class SystemClock implements Clock {
  now(): number {
    return performance.now() / 1000;
  }
}

/**
 * Logical gameplay clock derived from a source clock. While paused it stands
 * still, and the paused span is never counted afterwards, so every timer
 * compared against it (animation frames, attack and hurt windows, fades)
 * freezes together.
 */
export class PausableClock implements Clock {
  private source: Clock;
  private pausedAt: number | null = null;
  private pausedTotal = 0;

  constructor(source: Clock) {
    this.source = source;
  }

  now(): number {
    const sourceNow = this.pausedAt ?? this.source.now();
    return sourceNow - this.pausedTotal;
  }

  isPaused(): boolean {
    return this.pausedAt !== null;
  }

  setPaused(paused: boolean): void {
    if (paused) {
      if (this.pausedAt === null) {
        this.pausedAt = this.source.now();
      }
      return;
    }

    if (this.pausedAt !== null) {
      this.pausedTotal += this.source.now() - this.pausedAt;
      this.pausedAt = null;
    }
  }
}
