/**
 * @fileoverview Time sources for the session indicator.
 *
 * Every timing decision (idle detection, escalation windows, elapsed time)
 * reads from a {@link Clock} so tests can drive time by hand.
 *
 * @module clock
 */

import { performance } from 'node:perf_hooks';

/**
 * Millisecond time source. Values only need to be monotonic relative to
 * each other; they are never shown as wall-clock dates.
 */
export interface Clock {
  now(): number;
}

/**
 * Monotonic clock backed by `performance.now()`.
 * Unaffected by system clock adjustments.
 */
export class SystemClock implements Clock {
  now(): number {
    return performance.now();
  }
}

/**
 * Clock that only moves when told to.
 *
 * @example
 * ```typescript
 * const clock = new ManualClock();
 * machine.pulse();
 * clock.advance(2500);
 * machine.peek().level; // 'normal'
 * ```
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start: number = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  /** Move time forward (or backward, for stale-clock tests) */
  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}

/** Shared default clock */
export const systemClock: Clock = new SystemClock();
