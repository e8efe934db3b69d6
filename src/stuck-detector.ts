/**
 * @fileoverview Stuck-session detection
 *
 * Recomputed from the authoritative `lastActivityAt` on every render tick,
 * with no timers or counters of its own.
 *
 * @module stuck-detector
 */

import type { SessionSnapshot } from './types.js';

export interface StuckStatus {
  /** idle >= threshold and the session has not ended */
  stuck: boolean;
  /** Milliseconds since the last recorded activity (never negative) */
  idleMs: number;
  /** Stuck for at least the critical threshold */
  critical: boolean;
}

/**
 * Decide whether a session looks stuck.
 *
 * The threshold is inclusive: a session idle for exactly `thresholdMs` is stuck.
 *
 * @param snapshot - Session snapshot (only `lastActivityAt` and `terminal` are read)
 * @param now - Current clock reading
 * @param thresholdMs - Idle time before the session counts as stuck
 * @param criticalThresholdMs - Idle time before a stuck session counts as critical
 */
export function detectStuck(
  snapshot: Pick<SessionSnapshot, 'lastActivityAt' | 'terminal'>,
  now: number,
  thresholdMs: number,
  criticalThresholdMs: number = Number.POSITIVE_INFINITY
): StuckStatus {
  const idleMs = Math.max(0, now - snapshot.lastActivityAt);
  const stuck = idleMs >= thresholdMs && !snapshot.terminal;
  return {
    stuck,
    idleMs,
    critical: stuck && idleMs >= criticalThresholdMs,
  };
}
