/**
 * @fileoverview Ctrl+C escalation state machine
 *
 * Each user interrupt is a "pulse". Pulses that land inside the same
 * 2-second window escalate:
 *
 * ```
 *            pulse              pulse (< 2s)          pulse (< 2s)
 * NORMAL ───────────► CANCEL ───────────────► ABORT ───────────────► EMERGENCY
 *    ▲                  │                       │                        │
 *    └──── window ──────┴───────────────────────┘                        │
 *          expires (>= 2s)                                               │
 *    └─────────────────────── consumeEmergency() ────────────────────────┘
 * ```
 *
 * The window is measured from its first pulse. A pulse exactly
 * {@link ESCALATION_WINDOW_MS} after the window start opens a new window.
 *
 * Expiry is computed on read: {@link EscalationStateMachine.peek} reports
 * `normal` for an expired window without mutating anything, and the next
 * pulse commits the reset.
 *
 * @module escalation
 */

import { EventEmitter } from 'node:events';
import { systemClock, type Clock } from './clock.js';
import {
  ABORT_PRESS_COUNT,
  EMERGENCY_PRESS_COUNT,
  ESCALATION_WINDOW_MS,
} from './config/limits.js';
import type { EscalationLevel, EscalationStatus } from './types.js';

export interface EscalationEvents {
  /** A pulse changed the level */
  escalated: (level: EscalationLevel, pressCount: number) => void;
  /** Debug log message */
  log: (message: string) => void;
}

/** Help text shown by the CLI `shortcuts` command */
export const KEYBOARD_SHORTCUTS = `
Session Control Shortcuts (works on macOS, Linux, Windows):
───────────────────────────────────────────────────────────
Ctrl+C      Cancel current operation (1st press)
Ctrl+C ×2   Abort current turn (within 2 seconds)
Ctrl+C ×3   Emergency exit (within 2 seconds)
`;

/**
 * Tracks repeated interrupt pulses and maps them to an escalation level.
 *
 * @example
 * ```typescript
 * const machine = new EscalationStateMachine(clock);
 * machine.on('escalated', (level) => {
 *   if (level === 'emergency' && machine.consumeEmergency()) process.exit(130);
 * });
 * process.on('SIGINT', () => machine.pulse());
 * ```
 */
export class EscalationStateMachine extends EventEmitter {
  private readonly clock: Clock;
  private readonly windowMs: number;
  private level: EscalationLevel = 'normal';
  private pressCount = 0;
  private windowStart: number | null = null;

  constructor(clock: Clock = systemClock, windowMs: number = ESCALATION_WINDOW_MS) {
    super();
    this.clock = clock;
    this.windowMs = windowMs;
  }

  /**
   * Register one interrupt press.
   *
   * @returns The level after the pulse
   * @fires escalated
   */
  pulse(): EscalationLevel {
    const now = this.clock.now();

    if (this.level === 'emergency') {
      this.log('Pulse ignored: emergency already pending');
      return this.level;
    }

    if (this.pressCount === 0 || !this.withinWindow(now)) {
      this.windowStart = now;
      this.pressCount = 1;
      this.level = 'cancel';
    } else {
      this.pressCount += 1;
      if (this.pressCount === ABORT_PRESS_COUNT) {
        this.level = 'abort';
      } else if (this.pressCount === EMERGENCY_PRESS_COUNT) {
        this.level = 'emergency';
      }
    }

    const level = this.level;
    this.log(`Pulse ${this.pressCount} → ${level}`);
    // Listeners may consume an emergency; report the level this pulse reached
    this.emit('escalated', level, this.pressCount);
    return level;
  }

  /**
   * Effective status at `now`. Never changes the machine.
   */
  peek(now: number = this.clock.now()): EscalationStatus {
    if (this.pressCount === 0 || (this.level !== 'emergency' && !this.withinWindow(now))) {
      return { level: 'normal', pressCount: 0, windowStart: null };
    }
    return { level: this.level, pressCount: this.pressCount, windowStart: this.windowStart };
  }

  /**
   * Take a pending emergency. The owner calls this right before exiting so the
   * same emergency is never acted on twice.
   *
   * @returns true if an emergency was pending
   */
  consumeEmergency(): boolean {
    if (this.level !== 'emergency') {
      return false;
    }
    this.log('Emergency consumed');
    this.reset();
    return true;
  }

  /** Back to NORMAL with no open window */
  reset(): void {
    this.level = 'normal';
    this.pressCount = 0;
    this.windowStart = null;
  }

  /**
   * A stale or invalid clock reading (earlier than the window start, NaN)
   * counts as outside the window.
   */
  private withinWindow(now: number): boolean {
    if (this.windowStart === null) return false;
    const elapsed = now - this.windowStart;
    return Number.isFinite(elapsed) && elapsed >= 0 && elapsed < this.windowMs;
  }

  private log(message: string): void {
    const timestamp = new Date().toISOString();
    this.emit('log', `[${timestamp}] [Escalation] ${message}`);
  }
}
