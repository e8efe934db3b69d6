/**
 * @fileoverview Periodic status line render loop
 *
 * One `setTimeout` chain drives all rendering, so there is never more than
 * one tick in flight. Each tick:
 *
 * 1. takes a tracker snapshot
 * 2. derives stuck status and reads (never changes) the escalation level
 * 3. renders the line
 * 4. writes it only if it differs from the last written line
 * 5. advances the spinner tick
 *
 * When the snapshot is terminal, the tick writes the final line, releases
 * the writer and schedules nothing further.
 *
 * ## Events
 *
 * - `rendered`: a line was written
 * - `writeError`: first write failure since the last successful write
 * - `stopped`: loop ended (terminal state or stop())
 * - `log`: debug messages
 *
 * @module render-loop
 */

import { EventEmitter } from 'node:events';
import { systemClock, type Clock } from './clock.js';
import type { EscalationStateMachine } from './escalation.js';
import { renderStatusLine, type DisplayOptions } from './renderer.js';
import type { StateTracker } from './state-tracker.js';
import { detectStuck } from './stuck-detector.js';
import type { LineWriter } from './terminal.js';
import { getErrorMessage, type RenderSnapshot } from './types.js';

export interface RenderLoopOptions {
  /** Tick period */
  intervalMs: number;
  stuckThresholdMs: number;
  criticalThresholdMs: number;
  display: DisplayOptions;
}

export interface RenderLoopEvents {
  rendered: (line: string) => void;
  writeError: (error: unknown) => void;
  stopped: () => void;
  log: (message: string) => void;
}

export class RenderLoop extends EventEmitter {
  private readonly tracker: StateTracker;
  private readonly escalation: EscalationStateMachine;
  private readonly writer: LineWriter;
  private readonly clock: Clock;
  private readonly options: RenderLoopOptions;

  private timer: NodeJS.Timeout | null = null;
  private _running = false;
  private _tickCount = 0;
  private previousLine: string | null = null;
  /** Set after a logged write failure; cleared by the next successful write */
  private writeFailureLogged = false;

  constructor(
    tracker: StateTracker,
    escalation: EscalationStateMachine,
    writer: LineWriter,
    options: RenderLoopOptions,
    clock: Clock = systemClock
  ) {
    super();
    this.tracker = tracker;
    this.escalation = escalation;
    this.writer = writer;
    this.options = options;
    this.clock = clock;
  }

  get running(): boolean {
    return this._running;
  }

  /** Number of ticks rendered since start() */
  get tickCount(): number {
    return this._tickCount;
  }

  /** Last line successfully written */
  get lastLine(): string | null {
    return this.previousLine;
  }

  /**
   * Start rendering. The first tick runs immediately.
   * No-op if already running.
   */
  start(): void {
    if (this._running) return;
    this._running = true;
    this._tickCount = 0;
    this.previousLine = null;
    this.writeFailureLogged = false;
    this.log(`Render loop started (${this.options.intervalMs}ms interval)`);
    this.tick();
  }

  /**
   * Stop without a final render. Safe to call multiple times.
   *
   * @fires stopped
   */
  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (!this._running) return;
    this._running = false;
    this.log('Render loop stopped');
    this.emit('stopped');
  }

  private tick(): void {
    this.timer = null;
    if (!this._running) return;

    const now = this.clock.now();
    const snapshot = this.tracker.snapshot();
    const stuck = detectStuck(
      snapshot,
      now,
      this.options.stuckThresholdMs,
      this.options.criticalThresholdMs
    );
    // Elapsed time freezes at the last recorded activity once the session ends
    const elapsedUntil = snapshot.terminal ? snapshot.lastActivityAt : now;
    const view: RenderSnapshot = {
      ...snapshot,
      idleMs: stuck.idleMs,
      elapsedMs: Math.max(0, elapsedUntil - snapshot.sessionStart),
      escalation: this.escalation.peek(now).level,
    };

    const line = renderStatusLine(view, stuck, this.options.display, this._tickCount);
    this._tickCount++;

    if (line !== this.previousLine) {
      this.write(line);
    }

    if (snapshot.terminal) {
      this.finish();
      return;
    }

    this.timer = setTimeout(() => this.tick(), this.options.intervalMs);
  }

  private write(line: string): void {
    try {
      this.writer.update(line);
      this.previousLine = line;
      this.writeFailureLogged = false;
      this.emit('rendered', line);
    } catch (err) {
      // Keep previousLine so the next tick retries the write
      if (!this.writeFailureLogged) {
        this.writeFailureLogged = true;
        this.log(`Write failed: ${getErrorMessage(err)}`);
        this.emit('writeError', err);
      }
    }
  }

  private finish(): void {
    this._running = false;
    try {
      this.writer.finish();
    } catch (err) {
      this.log(`Failed to release status line: ${getErrorMessage(err)}`);
    }
    this.log('Session ended, render loop finished');
    this.emit('stopped');
  }

  private log(message: string): void {
    const timestamp = new Date().toISOString();
    this.emit('log', `[${timestamp}] [RenderLoop] ${message}`);
  }
}
