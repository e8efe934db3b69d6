/**
 * @fileoverview Session indicator hook
 *
 * The piece a host mounts. It subscribes to session lifecycle events and
 * keeps a live status line showing spinner, activity, token usage, elapsed
 * time and a stuck warning:
 *
 * ```
 * host events ──► EventIngestor ──► StateTracker ◄── RenderLoop ──► StatusLine
 *                                                        ▲
 * SIGINT ──► InterruptSource ──► EscalationStateMachine ─┘
 *                                        │
 *                                        └──► onCancel / onAbort / onExit
 * ```
 *
 * Nothing here throws into the host. A broken terminal, a malformed payload
 * or a failing callback is logged and the session carries on.
 *
 * @module session-indicator
 */

import { EventEmitter } from 'node:events';
import chalk from 'chalk';
import { systemClock, type Clock } from './clock.js';
import {
  resolveIndicatorConfig,
  type ResolvedIndicatorConfig,
} from './config/indicator-config.js';
import { EMERGENCY_EXIT_CODE } from './config/limits.js';
import { EscalationStateMachine } from './escalation.js';
import { EventIngestor } from './event-ingestor.js';
import { InterruptSource, type SignalTarget } from './interrupt-source.js';
import { RenderLoop } from './render-loop.js';
import { SPINNERS } from './spinner.js';
import { StateTracker } from './state-tracker.js';
import {
  StatusLine,
  supportsStatusLine,
  type LineWriter,
  type TerminalStream,
} from './terminal.js';
import {
  getErrorMessage,
  type EscalationLevel,
  type SessionSnapshot,
} from './types.js';

/** Events the hook subscribes to on the host bus */
export const SUBSCRIBED_EVENTS = [
  'session:start',
  'session:end',
  'session:error',
  'llm:request',
  'llm:response',
  'llm:stream_start',
  'llm:stream_chunk',
  'llm:stream_end',
  'tool:pre',
  'tool:post',
  'turn:start',
  'turn:end',
  'task:agent_spawned',
  'task:agent_complete',
] as const;

export type SubscribedEvent = (typeof SUBSCRIBED_EVENTS)[number];

/** Hints printed when there is no status line to show the escalation */
const ESCALATION_HINTS: Record<Exclude<EscalationLevel, 'normal'>, string> = {
  cancel: 'Canceling current operation... (press again to abort turn)',
  abort: 'Aborting turn... (press again to exit)',
  emergency: 'Emergency exit!',
};

export interface EscalationHandlers {
  /** First Ctrl+C: cancel the current tool/operation */
  onCancel?: () => void;
  /** Second Ctrl+C within the window: abort the current turn */
  onAbort?: () => void;
  /** Third Ctrl+C within the window. Defaults to exiting with code 130. */
  onExit?: () => void;
}

export interface SessionIndicatorOptions extends EscalationHandlers {
  clock?: Clock;
  /** Status output stream (default: process.stderr) */
  stream?: TerminalStream;
  /** Replaces the StatusLine built on `stream` */
  writer?: LineWriter;
  env?: NodeJS.ProcessEnv;
  /** SIGINT source when `handle_interrupts` is on (default: process) */
  signalTarget?: SignalTarget;
}

/** Host side of `mount()` */
export interface HookCoordinator {
  registerHook(hook: SessionIndicator): void;
}

/**
 * Displays real-time session activity in the terminal.
 *
 * @example
 * ```typescript
 * const indicator = new SessionIndicator({ stuck_threshold: 30 });
 * for (const type of indicator.subscribedEvents) {
 *   bus.on(type, (payload) => indicator.onEvent(type, payload));
 * }
 * ```
 */
export class SessionIndicator extends EventEmitter {
  readonly config: ResolvedIndicatorConfig;
  readonly tracker: StateTracker;
  readonly escalation: EscalationStateMachine;

  private readonly ingestor: EventIngestor;
  private readonly loop: RenderLoop | null;
  private readonly writer: LineWriter | null;
  private readonly interrupts: InterruptSource | null;
  private readonly handlers: EscalationHandlers;
  private disposed = false;

  constructor(config: unknown = {}, options: SessionIndicatorOptions = {}) {
    super();
    const env = options.env ?? process.env;
    const stream = options.stream ?? process.stderr;
    const clock = options.clock ?? systemClock;

    this.config = resolveIndicatorConfig(config, env);
    this.handlers = {
      onCancel: options.onCancel,
      onAbort: options.onAbort,
      onExit: options.onExit,
    };

    this.tracker = new StateTracker(clock);
    this.escalation = new EscalationStateMachine(clock);
    this.ingestor = new EventIngestor(this.tracker);

    const canRender = this.config.statusEnabled
      && (options.writer !== undefined || supportsStatusLine(stream, env));
    if (canRender) {
      const writer = options.writer ?? new StatusLine(stream, {
        position: this.config.position,
        ansi: this.config.colorsEnabled,
      });
      this.writer = writer;
      this.loop = new RenderLoop(this.tracker, this.escalation, writer, {
        intervalMs: this.config.updateIntervalMs,
        stuckThresholdMs: this.config.stuckThresholdMs,
        criticalThresholdMs: this.config.criticalThresholdMs,
        display: {
          showTokens: this.config.showTokens,
          showElapsed: this.config.showElapsed,
          colorsEnabled: this.config.colorsEnabled,
          unstickHint: this.config.unstickHint,
          frames: SPINNERS[this.config.spinner],
        },
      }, clock);
      this.loop.on('log', (message: string) => this.debugLog(message));
      this.loop.on('writeError', (err: unknown) => {
        console.warn(`[session-indicator] Status line write failed: ${getErrorMessage(err)}`);
      });
      this.loop.on('stopped', () => this.emit('renderStopped'));
    } else {
      this.loop = null;
      this.writer = null;
    }

    this.tracker.on('log', (message: string) => this.debugLog(message));
    this.ingestor.on('log', (message: string) => this.debugLog(message));
    this.escalation.on('log', (message: string) => this.debugLog(message));

    this.tracker.on('eventApplied', (kind: string) => {
      if (kind === 'session:start') {
        // Each session starts with no open Ctrl+C window
        this.escalation.reset();
        this.startRendering();
      }
    });
    this.escalation.on('escalated', (level: EscalationLevel) => this.handleEscalation(level));

    if (this.config.handleInterrupts) {
      this.interrupts = new InterruptSource(this.escalation, options.signalTarget);
      this.interrupts.install();
    } else {
      this.interrupts = null;
    }
  }

  /** Event names to subscribe this hook to */
  get subscribedEvents(): readonly SubscribedEvent[] {
    return SUBSCRIBED_EVENTS;
  }

  /** Whether a status line will be drawn for sessions */
  get rendering(): boolean {
    return this.loop !== null;
  }

  /**
   * Host entry point. Never throws and never waits on terminal output.
   */
  onEvent(type: string, payload?: unknown): void {
    if (this.disposed) return;
    try {
      this.ingestor.ingest(type, payload);
    } catch (err) {
      this.debugLog(`Failed to ingest ${type}: ${getErrorMessage(err)}`);
    }
  }

  /**
   * Register one interrupt press without going through SIGINT,
   * e.g. from a raw-mode key handler.
   */
  interrupt(): EscalationLevel {
    return this.escalation.pulse();
  }

  snapshot(): SessionSnapshot {
    return this.tracker.snapshot();
  }

  /**
   * Stop rendering and release the SIGINT handler and the output stream.
   * Queued events are applied first so the final snapshot is complete.
   */
  dispose(): void {
    if (this.disposed) return;
    this.ingestor.flush();
    this.disposed = true;
    this.loop?.stop();
    this.writer?.release?.();
    this.interrupts?.uninstall();
  }

  private startRendering(): void {
    if (!this.loop || this.disposed) return;
    this.loop.start();
  }

  private handleEscalation(level: EscalationLevel): void {
    if (level === 'normal') return;
    if (!this.loop?.running) {
      console.error(`\n⚠ ${ESCALATION_HINTS[level]}`);
    }

    try {
      switch (level) {
        case 'cancel':
          this.handlers.onCancel?.();
          break;
        case 'abort':
          this.handlers.onAbort?.();
          break;
        case 'emergency':
          if (!this.escalation.consumeEmergency()) return;
          if (this.handlers.onExit) {
            this.handlers.onExit();
          } else {
            process.exit(EMERGENCY_EXIT_CODE);
          }
          break;
      }
    } catch (err) {
      console.warn(`[session-indicator] ${level} handler failed: ${getErrorMessage(err)}`);
    }
  }

  private debugLog(message: string): void {
    if (!this.config.debug) return;
    console.error(this.config.colorsEnabled ? chalk.gray(message) : message);
  }
}

/**
 * Module entry point: build the hook and register it with the host.
 *
 * @param coordinator - Host coordinator
 * @param config - Raw configuration (snake_case keys, seconds)
 */
export function mount(
  coordinator: HookCoordinator,
  config: unknown = {},
  options: SessionIndicatorOptions = {}
): SessionIndicator {
  const hook = new SessionIndicator(config ?? {}, options);
  coordinator.registerHook(hook);
  return hook;
}
