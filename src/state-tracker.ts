/**
 * @fileoverview Session state tracker
 *
 * Owns the single {@link SessionState} record and applies decoded host
 * events to it. Readers never touch the live record: {@link StateTracker.snapshot}
 * hands out a frozen deep copy.
 *
 * `apply()` is synchronous and never awaits, so on Node's single thread an
 * event is always applied as a whole; a snapshot taken from any callback or
 * timer sees the state either before or after an event, never in between.
 *
 * ## Terminal state
 *
 * After `session:end` or `session:error` the record is frozen. Every event
 * except `session:start` is rejected until a new session begins.
 *
 * @module state-tracker
 */

import { EventEmitter } from 'node:events';
import { systemClock, type Clock } from './clock.js';
import type {
  SessionSnapshot,
  SessionState,
  TrackerEvent,
  TrackerEventKind,
} from './types.js';

/**
 * Events emitted by {@link StateTracker}.
 */
export interface StateTrackerEvents {
  /** Event changed the state */
  eventApplied: (kind: TrackerEventKind, snapshot: SessionSnapshot) => void;
  /** Event was refused (terminal state or unknown kind) */
  eventRejected: (kind: string, reason: string) => void;
  /** Debug log message */
  log: (message: string) => void;
}

function initialState(now: number): SessionState {
  return {
    activity: 'idle',
    toolName: undefined,
    delegateName: undefined,
    delegates: [],
    tokensIn: 0,
    tokensOut: 0,
    turnCount: 0,
    sessionId: undefined,
    errorMessage: undefined,
    sessionStart: now,
    lastActivityAt: now,
    terminal: false,
  };
}

/**
 * Applies host lifecycle events to the session record.
 *
 * @example
 * ```typescript
 * const tracker = new StateTracker(clock);
 * tracker.apply({ kind: 'session:start' });
 * tracker.apply({ kind: 'tool:pre', toolName: 'bash' });
 * tracker.snapshot().activity; // 'executing'
 * ```
 */
export class StateTracker extends EventEmitter {
  private readonly clock: Clock;
  private state: SessionState;

  constructor(clock: Clock = systemClock) {
    super();
    this.clock = clock;
    this.state = initialState(clock.now());
  }

  /**
   * Apply one event.
   *
   * @returns true if the state changed, false if the event was rejected
   * @fires eventApplied
   * @fires eventRejected
   */
  apply(event: TrackerEvent): boolean {
    if (this.state.terminal && event.kind !== 'session:start') {
      this.emit('eventRejected', event.kind, 'session already ended');
      return false;
    }

    // Keep lastActivityAt >= sessionStart even if the clock steps backwards
    const now = Math.max(this.clock.now(), this.state.sessionStart);
    const s = this.state;

    switch (event.kind) {
      case 'session:start':
        this.state = initialState(this.clock.now());
        this.state.sessionId = event.sessionId;
        this.log(`Session started${event.sessionId ? `: ${event.sessionId}` : ''}`);
        this.emit('eventApplied', event.kind, this.snapshot());
        return true;
      case 'session:end':
        s.activity = 'done';
        s.terminal = true;
        break;
      case 'session:error':
        s.activity = 'errored';
        s.errorMessage = event.message;
        s.terminal = true;
        break;
      case 'llm:request':
        s.activity = 'thinking';
        s.toolName = undefined;
        s.tokensIn += event.tokensIn;
        break;
      case 'llm:response':
        s.tokensIn += event.tokensIn;
        s.tokensOut += event.tokensOut;
        break;
      case 'llm:stream':
        s.activity = 'streaming';
        break;
      case 'tool:pre':
        s.activity = 'executing';
        s.toolName = event.toolName;
        break;
      case 'tool:post':
        s.activity = 'thinking';
        s.toolName = undefined;
        break;
      case 'turn:start':
        break;
      case 'turn:end':
        s.turnCount += 1;
        s.activity = 'idle';
        s.toolName = undefined;
        break;
      case 'task:agent_spawned':
        s.delegates.push({ id: event.subSessionId, name: event.agentName });
        s.delegateName = event.agentName;
        break;
      case 'task:agent_complete':
        this.removeDelegate(event.subSessionId);
        break;
      default: {
        const unhandled: never = event;
        return this.rejectUnknown(unhandled);
      }
    }

    s.lastActivityAt = now;
    if (s.terminal) {
      this.log(`Session ${s.activity === 'done' ? 'ended' : 'failed'}`);
    }
    this.emit('eventApplied', event.kind, this.snapshot());
    return true;
  }

  /**
   * Deep, frozen copy of the current state.
   */
  snapshot(): SessionSnapshot {
    const s = this.state;
    return Object.freeze({
      ...s,
      delegates: Object.freeze(s.delegates.map((d) => Object.freeze({ ...d }))),
    });
  }

  /** Whether the current session has ended */
  get terminal(): boolean {
    return this.state.terminal;
  }

  /**
   * Drop a delegate by sub-session id, or the most recent one when no id
   * matches. The displayed name falls back to the newest remaining delegate.
   */
  private removeDelegate(subSessionId: string | undefined): void {
    const delegates = this.state.delegates;
    let index = -1;
    if (subSessionId !== undefined) {
      index = delegates.findIndex((d) => d.id === subSessionId);
    }
    if (index === -1) {
      index = delegates.length - 1;
    }
    if (index >= 0) {
      delegates.splice(index, 1);
    }
    this.state.delegateName = delegates.length > 0 ? delegates[delegates.length - 1].name : undefined;
  }

  private rejectUnknown(event: { kind: string }): boolean {
    const kind = String(event.kind);
    this.log(`Ignoring unknown event kind: ${kind}`);
    this.emit('eventRejected', kind, 'unknown event kind');
    return false;
  }

  private log(message: string): void {
    const timestamp = new Date().toISOString();
    this.emit('log', `[${timestamp}] [StateTracker] ${message}`);
  }
}
