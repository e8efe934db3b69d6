/**
 * @fileoverview Core type definitions for session-indicator
 *
 * This module contains the shared types used across the indicator:
 *
 * - {@link Activity} - What the monitored session is doing right now
 * - {@link SessionState} - The single mutable record owned by the StateTracker
 * - {@link SessionSnapshot} - Frozen copy handed to readers
 * - {@link TrackerEvent} - Decoded host lifecycle events
 * - {@link EscalationLevel} - Ctrl+C escalation levels
 *
 * @module types
 */

// ========== Session Types ==========

/**
 * Activity of the monitored session.
 *
 * - `idle`: Waiting for user input (between turns)
 * - `thinking`: LLM request in flight
 * - `executing`: A tool is running
 * - `streaming`: Response is streaming back
 * - `done`: Session ended normally (terminal)
 * - `errored`: Session ended with an error (terminal)
 */
export type Activity = 'idle' | 'thinking' | 'executing' | 'streaming' | 'done' | 'errored';

/** A sub-agent that control has been handed to */
export interface Delegate {
  /** Sub-session id, when the host provides one */
  id?: string;
  /** Agent name shown in the status line */
  name: string;
}

/**
 * Mutable session record. Only the StateTracker writes to it.
 *
 * All timestamps are milliseconds from the tracker's {@link Clock}.
 */
export interface SessionState {
  activity: Activity;
  /** Tool being executed (set while activity is 'executing') */
  toolName?: string;
  /** Most recent still-active sub-agent */
  delegateName?: string;
  /** All active sub-agents, oldest first */
  delegates: Delegate[];
  tokensIn: number;
  tokensOut: number;
  turnCount: number;
  /** Host session id from session:start */
  sessionId?: string;
  /** Error message from session:error, truncated */
  errorMessage?: string;
  sessionStart: number;
  lastActivityAt: number;
  /** True after session:end or session:error; only session:start clears it */
  terminal: boolean;
}

/** Immutable, isolated copy of {@link SessionState} */
export type SessionSnapshot = Readonly<Omit<SessionState, 'delegates'>> & {
  readonly delegates: ReadonlyArray<Readonly<Delegate>>;
};

// ========== Escalation Types ==========

/**
 * Ctrl+C escalation level.
 *
 * ```
 * normal → cancel → abort → emergency
 * ```
 */
export type EscalationLevel = 'normal' | 'cancel' | 'abort' | 'emergency';

/** Read-only view of the escalation state machine */
export interface EscalationStatus {
  level: EscalationLevel;
  pressCount: number;
  /** Start of the current escalation window, null when no window is open */
  windowStart: number | null;
}

// ========== Render Types ==========

/** Snapshot plus the values derived for a single render tick */
export type RenderSnapshot = SessionSnapshot & {
  readonly idleMs: number;
  readonly elapsedMs: number;
  readonly escalation: EscalationLevel;
};

// ========== Event Types ==========

/** Host lifecycle events after payload decoding */
export type TrackerEvent =
  | { kind: 'session:start'; sessionId?: string }
  | { kind: 'session:end' }
  | { kind: 'session:error'; message?: string }
  | { kind: 'llm:request'; tokensIn: number }
  | { kind: 'llm:response'; tokensIn: number; tokensOut: number }
  | { kind: 'llm:stream'; phase: string }
  | { kind: 'tool:pre'; toolName: string }
  | { kind: 'tool:post' }
  | { kind: 'turn:start' }
  | { kind: 'turn:end' }
  | { kind: 'task:agent_spawned'; agentName: string; subSessionId?: string }
  | { kind: 'task:agent_complete'; subSessionId?: string };

export type TrackerEventKind = TrackerEvent['kind'];

// ========== Error Utilities ==========

/**
 * Type guard to check if a value is an Error instance.
 *
 * @param value The value to check
 * @returns True if the value is an Error instance
 */
export function isError(value: unknown): value is Error {
  return value instanceof Error;
}

/**
 * Safely extracts an error message from an unknown caught value.
 *
 * @example
 * ```typescript
 * try {
 *   stream.write(line);
 * } catch (err) {
 *   console.warn('Write failed:', getErrorMessage(err));
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}
