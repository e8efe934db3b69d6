/**
 * @fileoverview Public API of session-indicator.
 *
 * This module re-exports everything a host needs to mount the indicator or
 * use its parts on their own.
 *
 * @module lib
 */

export {
  SessionIndicator,
  SUBSCRIBED_EVENTS,
  mount,
  type EscalationHandlers,
  type HookCoordinator,
  type SessionIndicatorOptions,
  type SubscribedEvent,
} from './session-indicator.js';
export { StateTracker, type StateTrackerEvents } from './state-tracker.js';
export { detectStuck, type StuckStatus } from './stuck-detector.js';
export { EscalationStateMachine, KEYBOARD_SHORTCUTS, type EscalationEvents } from './escalation.js';
export { InterruptSource, type SignalTarget } from './interrupt-source.js';
export {
  activityPhrase,
  formatElapsed,
  formatTokenCount,
  formatTokens,
  renderStatusLine,
  SEPARATOR,
  type DisplayOptions,
} from './renderer.js';
export { RenderLoop, type RenderLoopEvents, type RenderLoopOptions } from './render-loop.js';
export {
  StatusLine,
  StatusLineError,
  supportsStatusLine,
  type LineWriter,
  type StatusPosition,
  type TerminalStream,
} from './terminal.js';
export { EventIngestor, decodeHostEvent, type EventIngestorEvents } from './event-ingestor.js';
export {
  IndicatorConfigSchema,
  parseIndicatorConfig,
  resolveIndicatorConfig,
  type ConfigIssue,
  type IndicatorConfig,
  type IndicatorConfigInput,
  type ResolvedIndicatorConfig,
} from './config/indicator-config.js';
export { ManualClock, SystemClock, systemClock, type Clock } from './clock.js';
export { SPINNERS, SPINNER_NAMES, DEFAULT_SPINNER, type SpinnerName } from './spinner.js';
export * from './types.js';
