/**
 * @fileoverview Centralized timing and size limits for the session indicator.
 *
 * @module config/limits
 */

// ============================================================================
// Escalation
// ============================================================================

/**
 * Window in which repeated Ctrl+C presses escalate (2 seconds).
 * A press at exactly this offset from the window start opens a new window.
 */
export const ESCALATION_WINDOW_MS = 2000;

/** Press count that moves the machine from cancel to abort */
export const ABORT_PRESS_COUNT = 2;

/** Press count that moves the machine from abort to emergency */
export const EMERGENCY_PRESS_COUNT = 3;

/** Exit code used when an emergency exit has no custom handler (128 + SIGINT) */
export const EMERGENCY_EXIT_CODE = 130;

// ============================================================================
// Event Ingestion
// ============================================================================

/**
 * Maximum events held before the ingestor drains inline.
 */
export const DEFAULT_EVENT_QUEUE_CAPACITY = 1024;

/** Maximum characters kept from a session:error message */
export const MAX_ERROR_MESSAGE_LENGTH = 50;

// ============================================================================
// Rendering
// ============================================================================

/**
 * Longest accepted update_interval, in seconds. Node clamps timer delays
 * above 2^31-1 ms to 1 ms.
 */
export const MAX_UPDATE_INTERVAL_SECONDS = 3600;

/** Tool names longer than this are shortened with an ellipsis */
export const MAX_TOOL_NAME_LENGTH = 20;

/** Terminal width assumed when the stream does not report one */
export const DEFAULT_TERMINAL_WIDTH = 80;

/** Columns left free at the right edge of the status line */
export const STATUS_LINE_MARGIN = 2;
